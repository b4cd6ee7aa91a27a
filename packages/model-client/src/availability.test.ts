import { describe, expect, it, vi } from 'vitest';

import { checkModelAvailability } from './availability.js';

describe('checkModelAvailability', () => {
  it('reports whether the configured model is listed', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(JSON.stringify({ data: [{ id: 'qwen2.5:latest' }, { id: 'llama3.1:8b' }] }), { status: 200 })
    );

    const result = await checkModelAvailability({
      baseUrl: 'http://localhost:11434/v1/',
      model: 'qwen2.5:latest',
      fetch: fetchMock
    });

    expect(result).toEqual({
      reachable: true,
      available: true,
      model: 'qwen2.5:latest',
      models: ['qwen2.5:latest', 'llama3.1:8b']
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:11434/v1/models');
  });

  it('reports an unreachable server without throwing', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new Error('fetch failed'));

    const result = await checkModelAvailability({
      baseUrl: 'http://localhost:11434/v1',
      model: 'qwen2.5:latest',
      fetch: fetchMock
    });

    expect(result).toEqual({
      reachable: false,
      available: false,
      model: 'qwen2.5:latest',
      models: [],
      error: 'fetch failed'
    });
  });
});
