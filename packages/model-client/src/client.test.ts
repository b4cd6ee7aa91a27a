import { MockLanguageModelV1 } from 'ai/test';
import { describe, expect, it } from 'vitest';

import { AiSdkTextGenerationClient, STRUCTURED_OUTPUT_INSTRUCTION } from './client.js';
import { GenerationConnectionError, GenerationTimeoutError } from './errors.js';

const completion = (text: string) => ({
  rawCall: { rawPrompt: null, rawSettings: {} },
  finishReason: 'stop' as const,
  usage: { promptTokens: 4, completionTokens: 8 },
  text
});

const waitForAbort = (signal: AbortSignal | undefined) =>
  new Promise<never>((_resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

describe('AiSdkTextGenerationClient', () => {
  it('returns the completion text and appends the JSON instruction for structured calls', async () => {
    const systems: (string | undefined)[] = [];
    const model = new MockLanguageModelV1({
      doGenerate: async ({ prompt }) => {
        const system = prompt.find((message) => message.role === 'system');
        systems.push(system?.role === 'system' ? system.content : undefined);
        return completion('{"title": "Smartwatch"}');
      }
    });
    const client = new AiSdkTextGenerationClient({ model, modelId: 'test-model' });

    const outcome = await client.generate('Write a title', { system: 'You write titles.', structured: true });

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.text).toBe('{"title": "Smartwatch"}');
      expect(outcome.model).toBe('test-model');
    }
    expect(systems).toEqual([`You write titles.\n\n${STRUCTURED_OUTPUT_INSTRUCTION}`]);
  });

  it('rejects empty prompts and non-positive timeouts as caller errors', async () => {
    const model = new MockLanguageModelV1({ doGenerate: async () => completion('ok') });
    const client = new AiSdkTextGenerationClient({ model, modelId: 'test-model' });

    await expect(client.generate('   ')).rejects.toBeInstanceOf(RangeError);
    await expect(client.generate('hello', { timeoutMs: 0 })).rejects.toBeInstanceOf(RangeError);
  });

  it('reports a timeout when the model does not answer in time', async () => {
    const model = new MockLanguageModelV1({
      doGenerate: ({ abortSignal }) => waitForAbort(abortSignal)
    });
    const client = new AiSdkTextGenerationClient({ model, modelId: 'test-model', timeoutMs: 20 });

    const outcome = await client.generate('Write a title');

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(GenerationTimeoutError);
      expect(outcome.error.message).toBe('Model did not respond within 20ms');
    }
  });

  it('treats an aborted caller signal as a timeout', async () => {
    const model = new MockLanguageModelV1({
      doGenerate: ({ abortSignal }) => waitForAbort(abortSignal)
    });
    const client = new AiSdkTextGenerationClient({ model, modelId: 'test-model', timeoutMs: 10_000 });
    const controller = new AbortController();

    const pending = client.generate('Write a title', { signal: controller.signal });
    controller.abort();
    const outcome = await pending;

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(GenerationTimeoutError);
      expect(outcome.error.message).toBe('Request deadline reached while waiting for the model');
    }
  });

  it('maps transport failures and empty completions to connection errors', async () => {
    const failing = new AiSdkTextGenerationClient({
      model: new MockLanguageModelV1({
        doGenerate: async () => {
          throw new Error('connect ECONNREFUSED 127.0.0.1:11434');
        }
      }),
      modelId: 'test-model'
    });
    const empty = new AiSdkTextGenerationClient({
      model: new MockLanguageModelV1({ doGenerate: async () => completion('  ') }),
      modelId: 'test-model'
    });

    const failed = await failing.generate('Write a title');
    const blank = await empty.generate('Write a title');

    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error).toBeInstanceOf(GenerationConnectionError);
      expect(failed.error.message).toBe('Model test-model request failed: connect ECONNREFUSED 127.0.0.1:11434');
    }
    expect(blank.ok).toBe(false);
    if (!blank.ok) {
      expect(blank.error.message).toBe('Model test-model returned an empty completion');
    }
  });
});
