import { describe, expect, it } from 'vitest';

import { GenerationConnectionError, GenerationTimeoutError } from '@listsmith/model-client';

import {
  alwaysReply,
  createScriptedTextGenerationClient,
  loadListingDraftFixture,
  loadModelResponsesFixture,
  loadProductFixture,
  respondByLabel
} from './index.js';

describe('fixture loaders', () => {
  it('loads frozen product inputs with defaults applied', () => {
    const product = loadProductFixture('smartwatch-pro-x1');

    expect(product.productName).toBe('Smartwatch Pro X1');
    expect(product.features).toEqual(['GPS', '7-day battery']);
    expect(product.useCases).toEqual([]);
    expect(Object.isFrozen(product)).toBe(true);
  });

  it('exposes one canned response per agent', () => {
    const responses = loadModelResponsesFixture('smartwatch-pro-x1');

    expect(Object.keys(responses)).toHaveLength(11);
    expect(responses['product-analysis']).toContain('Smartwatch Pro X1');
  });

  it('loads a schema-valid listing draft', () => {
    const draft = loadListingDraftFixture('smartwatch-pro-x1');

    expect(draft.bulletPoints).toHaveLength(3);
    expect(draft.reviewScore).toBe(8.5);
  });
});

describe('createScriptedTextGenerationClient', () => {
  it('answers by label and records every call', async () => {
    const client = createScriptedTextGenerationClient(respondByLabel({ seo: '{"searchTerms": ["watch"]}' }));

    const answered = await client.generate('keywords please', { label: 'seo' });
    const unanswered = await client.generate('title please', { label: 'product-analysis' });

    expect(answered).toEqual({ ok: true, text: '{"searchTerms": ["watch"]}', model: 'scripted-model', durationMs: 0 });
    expect(unanswered.ok).toBe(false);
    if (!unanswered.ok) {
      expect(unanswered.error).toBeInstanceOf(GenerationTimeoutError);
    }
    expect(client.calls.map((call) => call.options.label)).toEqual(['seo', 'product-analysis']);
  });

  it('returns connection errors and resolves hanging calls when aborted', async () => {
    const refused = createScriptedTextGenerationClient(alwaysReply({ kind: 'connection-error' }));
    const hanging = createScriptedTextGenerationClient(alwaysReply({ kind: 'hang' }));
    const controller = new AbortController();

    const refusedOutcome = await refused.generate('hello');
    const pending = hanging.generate('hello', { signal: controller.signal });
    controller.abort();
    const hangingOutcome = await pending;

    expect(refusedOutcome.ok).toBe(false);
    if (!refusedOutcome.ok) {
      expect(refusedOutcome.error).toBeInstanceOf(GenerationConnectionError);
    }
    expect(hangingOutcome.ok).toBe(false);
    if (!hangingOutcome.ok) {
      expect(hangingOutcome.error).toBeInstanceOf(GenerationTimeoutError);
    }
  });

  it('rejects empty prompts like the real client', async () => {
    const client = createScriptedTextGenerationClient(alwaysReply({ kind: 'timeout' }));

    await expect(client.generate('')).rejects.toBeInstanceOf(RangeError);
  });
});
