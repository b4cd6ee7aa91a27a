import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ListingDraftSchema, parseProductInput, type ListingDraft, type ProductInput } from '@listsmith/core';
import {
  GenerationConnectionError,
  GenerationTimeoutError,
  assertGenerationRequest,
  type GenerateOptions,
  type GenerationOutcome,
  type TextGenerationClient
} from '@listsmith/model-client';
import { z } from 'zod';

export const PRODUCT_FIXTURE_IDS = ['smartwatch-pro-x1', 'trailhead-hydration-pack'] as const;

export type ProductFixtureId = (typeof PRODUCT_FIXTURE_IDS)[number];

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE_ROOT = resolve(__dirname, '../../../fixtures');

const readJson = (...segments: string[]): unknown => {
  return JSON.parse(readFileSync(join(FIXTURE_ROOT, ...segments), 'utf-8'));
};

export const getFixturePath = (...segments: string[]): string => join(FIXTURE_ROOT, ...segments);

export const loadProductFixture = (id: ProductFixtureId): ProductInput => {
  return parseProductInput(readJson('products', `${id}.json`));
};

const ModelResponsesSchema = z.record(z.string(), z.string());

/** Raw completions keyed by agent label, as a healthy model would return them. */
export const loadModelResponsesFixture = (id: 'smartwatch-pro-x1'): Readonly<Record<string, string>> => {
  return ModelResponsesSchema.parse(readJson('model-responses', `${id}.json`));
};

export const loadListingDraftFixture = (id: 'smartwatch-pro-x1'): ListingDraft => {
  return ListingDraftSchema.parse(readJson('listings', `${id}.draft.json`));
};

export type ScriptedReply =
  | { readonly kind: 'text'; readonly text: string; readonly delayMs?: number }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'connection-error'; readonly message?: string }
  | { readonly kind: 'hang' };

export interface ScriptedCall {
  readonly prompt: string;
  readonly options: GenerateOptions;
}

export type ScriptedResponder = (call: ScriptedCall) => ScriptedReply;

export interface ScriptedTextGenerationClient extends TextGenerationClient {
  readonly calls: readonly ScriptedCall[];
}

const DEFAULT_SCRIPTED_TIMEOUT_MS = 60_000;

const waitFor = (delayMs: number, signal: AbortSignal | undefined): Promise<boolean> =>
  new Promise((resolvePromise) => {
    if (signal?.aborted) {
      resolvePromise(false);
      return;
    }
    const timer = setTimeout(() => resolvePromise(true), delayMs);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        resolvePromise(false);
      },
      { once: true }
    );
  });

/**
 * In-process stand-in for the model server. Each call is answered by the
 * responder; `hang` waits until the caller's signal aborts.
 */
export const createScriptedTextGenerationClient = (
  responder: ScriptedResponder,
  modelId = 'scripted-model'
): ScriptedTextGenerationClient => {
  const calls: ScriptedCall[] = [];

  const generate = async (prompt: string, options: GenerateOptions = {}): Promise<GenerationOutcome> => {
    const timeoutMs = options.timeoutMs ?? DEFAULT_SCRIPTED_TIMEOUT_MS;
    assertGenerationRequest(prompt, timeoutMs);
    calls.push({ prompt, options });

    const reply = responder({ prompt, options });
    switch (reply.kind) {
      case 'text': {
        const completed = await waitFor(reply.delayMs ?? 0, options.signal);
        if (!completed) {
          return { ok: false, error: new GenerationTimeoutError(timeoutMs), durationMs: reply.delayMs ?? 0 };
        }
        return { ok: true, text: reply.text, model: modelId, durationMs: reply.delayMs ?? 0 };
      }
      case 'timeout':
        return { ok: false, error: new GenerationTimeoutError(timeoutMs), durationMs: timeoutMs };
      case 'connection-error':
        return {
          ok: false,
          error: new GenerationConnectionError(reply.message ?? 'connect ECONNREFUSED 127.0.0.1:11434'),
          durationMs: 0
        };
      case 'hang':
        await waitFor(timeoutMs, options.signal);
        return { ok: false, error: new GenerationTimeoutError(timeoutMs), durationMs: timeoutMs };
    }
  };

  return { modelId, calls, generate };
};

/** Answers each call with the response stored under its label. */
export const respondByLabel = (
  responses: Readonly<Record<string, string>>,
  otherwise: ScriptedReply = { kind: 'timeout' }
): ScriptedResponder => {
  return ({ options }) => {
    const text = options.label ? responses[options.label] : undefined;
    return text === undefined ? otherwise : { kind: 'text', text };
  };
};

export const alwaysReply = (reply: ScriptedReply): ScriptedResponder => () => reply;
