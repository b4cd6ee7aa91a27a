import { createOpenAI } from '@ai-sdk/openai';
import { generateText, type LanguageModel } from 'ai';

import { GenerationConnectionError, GenerationTimeoutError, type GenerationError } from './errors.js';

export const DEFAULT_MODEL_BASE_URL = 'http://localhost:11434/v1';
export const DEFAULT_MODEL_ID = 'qwen2.5:latest';
export const DEFAULT_GENERATION_TIMEOUT_MS = 60_000;

export const STRUCTURED_OUTPUT_INSTRUCTION =
  'Respond only with a single valid JSON object. Do not add commentary or wrap it in code fences.';

export interface GenerateOptions {
  readonly system?: string;
  readonly temperature?: number;
  readonly structured?: boolean;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  /** Identifies the caller in error messages and scripted clients. */
  readonly label?: string;
}

export type GenerationOutcome =
  | {
      readonly ok: true;
      readonly text: string;
      readonly model: string;
      readonly durationMs: number;
    }
  | {
      readonly ok: false;
      readonly error: GenerationError;
      readonly durationMs: number;
    };

export interface TextGenerationClient {
  readonly modelId: string;
  generate(prompt: string, options?: GenerateOptions): Promise<GenerationOutcome>;
}

export const assertGenerationRequest = (prompt: string, timeoutMs: number): void => {
  if (prompt.trim().length === 0) {
    throw new RangeError('Prompt must not be empty.');
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`Timeout must be a positive duration, received ${timeoutMs}.`);
  }
};

export const composeSystemPrompt = (system: string | undefined, structured: boolean): string | undefined => {
  if (!structured) {
    return system;
  }
  return system ? `${system}\n\n${STRUCTURED_OUTPUT_INSTRUCTION}` : STRUCTURED_OUTPUT_INSTRUCTION;
};

export interface AiSdkTextGenerationClientOptions {
  readonly model: LanguageModel;
  readonly modelId: string;
  readonly timeoutMs?: number;
  readonly now?: () => number;
}

/**
 * Single-attempt text generation through the AI SDK. Failures come back as
 * values; only a caller error (empty prompt, bad timeout) throws.
 */
export class AiSdkTextGenerationClient implements TextGenerationClient {
  readonly modelId: string;
  private readonly model: LanguageModel;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: AiSdkTextGenerationClientOptions) {
    this.model = options.model;
    this.modelId = options.modelId;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationOutcome> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    assertGenerationRequest(prompt, timeoutMs);

    const subject = options.label ? `Model ${this.modelId} (${options.label})` : `Model ${this.modelId}`;
    const started = this.now();
    const elapsed = () => this.now() - started;

    if (options.signal?.aborted) {
      return {
        ok: false,
        error: new GenerationTimeoutError(timeoutMs, 'Request deadline reached before the model call started'),
        durationMs: 0
      };
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const signal = options.signal ? AbortSignal.any([controller.signal, options.signal]) : controller.signal;

    try {
      const result = await generateText({
        model: this.model,
        system: composeSystemPrompt(options.system, options.structured ?? false),
        prompt,
        temperature: options.temperature,
        maxRetries: 0,
        abortSignal: signal
      });

      if (result.text.trim().length === 0) {
        return {
          ok: false,
          error: new GenerationConnectionError(`${subject} returned an empty completion`),
          durationMs: elapsed()
        };
      }

      return { ok: true, text: result.text, model: this.modelId, durationMs: elapsed() };
    } catch (error) {
      if (signal.aborted) {
        const message = options.signal?.aborted
          ? 'Request deadline reached while waiting for the model'
          : undefined;
        return { ok: false, error: new GenerationTimeoutError(timeoutMs, message), durationMs: elapsed() };
      }

      const detail = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        error: new GenerationConnectionError(`${subject} request failed: ${detail}`, { cause: error }),
        durationMs: elapsed()
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

export interface OllamaClientOptions {
  readonly baseUrl?: string;
  readonly model?: string;
  readonly timeoutMs?: number;
}

/** Client for an Ollama server through its OpenAI-compatible endpoint. */
export const createOllamaTextGenerationClient = (options: OllamaClientOptions = {}): AiSdkTextGenerationClient => {
  const modelId = options.model ?? DEFAULT_MODEL_ID;
  const provider = createOpenAI({
    baseURL: options.baseUrl ?? DEFAULT_MODEL_BASE_URL,
    apiKey: 'ollama',
    compatibility: 'compatible'
  });

  return new AiSdkTextGenerationClient({
    model: provider(modelId),
    modelId,
    timeoutMs: options.timeoutMs
  });
};
