import {
  freezeDeep,
  type AgentName,
  type AgentPayload,
  type AgentResultOf,
  type AgentStatus,
  type ProductInput
} from '@listsmith/core';
import type { AgentExecutionContext, ListingAgentContract } from '@listsmith/core/agents';
import {
  parseStructuredResponse,
  type GenerationOutcome,
  type StructuredDocument,
  type TextGenerationClient
} from '@listsmith/model-client';
import type { z } from 'zod';

import type { Logger } from '../logger.js';
import type { FallbackTables } from './fallback-tables.js';

export interface ListingAgentDependencies {
  readonly client: TextGenerationClient;
  readonly tables: FallbackTables;
  readonly logger: Logger;
  readonly timeoutMs?: number;
  readonly now?: () => number;
}

export interface FallbackResultOptions {
  readonly reason: string;
  readonly status?: Exclude<AgentStatus, 'success'>;
  readonly confidence?: number;
  readonly startedAt?: number;
}

type ConfidenceReading =
  | { readonly kind: 'reported'; readonly value: number }
  | { readonly kind: 'missing' }
  | { readonly kind: 'invalid'; readonly value: unknown };

const readConfidence = (document: StructuredDocument): ConfidenceReading => {
  const value = document.confidenceScore;
  if (value === undefined || value === null) {
    return { kind: 'missing' };
  }
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1) {
    return { kind: 'reported', value };
  }
  return { kind: 'invalid', value };
};

export const RESPONSE_CONFIDENCE_INSTRUCTION =
  'Include a "confidenceScore" number between 0 and 1 describing how confident you are in the answer.';

/**
 * One listing concern: a prompt template, the schema its answer must match,
 * and a rule-based generator used whenever the model cannot deliver.
 * `process` never rejects, and every result it returns is frozen.
 */
export abstract class ListingAgent<N extends AgentName> implements ListingAgentContract<N> {
  abstract readonly name: N;
  abstract readonly label: string;
  readonly dependsOn: readonly AgentName[] = [];
  readonly fallbackConfidence: number = 0.4;

  protected abstract readonly temperature: number;
  protected abstract readonly systemPrompt: string;
  protected abstract readonly responseSchema: z.ZodType<AgentPayload<N>>;

  protected readonly client: TextGenerationClient;
  protected readonly tables: FallbackTables;
  protected readonly timeoutMs?: number;
  private readonly baseLogger: Logger;
  private readonly now: () => number;

  constructor(dependencies: ListingAgentDependencies) {
    this.client = dependencies.client;
    this.tables = dependencies.tables;
    this.timeoutMs = dependencies.timeoutMs;
    this.baseLogger = dependencies.logger;
    this.now = dependencies.now ?? Date.now;
  }

  protected abstract buildPrompt(input: ProductInput, context: AgentExecutionContext): string;

  abstract fallback(input: ProductInput, context?: AgentExecutionContext): AgentPayload<N>;

  protected get logger(): Logger {
    return this.baseLogger.child({ agent: this.name });
  }

  async process(input: ProductInput, context: AgentExecutionContext = { priorResults: new Map() }): Promise<AgentResultOf<N>> {
    const startedAt = this.now();
    let outcome: GenerationOutcome;
    try {
      outcome = await this.client.generate(this.buildPrompt(input, context), {
        system: `${this.systemPrompt}\n${RESPONSE_CONFIDENCE_INSTRUCTION}`,
        temperature: this.temperature,
        structured: true,
        timeoutMs: this.timeoutMs,
        signal: context.signal,
        label: this.name
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn({ err: error }, 'model client threw, using fallback');
      return this.fallbackResult(input, { reason, startedAt }, context);
    }

    if (!outcome.ok) {
      this.logger.warn({ reason: outcome.error.message, kind: outcome.error.kind }, 'model call failed, using fallback');
      return this.fallbackResult(input, { reason: outcome.error.message, startedAt }, context);
    }

    const parsed = parseStructuredResponse(outcome.text, this.responseSchema);
    if (!parsed.success) {
      this.logger.warn(
        { reason: parsed.error.message, rawExcerpt: parsed.error.rawExcerpt },
        'model output could not be parsed, using fallback'
      );
      return this.fallbackResult(input, { reason: parsed.error.message, startedAt }, context);
    }

    const reading = readConfidence(parsed.document);
    const completedAt = this.now();
    const base = {
      agent: this.name,
      origin: 'model' as const,
      payload: parsed.data,
      startedAt,
      completedAt,
      durationMs: completedAt - startedAt
    };

    if (reading.kind === 'reported') {
      this.logger.debug({ confidence: reading.value, durationMs: base.durationMs }, 'agent completed');
      const result: AgentResultOf<N> = { ...base, status: 'success', confidence: reading.value, notes: [] };
      return freezeDeep(result);
    }

    const note =
      reading.kind === 'missing'
        ? `confidence: model did not report a confidence score, using ${this.fallbackConfidence}`
        : `confidence: model reported ${JSON.stringify(reading.value)} outside [0, 1], using ${this.fallbackConfidence}`;
    this.logger.warn({ confidence: reading.kind === 'invalid' ? reading.value : undefined }, note);
    const result: AgentResultOf<N> = {
      ...base,
      status: 'partial',
      confidence: this.fallbackConfidence,
      notes: [note]
    };
    return freezeDeep(result);
  }

  /** Builds a result from the rule-based payload without calling the model. */
  fallbackResult(
    input: ProductInput,
    options: FallbackResultOptions,
    context?: AgentExecutionContext
  ): AgentResultOf<N> {
    const startedAt = options.startedAt ?? this.now();
    const completedAt = this.now();
    const result: AgentResultOf<N> = {
      agent: this.name,
      status: options.status ?? 'partial',
      origin: 'fallback',
      payload: this.fallback(input, context),
      confidence: options.confidence ?? this.fallbackConfidence,
      startedAt,
      completedAt,
      durationMs: completedAt - startedAt,
      notes: [`fallback: ${options.reason}`]
    };
    return freezeDeep(result);
  }
}
