import {
  AGENT_NAMES,
  type AgentName,
  type AgentResult,
  type ListingDraft,
  type OrchestrationAdvisory,
  type ProductInput
} from '@listsmith/core';
import type {
  AgentDescriptor,
  AgentExecutionContext,
  OrchestrationResult,
  OrchestrationWave
} from '@listsmith/core/agents';

import type { FallbackResultOptions } from '../agents/base-agent.js';
import type { Logger } from '../logger.js';
import { assertValidWeights, buildConfidenceBreakdown, scoreConfidence, type AgentWeights } from './confidence.js';
import { formatAgentNotes, mergeAgentResults } from './merge.js';
import { planWaves } from './waves.js';

export const DEFAULT_DEADLINE_MS = 180_000;

/** What the orchestrator needs from an agent. */
export interface OrchestratedAgent extends AgentDescriptor {
  process(input: ProductInput, context?: AgentExecutionContext): Promise<AgentResult>;
  fallbackResult(input: ProductInput, options: FallbackResultOptions, context?: AgentExecutionContext): AgentResult;
}

export type OrchestratedAgents = { readonly [K in AgentName]: OrchestratedAgent };

export interface ListingOrchestratorOptions {
  readonly agents: OrchestratedAgents;
  readonly logger: Logger;
  readonly deadlineMs?: number;
  readonly maxNonSuccess?: number;
  readonly weights?: AgentWeights;
  readonly now?: () => number;
}

export interface BuildListingOptions {
  readonly agents?: readonly AgentName[];
  readonly signal?: AbortSignal;
}

export interface RerunAgentOptions {
  readonly signal?: AbortSignal;
}

/** Stored state a single agent can be re-run against. */
export interface RerunSource {
  readonly input: ProductInput;
  readonly agentResults: readonly AgentResult[];
}

interface Deadline {
  readonly signal: AbortSignal;
  readonly dispose: () => void;
}

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class ListingOrchestrator {
  private readonly agents: OrchestratedAgents;
  private readonly logger: Logger;
  private readonly deadlineMs: number;
  private readonly maxNonSuccess: number;
  private readonly weights: AgentWeights;
  private readonly now: () => number;
  private readonly waves: readonly AgentName[][];

  constructor(options: ListingOrchestratorOptions) {
    const deadlineMs = options.deadlineMs ?? DEFAULT_DEADLINE_MS;
    if (!Number.isFinite(deadlineMs) || deadlineMs <= 0) {
      throw new RangeError(`Orchestration deadline must be a positive number of milliseconds, received ${deadlineMs}.`);
    }
    const maxNonSuccess = options.maxNonSuccess ?? AGENT_NAMES.length;
    if (!Number.isInteger(maxNonSuccess) || maxNonSuccess < 0) {
      throw new RangeError(`maxNonSuccess must be a non-negative integer, received ${maxNonSuccess}.`);
    }
    const weights = options.weights ?? {};
    assertValidWeights(weights);

    this.agents = options.agents;
    this.logger = options.logger;
    this.deadlineMs = deadlineMs;
    this.maxNonSuccess = maxNonSuccess;
    this.weights = weights;
    this.now = options.now ?? Date.now;
    this.waves = planWaves(AGENT_NAMES.map((name) => this.agents[name]));
  }

  async buildListing(input: ProductInput, options: BuildListingOptions = {}): Promise<OrchestrationResult> {
    const requested = new Set<AgentName>(options.agents ?? AGENT_NAMES);
    const startedAt = this.now();
    const deadline = this.startDeadline(options.signal);
    this.logger.info(
      { productName: input.productName, agents: [...requested], deadlineMs: this.deadlineMs },
      'orchestration started'
    );

    const results = new Map<AgentName, AgentResult>();
    const waves: OrchestrationWave[] = [];
    try {
      for (const [index, wave] of this.waves.entries()) {
        const waveStartedAt = this.now();
        const context: AgentExecutionContext = { priorResults: new Map(results), signal: deadline.signal };
        const settled = await Promise.all(
          wave.map((name) => this.invoke(name, input, context, requested.has(name)))
        );
        for (const result of settled) {
          results.set(result.agent, result);
        }
        waves.push({ index, agents: wave, startedAt: waveStartedAt, completedAt: this.now() });
      }
    } finally {
      deadline.dispose();
    }

    return this.assemble(input, results, { startedAt, waves });
  }

  /** Runs one agent again against stored results and re-merges the listing. */
  async rerunAgent(source: RerunSource, name: AgentName, options: RerunAgentOptions = {}): Promise<OrchestrationResult> {
    const startedAt = this.now();
    const deadline = this.startDeadline(options.signal);
    const results = new Map<AgentName, AgentResult>();
    for (const result of source.agentResults) {
      results.set(result.agent, result);
    }
    results.delete(name);
    this.logger.info({ agent: name, productName: source.input.productName }, 'agent rerun started');

    let rerun: AgentResult;
    try {
      rerun = await this.invoke(name, source.input, { priorResults: new Map(results), signal: deadline.signal }, true);
    } finally {
      deadline.dispose();
    }
    results.set(name, rerun);

    // Results missing from older records are regenerated from the fallback generators.
    for (const missing of AGENT_NAMES.filter((agent) => !results.has(agent))) {
      results.set(
        missing,
        this.agents[missing].fallbackResult(source.input, { reason: 'no stored result' }, { priorResults: new Map(results) })
      );
    }

    const completedAt = this.now();
    return this.assemble(source.input, results, {
      startedAt,
      waves: [{ index: 0, agents: [name], startedAt, completedAt }]
    });
  }

  private startDeadline(external: AbortSignal | undefined): Deadline {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      this.logger.warn({ deadlineMs: this.deadlineMs }, 'orchestration deadline reached, aborting in-flight calls');
      controller.abort();
    }, this.deadlineMs);
    timer.unref();
    const signal = external ? AbortSignal.any([controller.signal, external]) : controller.signal;
    return { signal, dispose: () => clearTimeout(timer) };
  }

  private async invoke(
    name: AgentName,
    input: ProductInput,
    context: AgentExecutionContext,
    requested: boolean
  ): Promise<AgentResult> {
    const agent = this.agents[name];
    if (!requested) {
      return agent.fallbackResult(input, { reason: 'agent not requested' }, context);
    }

    try {
      return await agent.process(input, context);
    } catch (error) {
      const message = describeError(error);
      this.logger.error({ agent: name, err: error }, 'agent failed unexpectedly, using fallback');
      return agent.fallbackResult(
        input,
        { reason: `agent failed: ${message}`, status: 'error', confidence: 0 },
        context
      );
    }
  }

  private assemble(
    input: ProductInput,
    byAgent: ReadonlyMap<AgentName, AgentResult>,
    run: { readonly startedAt: number; readonly waves: readonly OrchestrationWave[] }
  ): OrchestrationResult {
    const results = AGENT_NAMES.flatMap((name) => {
      const result = byAgent.get(name);
      return result ? [result] : [];
    });
    const { content, fieldSources } = mergeAgentResults(results);
    const confidenceBreakdown = buildConfidenceBreakdown(results, this.weights);
    const advisory = this.describeNonSuccess(results);

    const draft: ListingDraft = {
      ...content,
      input,
      confidence: scoreConfidence(confidenceBreakdown),
      confidenceBreakdown,
      fieldSources,
      notes: formatAgentNotes(results),
      advisories: advisory ? [advisory] : [],
      agentResults: [...results]
    };

    const completedAt = this.now();
    this.logger.info(
      {
        productName: input.productName,
        confidence: draft.confidence,
        nonSuccess: advisory?.nonSuccessAgents.length ?? 0,
        durationMs: completedAt - run.startedAt
      },
      'orchestration completed'
    );

    return {
      startedAt: run.startedAt,
      completedAt,
      deadline: { deadlineMs: this.deadlineMs, startedAt: run.startedAt },
      draft,
      results,
      waves: run.waves,
      confidenceBreakdown,
      ...(advisory ? { advisory } : {})
    };
  }

  private describeNonSuccess(results: readonly AgentResult[]): OrchestrationAdvisory | undefined {
    const nonSuccessAgents = results.filter((result) => result.status !== 'success').map((result) => result.agent);
    if (nonSuccessAgents.length === 0) {
      return undefined;
    }

    const toleranceExceeded = nonSuccessAgents.length > this.maxNonSuccess;
    const summary = `${nonSuccessAgents.length} of ${results.length} agents did not succeed: ${nonSuccessAgents.join(', ')}`;
    if (toleranceExceeded) {
      this.logger.warn({ nonSuccessAgents, tolerance: this.maxNonSuccess }, 'non-success tolerance exceeded');
    }

    return {
      kind: 'orchestration-partial',
      message: toleranceExceeded ? `${summary} (tolerance ${this.maxNonSuccess} exceeded)` : summary,
      nonSuccessAgents,
      tolerance: this.maxNonSuccess,
      toleranceExceeded
    };
  }
}

export { planWaves } from './waves.js';
export {
  FIELD_OWNERS,
  fieldsOwnedBy,
  formatAgentNotes,
  mergeAgentResults,
  pickOwnedFields,
  type MergedListing
} from './merge.js';
export {
  DEFAULT_AGENT_WEIGHT,
  buildConfidenceBreakdown,
  roundConfidence,
  scoreConfidence,
  type AgentWeights
} from './confidence.js';
