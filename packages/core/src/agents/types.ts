import type {
  AgentOrigin,
  AgentResult,
  AgentResultOf,
  AgentStatus,
  ConfidenceContribution,
  ListingDraft,
  OrchestrationAdvisory
} from '../listing.js';
import type { AgentName, AgentPayload } from '../payloads.js';
import type { ProductInput } from '../product.js';

export type { AgentName, AgentPayload, AgentOrigin, AgentResult, AgentResultOf, AgentStatus };

/** Read-only view of the results produced earlier in the same orchestration. */
export interface AgentExecutionContext {
  readonly priorResults: ReadonlyMap<AgentName, AgentResult>;
  readonly signal?: AbortSignal;
}

export interface AgentDescriptor<N extends AgentName = AgentName> {
  readonly name: N;
  readonly label: string;
  readonly dependsOn: readonly AgentName[];
}

export interface ListingAgentContract<N extends AgentName = AgentName> extends AgentDescriptor<N> {
  process(input: ProductInput, context?: AgentExecutionContext): Promise<AgentResultOf<N>>;
  fallback(input: ProductInput, context?: AgentExecutionContext): AgentPayload<N>;
}

export interface OrchestrationDeadline {
  readonly deadlineMs: number;
  readonly startedAt: number;
}

export interface OrchestrationWave {
  readonly index: number;
  readonly agents: readonly AgentName[];
  readonly startedAt: number;
  readonly completedAt: number;
}

export interface OrchestrationResult {
  readonly startedAt: number;
  readonly completedAt: number;
  readonly deadline: OrchestrationDeadline;
  readonly draft: ListingDraft;
  readonly results: readonly AgentResult[];
  readonly waves: readonly OrchestrationWave[];
  readonly confidenceBreakdown: readonly ConfidenceContribution[];
  readonly advisory?: OrchestrationAdvisory;
}
