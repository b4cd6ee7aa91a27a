import {
  AgentNameSchema,
  LISTING_FIELDS,
  ListingFiltersSchema,
  ListingPatchSchema,
  parseProductInput,
  type FieldOrigin,
  type ListingField,
  type ListingRecord,
  type ListingVersion
} from '@listsmith/core';
import type { OrchestrationResult } from '@listsmith/core/agents';
import {
  ListingNotFoundError,
  type DuplicateListingOptions,
  type ListingPage,
  type ListingStore
} from '@listsmith/listing-store';
import type { ModelAvailability, TextGenerationClient } from '@listsmith/model-client';
import { z } from 'zod';

import type { Logger } from '../logger.js';
import { FIELD_OWNERS, formatAgentNotes, pickOwnedFields, type ListingOrchestrator } from '../orchestrator/index.js';
import {
  RecommendationRequestSchema,
  proposeRecommendationChanges,
  type RecommendationOrigin
} from './recommendations.js';
import { summarizeListings, type ListingStatistics } from './statistics.js';

export interface ListingWorkflowServiceOptions {
  readonly store: ListingStore;
  readonly orchestrator: ListingOrchestrator;
  readonly client: TextGenerationClient;
  readonly logger: Logger;
  readonly checkModel?: () => Promise<ModelAvailability>;
  readonly modelTimeoutMs?: number;
}

export interface BuildListingRequest {
  /** Agent names to invoke; validated against the registry. */
  readonly agents?: readonly string[];
  readonly signal?: AbortSignal;
}

export interface ListingBuildResult {
  readonly listing: ListingRecord;
  readonly orchestration: OrchestrationResult;
}

export interface AppliedRecommendation {
  readonly listing: ListingRecord;
  readonly applied: boolean;
  readonly origin: RecommendationOrigin;
  readonly changedFields: readonly string[];
  readonly explanation: string;
}

export interface ServiceHealth {
  readonly status: 'ok' | 'degraded';
  readonly model?: ModelAvailability;
}

const AgentSubsetSchema = z.array(AgentNameSchema).min(1, 'Select at least one agent').optional();

const DuplicateOptionsSchema = z
  .object({
    productName: z.string().trim().min(1).max(200).optional()
  })
  .strict();

const STATISTICS_PAGE_SIZE = 500;

const markFieldSources = (
  listing: ListingRecord,
  fields: readonly ListingField[],
  origin: FieldOrigin
): ListingRecord['fieldSources'] => {
  const sources = { ...listing.fieldSources };
  for (const field of fields) {
    sources[field] = { agent: FIELD_OWNERS[field], origin };
  }
  return sources;
};

export class ListingWorkflowService {
  private readonly store: ListingStore;
  private readonly orchestrator: ListingOrchestrator;
  private readonly client: TextGenerationClient;
  private readonly logger: Logger;
  private readonly checkModel?: () => Promise<ModelAvailability>;
  private readonly modelTimeoutMs?: number;

  constructor(options: ListingWorkflowServiceOptions) {
    this.store = options.store;
    this.orchestrator = options.orchestrator;
    this.client = options.client;
    this.logger = options.logger;
    this.checkModel = options.checkModel;
    this.modelTimeoutMs = options.modelTimeoutMs;
  }

  /** Validates the input, runs every agent and stores the merged draft as version 1. */
  async buildListing(input: unknown, request: BuildListingRequest = {}): Promise<ListingBuildResult> {
    const product = parseProductInput(input);
    const agents = AgentSubsetSchema.parse(request.agents);
    const orchestration = await this.orchestrator.buildListing(product, { agents, signal: request.signal });
    const listing = await this.store.create(orchestration.draft);
    this.logger.info({ listingId: listing.id, confidence: listing.confidence }, 'listing created');
    return { listing, orchestration };
  }

  /**
   * Re-runs one agent and writes back only the fields it owns, together with
   * the recomputed confidence and audit trail. Other fields keep their stored
   * values, including manual edits.
   */
  async rerunAgent(id: string, agent: unknown): Promise<ListingBuildResult> {
    const agentName = AgentNameSchema.parse(agent);
    const current = await this.getListing(id);
    const orchestration = await this.orchestrator.rerunAgent(current, agentName);
    const { draft } = orchestration;
    const owned = pickOwnedFields(agentName, draft);

    const storedAgentNotes = new Set(formatAgentNotes(current.agentResults));
    const editNotes = current.notes.filter((note) => !storedAgentNotes.has(note));

    const listing = await this.store.update(
      id,
      {
        ...owned.content,
        fieldSources: { ...current.fieldSources, ...owned.fieldSources },
        confidence: draft.confidence,
        confidenceBreakdown: draft.confidenceBreakdown,
        notes: [...draft.notes, ...editNotes],
        advisories: draft.advisories,
        agentResults: draft.agentResults
      },
      { reason: `rerun ${agentName}` }
    );
    return { listing, orchestration };
  }

  async getListing(id: string): Promise<ListingRecord> {
    const listing = await this.store.get(id);
    if (!listing) {
      throw new ListingNotFoundError(id);
    }
    return listing;
  }

  listListings(filters: unknown = {}): Promise<ListingPage> {
    return this.store.list(ListingFiltersSchema.parse(filters));
  }

  async updateListing(id: string, patch: unknown, reason?: string): Promise<ListingRecord> {
    const update = ListingPatchSchema.parse(patch);
    const edited = LISTING_FIELDS.filter((field) => update[field] !== undefined);
    if (edited.length === 0) {
      return this.store.update(id, update, { reason: reason ?? 'updated' });
    }

    const current = await this.getListing(id);
    return this.store.update(
      id,
      { ...update, fieldSources: markFieldSources(current, edited, 'manual') },
      { reason: reason ?? 'updated' }
    );
  }

  publishListing(id: string): Promise<ListingRecord> {
    return this.store.update(id, { status: 'published' }, { reason: 'published' });
  }

  archiveListing(id: string): Promise<ListingRecord> {
    return this.store.update(id, { status: 'archived' }, { reason: 'archived' });
  }

  async deleteListing(id: string): Promise<void> {
    const deleted = await this.store.delete(id);
    if (!deleted) {
      throw new ListingNotFoundError(id);
    }
    this.logger.info({ listingId: id }, 'listing deleted');
  }

  duplicateListing(id: string, options: DuplicateListingOptions = {}): Promise<ListingRecord> {
    return this.store.duplicate(id, DuplicateOptionsSchema.parse(options));
  }

  async getHistory(id: string): Promise<readonly ListingVersion[]> {
    await this.getListing(id);
    return this.store.history(id);
  }

  /** Applies a reviewer recommendation; a change is stored as a new version. */
  async applyRecommendation(id: string, request: unknown): Promise<AppliedRecommendation> {
    const recommendation = RecommendationRequestSchema.parse(request);
    const current = await this.getListing(id);
    const changes = await proposeRecommendationChanges(current, recommendation, {
      client: this.client,
      logger: this.logger,
      timeoutMs: this.modelTimeoutMs
    });

    if (changes.changedFields.length === 0) {
      return {
        listing: current,
        applied: false,
        origin: changes.origin,
        changedFields: [],
        explanation: changes.explanation
      };
    }

    const note = `[recommendation] ${recommendation.text} (${changes.origin}: ${changes.explanation})`;
    const listing = await this.store.update(
      id,
      {
        ...changes.update,
        fieldSources: markFieldSources(current, changes.changedFields, 'recommendation'),
        notes: [...current.notes, note]
      },
      { reason: `recommendation: ${recommendation.text}` }
    );
    this.logger.info({ listingId: id, fields: changes.changedFields, origin: changes.origin }, 'recommendation applied');
    return { listing, applied: true, origin: changes.origin, changedFields: changes.changedFields, explanation: changes.explanation };
  }

  async statistics(): Promise<ListingStatistics> {
    const records: ListingRecord[] = [];
    let total = Number.POSITIVE_INFINITY;
    while (records.length < total) {
      const page = await this.store.list({ offset: records.length, limit: STATISTICS_PAGE_SIZE });
      records.push(...page.items);
      total = page.total;
      if (page.items.length === 0) {
        break;
      }
    }
    return summarizeListings(records);
  }

  async health(): Promise<ServiceHealth> {
    if (!this.checkModel) {
      return { status: 'ok' };
    }
    const model = await this.checkModel();
    return { status: model.available ? 'ok' : 'degraded', model };
  }
}
