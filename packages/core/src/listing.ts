import { z } from 'zod';

import {
  AgentNameSchema,
  ContentPayloadSchema,
  CustomerResearchPayloadSchema,
  DescriptionPayloadSchema,
  ImageSearchPayloadSchema,
  ListingReviewPayloadSchema,
  PricingPayloadSchema,
  ProductAnalysisPayloadSchema,
  SeoPayloadSchema,
  SocialContentPayloadSchema,
  TechnicalSpecsPayloadSchema,
  ValuePropositionPayloadSchema,
  type AgentName,
  type AgentPayload
} from './payloads.js';
import { ProductCategorySchema, ProductInputSchema } from './product.js';

const nonEmptyString = z.string().trim().min(1, 'Value must not be empty');
const isoTimestamp = z.string().datetime({ offset: true });

export const AgentStatusSchema = z.enum(['success', 'partial', 'error']);
export const AgentOriginSchema = z.enum(['model', 'fallback']);

export type AgentStatus = z.infer<typeof AgentStatusSchema>;
export type AgentOrigin = z.infer<typeof AgentOriginSchema>;

const agentResultSchema = <N extends AgentName, P extends z.ZodTypeAny>(agent: N, payload: P) =>
  z.object({
    agent: z.literal(agent),
    status: AgentStatusSchema,
    origin: AgentOriginSchema,
    payload,
    confidence: z.number().finite().min(0).max(1),
    startedAt: z.number().int().nonnegative(),
    completedAt: z.number().int().nonnegative(),
    durationMs: z.number().nonnegative(),
    notes: z.array(z.string())
  });

export const AgentResultSchema = z.discriminatedUnion('agent', [
  agentResultSchema('product-analysis', ProductAnalysisPayloadSchema),
  agentResultSchema('customer-research', CustomerResearchPayloadSchema),
  agentResultSchema('value-proposition', ValuePropositionPayloadSchema),
  agentResultSchema('technical-specs', TechnicalSpecsPayloadSchema),
  agentResultSchema('content', ContentPayloadSchema),
  agentResultSchema('description', DescriptionPayloadSchema),
  agentResultSchema('pricing-strategy', PricingPayloadSchema),
  agentResultSchema('seo', SeoPayloadSchema),
  agentResultSchema('social-content', SocialContentPayloadSchema),
  agentResultSchema('image-search', ImageSearchPayloadSchema),
  agentResultSchema('listing-review', ListingReviewPayloadSchema)
]);

export interface AgentResultOf<N extends AgentName> {
  readonly agent: N;
  readonly status: AgentStatus;
  readonly origin: AgentOrigin;
  readonly payload: AgentPayload<N>;
  readonly confidence: number;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly durationMs: number;
  readonly notes: string[];
}

/**
 * Result of one agent invocation. Without a type argument this is the
 * union over all agents, discriminated by `agent`.
 */
export type AgentResult<N extends AgentName = AgentName> = { [K in N]: AgentResultOf<K> }[N];

export const findResult = <K extends AgentName>(
  results: Iterable<AgentResult>,
  name: K
): Extract<AgentResult, { agent: K }> | undefined => {
  for (const result of results) {
    if (isResultOf(result, name)) {
      return result;
    }
  }
  return undefined;
};

const isResultOf = <K extends AgentName>(
  result: AgentResult,
  name: K
): result is Extract<AgentResult, { agent: K }> => result.agent === name;

export const ListingContentSchema = z
  .object({
    title: nonEmptyString,
    description: nonEmptyString,
    bulletPoints: z.array(nonEmptyString),
    searchTerms: z.array(nonEmptyString),
    backendKeywords: z.array(nonEmptyString),
    pricing: PricingPayloadSchema,
    images: ImageSearchPayloadSchema,
    customerProfile: CustomerResearchPayloadSchema,
    technicalSpecs: TechnicalSpecsPayloadSchema,
    boxContents: ContentPayloadSchema,
    socialContent: SocialContentPayloadSchema,
    recommendations: z.array(nonEmptyString),
    reviewScore: z.number().finite().min(0).max(10)
  })
  .strict();

export type ListingContent = z.infer<typeof ListingContentSchema>;

export const LISTING_FIELDS = ListingContentSchema.keyof().options;

export type ListingField = keyof ListingContent;

export const ListingFieldSchema = ListingContentSchema.keyof();

/**
 * Where a field's current value came from: the owning agent's model output,
 * its rule-based fallback, a manual edit, or an applied recommendation.
 */
export const FieldOriginSchema = z.enum(['model', 'fallback', 'manual', 'recommendation']);

export type FieldOrigin = z.infer<typeof FieldOriginSchema>;

export const FieldSourceSchema = z
  .object({
    agent: AgentNameSchema,
    origin: FieldOriginSchema
  })
  .strict();

export type FieldSource = z.infer<typeof FieldSourceSchema>;

export const ConfidenceContributionSchema = z
  .object({
    agent: AgentNameSchema,
    confidence: z.number().finite().min(0).max(1),
    weight: z.number().finite().positive()
  })
  .strict();

export type ConfidenceContribution = z.infer<typeof ConfidenceContributionSchema>;

export const OrchestrationAdvisorySchema = z
  .object({
    kind: z.literal('orchestration-partial'),
    message: nonEmptyString,
    nonSuccessAgents: z.array(AgentNameSchema),
    tolerance: z.number().int().nonnegative(),
    toleranceExceeded: z.boolean()
  })
  .strict();

export type OrchestrationAdvisory = z.infer<typeof OrchestrationAdvisorySchema>;

export const ListingDraftSchema = ListingContentSchema.extend({
  input: ProductInputSchema,
  confidence: z.number().finite().min(0).max(1),
  confidenceBreakdown: z.array(ConfidenceContributionSchema),
  fieldSources: z.record(ListingFieldSchema, FieldSourceSchema),
  notes: z.array(z.string()),
  advisories: z.array(OrchestrationAdvisorySchema),
  agentResults: z.array(AgentResultSchema)
}).strict();

export type ListingDraft = z.infer<typeof ListingDraftSchema>;

export const ListingStatusSchema = z.enum(['draft', 'published', 'archived']);

export type ListingStatus = z.infer<typeof ListingStatusSchema>;

export const ListingRecordSchema = ListingDraftSchema.extend({
  id: nonEmptyString,
  version: z.number().int().min(1),
  status: ListingStatusSchema,
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
  publishedAt: isoTimestamp.optional(),
  duplicatedFrom: nonEmptyString.optional()
}).strict();

export type ListingRecord = z.infer<typeof ListingRecordSchema>;

/** Editable slice of a listing: content fields plus lifecycle status. */
export const ListingPatchSchema = ListingContentSchema.partial()
  .extend({
    status: ListingStatusSchema.optional()
  })
  .strict();

export type ListingPatch = z.infer<typeof ListingPatchSchema>;

export const ListingVersionSchema = z
  .object({
    version: z.number().int().min(1),
    recordedAt: isoTimestamp,
    reason: nonEmptyString,
    snapshot: ListingRecordSchema
  })
  .strict();

export type ListingVersion = z.infer<typeof ListingVersionSchema>;

export const ListingFiltersSchema = z
  .object({
    status: ListingStatusSchema.optional(),
    category: ProductCategorySchema.optional(),
    search: z.string().trim().min(1).optional(),
    offset: z.number().int().min(0).default(0),
    limit: z.number().int().min(1).max(500).default(100)
  })
  .strict();

export type ListingFilters = z.input<typeof ListingFiltersSchema>;
