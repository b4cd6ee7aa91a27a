import { z } from 'zod';

const nonEmptyString = z.string().trim().min(1, 'Value must not be empty');
const nonEmptyList = (label: string) =>
  z.array(nonEmptyString).min(1, { message: `${label} must contain at least one entry` });

export const AGENT_NAMES = [
  'product-analysis',
  'customer-research',
  'value-proposition',
  'technical-specs',
  'content',
  'description',
  'pricing-strategy',
  'seo',
  'social-content',
  'image-search',
  'listing-review'
] as const;

export const AgentNameSchema = z.enum(AGENT_NAMES);

export type AgentName = z.infer<typeof AgentNameSchema>;

export const ProductAnalysisPayloadSchema = z.object({
  title: nonEmptyString.max(200, 'Title must be 200 characters or fewer'),
  productType: nonEmptyString,
  keyFeatures: z.array(nonEmptyString)
});

export const CustomerResearchPayloadSchema = z.object({
  primaryPersona: nonEmptyString,
  painPoints: z.array(nonEmptyString),
  motivations: z.array(nonEmptyString),
  useSituations: z.array(nonEmptyString)
});

export const ValuePropositionPayloadSchema = z.object({
  headline: nonEmptyString,
  bulletPoints: nonEmptyList('bulletPoints').max(10)
});

export const TechnicalSpecsPayloadSchema = z.object({
  specifications: z.array(
    z.object({
      name: nonEmptyString,
      value: nonEmptyString
    })
  ),
  compatibility: z.array(nonEmptyString)
});

export const ContentPayloadSchema = z.object({
  items: nonEmptyList('items'),
  warranty: z.string().trim(),
  certifications: z.array(nonEmptyString)
});

export const DescriptionPayloadSchema = z.object({
  description: nonEmptyString
});

export const PRICE_POSITIONS = ['budget', 'mid-range', 'premium'] as const;

export const PricingPayloadSchema = z.object({
  recommendedPrice: z.number().finite().min(0),
  positioning: z.enum(PRICE_POSITIONS),
  competitorRange: z
    .object({
      low: z.number().finite().min(0),
      high: z.number().finite().min(0)
    })
    .refine((range) => range.high >= range.low, {
      message: 'competitorRange.high must not be lower than competitorRange.low'
    }),
  promotions: z.array(nonEmptyString),
  notes: z.array(nonEmptyString)
});

export const SeoPayloadSchema = z.object({
  searchTerms: nonEmptyList('searchTerms'),
  backendKeywords: z.array(nonEmptyString)
});

export const SocialContentPayloadSchema = z.object({
  hashtags: nonEmptyList('hashtags'),
  posts: z.array(
    z.object({
      platform: nonEmptyString,
      text: nonEmptyString
    })
  )
});

export const ImageSearchPayloadSchema = z.object({
  searchTerms: z.array(nonEmptyString),
  prompts: z.array(nonEmptyString),
  urls: z.array(z.string().url())
});

export const ListingReviewPayloadSchema = z.object({
  score: z.number().finite().min(0).max(10),
  strengths: z.array(nonEmptyString),
  recommendations: z.array(nonEmptyString)
});

export const AgentPayloadSchemas = {
  'product-analysis': ProductAnalysisPayloadSchema,
  'customer-research': CustomerResearchPayloadSchema,
  'value-proposition': ValuePropositionPayloadSchema,
  'technical-specs': TechnicalSpecsPayloadSchema,
  content: ContentPayloadSchema,
  description: DescriptionPayloadSchema,
  'pricing-strategy': PricingPayloadSchema,
  seo: SeoPayloadSchema,
  'social-content': SocialContentPayloadSchema,
  'image-search': ImageSearchPayloadSchema,
  'listing-review': ListingReviewPayloadSchema
} as const satisfies Record<AgentName, z.ZodTypeAny>;

export type ProductAnalysisPayload = z.infer<typeof ProductAnalysisPayloadSchema>;
export type CustomerResearchPayload = z.infer<typeof CustomerResearchPayloadSchema>;
export type ValuePropositionPayload = z.infer<typeof ValuePropositionPayloadSchema>;
export type TechnicalSpecsPayload = z.infer<typeof TechnicalSpecsPayloadSchema>;
export type ContentPayload = z.infer<typeof ContentPayloadSchema>;
export type DescriptionPayload = z.infer<typeof DescriptionPayloadSchema>;
export type PricePositioning = (typeof PRICE_POSITIONS)[number];
export type PricingPayload = z.infer<typeof PricingPayloadSchema>;
export type SeoPayload = z.infer<typeof SeoPayloadSchema>;
export type SocialContentPayload = z.infer<typeof SocialContentPayloadSchema>;
export type ImageSearchPayload = z.infer<typeof ImageSearchPayloadSchema>;
export type ListingReviewPayload = z.infer<typeof ListingReviewPayloadSchema>;

export type AgentPayloadMap = {
  [N in AgentName]: z.infer<(typeof AgentPayloadSchemas)[N]>;
};

export type AgentPayload<N extends AgentName = AgentName> = AgentPayloadMap[N];
