import type { ListingField, ListingRecord } from '@listsmith/core';
import type { ListingUpdate } from '@listsmith/listing-store';
import { parseStructuredResponse, type TextGenerationClient } from '@listsmith/model-client';
import { z } from 'zod';

import { truncate, uniqueTerms } from '../agents/text.js';
import type { Logger } from '../logger.js';

export const RecommendationRequestSchema = z
  .object({
    text: z.string().trim().min(1, 'Recommendation text must not be empty'),
    agent: z.string().trim().min(1).optional()
  })
  .strict();

export type RecommendationRequest = z.infer<typeof RecommendationRequestSchema>;

const nonEmptyText = z.string().trim().min(1);

const RecommendationProposalSchema = z.object({
  changesNeeded: z.boolean(),
  updatedFields: z
    .object({
      title: nonEmptyText.nullish(),
      description: nonEmptyText.nullish(),
      recommendedPrice: z.number().finite().nonnegative().nullish(),
      bulletPoints: z.array(nonEmptyText).min(1).nullish(),
      backendKeywords: z.array(nonEmptyText).min(1).nullish()
    })
    .default({}),
  explanation: z.string().default('')
});

type RecommendationProposal = z.infer<typeof RecommendationProposalSchema>;

export type RecommendationOrigin = 'model' | 'fallback';

export interface RecommendationChanges {
  readonly origin: RecommendationOrigin;
  readonly update: ListingUpdate;
  readonly changedFields: readonly ListingField[];
  readonly explanation: string;
}

const TITLE_MAX_LENGTH = 200;
const BACKEND_KEYWORD_LIMIT = 25;
const SUGGESTED_KEYWORDS = ['premium', 'quality'];
const PRICE_ADJUSTMENT = 1.05;

const SYSTEM_PROMPT = [
  'You are a marketplace listing optimiser. Decide which listing fields must change to apply a reviewer recommendation.',
  'Only change fields the recommendation is about. Leave a field null when it should stay as it is.',
  'Answer with JSON of this shape:',
  '{"changesNeeded": boolean, "updatedFields": {"title": string | null, "description": string | null, "recommendedPrice": number | null, "bulletPoints": string[] | null, "backendKeywords": string[] | null}, "explanation": string}'
].join('\n');

const buildPrompt = (listing: ListingRecord, request: RecommendationRequest): string => {
  return [
    `Recommendation${request.agent ? ` from ${request.agent}` : ''}: ${request.text}`,
    '',
    'Current listing:',
    `Title: ${listing.title}`,
    `Description: ${truncate(listing.description, 500)}`,
    `Recommended price: ${listing.pricing.recommendedPrice.toFixed(2)}`,
    `Bullet points:\n${listing.bulletPoints.map((bullet) => `- ${bullet}`).join('\n') || '- none'}`,
    `Backend keywords: ${listing.backendKeywords.join(', ') || 'none'}`,
    `Product: ${listing.input.productName}`,
    `Category: ${listing.input.category}`
  ].join('\n');
};

const EDITABLE_FIELDS = [
  'title',
  'description',
  'bulletPoints',
  'backendKeywords',
  'pricing'
] as const satisfies readonly ListingField[];

const changedFieldsOf = (update: ListingUpdate): ListingField[] => {
  return EDITABLE_FIELDS.filter((field) => update[field] !== undefined);
};

const toChanges = (listing: ListingRecord, proposal: RecommendationProposal): RecommendationChanges => {
  if (!proposal.changesNeeded) {
    return { origin: 'model', update: {}, changedFields: [], explanation: proposal.explanation };
  }

  const fields = proposal.updatedFields;
  const update: ListingUpdate = {
    ...(fields.title ? { title: truncate(fields.title, TITLE_MAX_LENGTH) } : {}),
    ...(fields.description ? { description: fields.description } : {}),
    ...(fields.bulletPoints ? { bulletPoints: fields.bulletPoints } : {}),
    ...(fields.backendKeywords ? { backendKeywords: uniqueTerms(fields.backendKeywords) } : {}),
    ...(typeof fields.recommendedPrice === 'number'
      ? { pricing: { ...listing.pricing, recommendedPrice: fields.recommendedPrice } }
      : {})
  };

  return { origin: 'model', update, changedFields: changedFieldsOf(update), explanation: proposal.explanation };
};

/**
 * Keyword rules used when the model cannot propose changes. Only the first
 * matching rule applies.
 */
export const applyRecommendationRules = (listing: ListingRecord, text: string): RecommendationChanges => {
  const lower = text.toLowerCase();
  const noChange = (explanation: string): RecommendationChanges => ({
    origin: 'fallback',
    update: {},
    changedFields: [],
    explanation
  });

  if (lower.includes('title')) {
    const feature = listing.input.features.find((candidate) => !listing.title.toLowerCase().includes(candidate.toLowerCase()));
    if (!feature) {
      return noChange('Title already names every listed feature');
    }
    const update: ListingUpdate = { title: truncate(`${listing.title} - ${feature}`, TITLE_MAX_LENGTH) };
    return { origin: 'fallback', update, changedFields: ['title'], explanation: `Added "${feature}" to the title` };
  }

  if (lower.includes('price') && (lower.includes('adjust') || lower.includes('competitive'))) {
    const current = listing.pricing.recommendedPrice;
    if (current <= 0) {
      return noChange('No recommended price to adjust');
    }
    const recommendedPrice = Math.round(current * PRICE_ADJUSTMENT * 100) / 100;
    return {
      origin: 'fallback',
      update: { pricing: { ...listing.pricing, recommendedPrice } },
      changedFields: ['pricing'],
      explanation: `Adjusted the recommended price from ${current.toFixed(2)} to ${recommendedPrice.toFixed(2)}`
    };
  }

  if (lower.includes('keyword') || lower.includes('seo') || lower.includes('search term')) {
    const backendKeywords = uniqueTerms([...listing.backendKeywords, ...SUGGESTED_KEYWORDS]).slice(0, BACKEND_KEYWORD_LIMIT);
    if (backendKeywords.length === listing.backendKeywords.length) {
      return noChange('Suggested keywords are already present');
    }
    return {
      origin: 'fallback',
      update: { backendKeywords },
      changedFields: ['backendKeywords'],
      explanation: `Added backend keywords: ${backendKeywords.slice(listing.backendKeywords.length).join(', ')}`
    };
  }

  if (lower.includes('description')) {
    const highlights = listing.bulletPoints.slice(0, 3);
    if (highlights.length === 0) {
      return noChange('No bullet points to expand the description with');
    }
    const update: ListingUpdate = { description: `${listing.description}\n\nHighlights: ${highlights.join('; ')}.` };
    return {
      origin: 'fallback',
      update,
      changedFields: ['description'],
      explanation: 'Appended the leading bullet points to the description'
    };
  }

  return noChange('No automatic change matches this recommendation');
};

export interface ProposeRecommendationChangesOptions {
  readonly client: TextGenerationClient;
  readonly logger: Logger;
  readonly timeoutMs?: number;
}

/** Asks the model for field changes, falling back to the keyword rules. */
export const proposeRecommendationChanges = async (
  listing: ListingRecord,
  request: RecommendationRequest,
  options: ProposeRecommendationChangesOptions
): Promise<RecommendationChanges> => {
  const outcome = await options.client.generate(buildPrompt(listing, request), {
    system: SYSTEM_PROMPT,
    temperature: 0.2,
    structured: true,
    timeoutMs: options.timeoutMs,
    label: 'recommendation'
  });

  if (!outcome.ok) {
    options.logger.warn({ reason: outcome.error.message }, 'recommendation model call failed, using rules');
    return applyRecommendationRules(listing, request.text);
  }

  const parsed = parseStructuredResponse(outcome.text, RecommendationProposalSchema);
  if (!parsed.success) {
    options.logger.warn(
      { reason: parsed.error.message, rawExcerpt: parsed.error.rawExcerpt },
      'recommendation proposal could not be parsed, using rules'
    );
    return applyRecommendationRules(listing, request.text);
  }

  return toChanges(listing, parsed.data);
};
