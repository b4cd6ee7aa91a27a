import {
  AGENT_NAMES,
  ListingReviewPayloadSchema,
  findResult,
  type AgentName,
  type ListingReviewPayload,
  type ProductInput
} from '@listsmith/core';
import type { AgentExecutionContext } from '@listsmith/core/agents';

import { ListingAgent } from './base-agent.js';
import { describeProduct } from './text.js';

const TITLE_MIN_LENGTH = 80;
const TARGET_BULLETS = 5;
const DESCRIPTION_MIN_LENGTH = 300;
const TARGET_SEARCH_TERMS = 5;

interface ReviewedListing {
  readonly title?: string;
  readonly bulletPoints?: readonly string[];
  readonly description?: string;
  readonly searchTerms?: readonly string[];
  readonly imageUrls?: readonly string[];
  readonly fallbackAgents: readonly AgentName[];
}

const collectListing = (context: AgentExecutionContext | undefined): ReviewedListing => {
  const prior = [...(context?.priorResults.values() ?? [])];

  return {
    title: findResult(prior, 'product-analysis')?.payload.title,
    bulletPoints: findResult(prior, 'value-proposition')?.payload.bulletPoints,
    description: findResult(prior, 'description')?.payload.description,
    searchTerms: findResult(prior, 'seo')?.payload.searchTerms,
    imageUrls: findResult(prior, 'image-search')?.payload.urls,
    fallbackAgents: prior.filter((result) => result.origin === 'fallback').map((result) => result.agent)
  };
};

/** Reviews the combined output of every other agent; never edits their fields. */
export class ListingReviewAgent extends ListingAgent<'listing-review'> {
  readonly name = 'listing-review' as const;
  readonly label = 'Listing review';
  readonly dependsOn: readonly AgentName[] = AGENT_NAMES.filter((name) => name !== 'listing-review');
  readonly fallbackConfidence = 0.4;
  protected readonly temperature = 0.3;
  protected readonly responseSchema = ListingReviewPayloadSchema;
  protected readonly systemPrompt = [
    'You are a senior marketplace listing reviewer. Score the draft listing from 0 to 10.',
    'List its strengths and concrete recommendations that would improve conversion or search ranking.',
    'Answer with JSON of this shape:',
    '{"score": number, "strengths": string[], "recommendations": string[], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput, context: AgentExecutionContext): string {
    const listing = collectListing(context);
    const lines = [
      `Title: ${listing.title ?? 'missing'}`,
      `Bullet points:\n${(listing.bulletPoints ?? []).map((bullet) => `- ${bullet}`).join('\n') || '- none'}`,
      `Description:\n${listing.description ?? 'missing'}`,
      `Search terms: ${(listing.searchTerms ?? []).join(', ') || 'none'}`,
      `Image URLs: ${listing.imageUrls?.length ?? 0}`,
      `Sections generated from templates: ${listing.fallbackAgents.join(', ') || 'none'}`
    ];
    return `Review this draft listing.\n\nProduct facts:\n${describeProduct(input)}\n\nDraft listing:\n${lines.join('\n')}`;
  }

  fallback(input: ProductInput, context?: AgentExecutionContext): ListingReviewPayload {
    const listing = collectListing(context);
    const strengths: string[] = [];
    const recommendations: string[] = [];

    const title = listing.title ?? '';
    if (title.length < TITLE_MIN_LENGTH) {
      recommendations.push(`Expand the title with key features (currently ${title.length} characters)`);
    } else {
      strengths.push('Title is descriptive');
    }

    const bulletCount = listing.bulletPoints?.length ?? 0;
    if (bulletCount < TARGET_BULLETS) {
      recommendations.push(`Add more bullet points (${bulletCount} of ${TARGET_BULLETS})`);
    } else {
      strengths.push('Bullet points cover the main benefits');
    }

    if ((listing.description ?? '').length < DESCRIPTION_MIN_LENGTH) {
      recommendations.push(`Lengthen the description to at least ${DESCRIPTION_MIN_LENGTH} characters`);
    } else {
      strengths.push('Description is detailed');
    }

    const termCount = listing.searchTerms?.length ?? 0;
    if (termCount < TARGET_SEARCH_TERMS) {
      recommendations.push(`Add more search terms (${termCount} of ${TARGET_SEARCH_TERMS})`);
    }

    if ((listing.imageUrls?.length ?? 0) === 0 && input.availableAssets.length === 0) {
      recommendations.push('Add product images');
    }

    for (const agent of listing.fallbackAgents) {
      recommendations.push(`Regenerate the ${agent} section once the model is available`);
    }

    return {
      score: Math.max(0, 10 - recommendations.length),
      strengths,
      recommendations
    };
  }
}
