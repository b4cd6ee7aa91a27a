import { SeoPayloadSchema, type ProductInput, type SeoPayload } from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct, uniqueTerms, words } from './text.js';

const MAX_SEARCH_TERMS = 15;
const MAX_BACKEND_KEYWORDS = 25;

export class SeoAgent extends ListingAgent<'seo'> {
  readonly name = 'seo' as const;
  readonly label = 'Search keywords';
  readonly fallbackConfidence = 0.45;
  protected readonly temperature = 0.4;
  protected readonly responseSchema = SeoPayloadSchema;
  protected readonly systemPrompt = [
    'You are a marketplace search specialist. Produce the phrases shoppers type to find this product.',
    'searchTerms are customer-facing phrases; backendKeywords are hidden single words or short phrases that do not repeat the searchTerms.',
    'Answer with JSON of this shape:',
    '{"searchTerms": string[], "backendKeywords": string[], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    return `Generate search keywords.\n\n${describeProduct(input)}`;
  }

  fallback(input: ProductInput): SeoPayload {
    const categoryKeywords = this.tables.category(input.category).keywords;

    const searchTerms = uniqueTerms([
      input.productName.toLowerCase(),
      ...input.keywordHints.map((hint) => hint.toLowerCase()),
      ...input.features.map((feature) => feature.toLowerCase()),
      ...categoryKeywords.slice(0, 3)
    ]).slice(0, MAX_SEARCH_TERMS);

    const taken = new Set(searchTerms.map((term) => term.toLowerCase()));
    const backendKeywords = uniqueTerms([
      ...words(input.productName),
      ...words(input.category),
      ...categoryKeywords.slice(3),
      ...this.tables.genericSearchTerms
    ])
      .filter((keyword) => !taken.has(keyword.toLowerCase()))
      .slice(0, MAX_BACKEND_KEYWORDS);

    return { searchTerms, backendKeywords };
  }
}
