import { SocialContentPayloadSchema, type ProductInput, type SocialContentPayload } from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct, toHashtag, uniqueTerms } from './text.js';

export class SocialContentAgent extends ListingAgent<'social-content'> {
  readonly name = 'social-content' as const;
  readonly label = 'Social content';
  readonly fallbackConfidence = 0.3;
  protected readonly temperature = 0.8;
  protected readonly responseSchema = SocialContentPayloadSchema;
  protected readonly systemPrompt = [
    'You are a social media marketer launching a product.',
    'Write hashtags and one short post per platform (instagram, facebook, x).',
    'Answer with JSON of this shape:',
    '{"hashtags": string[], "posts": [{"platform": string, "text": string}], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    return `Create launch social content.\n\n${describeProduct(input)}`;
  }

  fallback(input: ProductInput): SocialContentPayload {
    const hashtags = uniqueTerms([
      toHashtag(input.productName),
      ...this.tables.category(input.category).hashtags,
      ...input.features.slice(0, 2).map(toHashtag)
    ]).filter((tag) => tag.length > 1);

    const pitch = input.valueProposition || input.features.join(', ') || input.category;

    return {
      hashtags,
      posts: [
        { platform: 'instagram', text: `Meet ${input.productName}. ${pitch} ${hashtags.slice(0, 3).join(' ')}`.trim() },
        { platform: 'facebook', text: `${input.productName} is here: ${pitch}.` }
      ]
    };
  }
}
