import { ContentPayloadSchema, type ContentPayload, type ProductInput } from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct, splitLines } from './text.js';

export class ContentAgent extends ListingAgent<'content'> {
  readonly name = 'content' as const;
  readonly label = 'Box contents and warranty';
  readonly fallbackConfidence = 0.5;
  protected readonly temperature = 0.4;
  protected readonly responseSchema = ContentPayloadSchema;
  protected readonly systemPrompt = [
    'You prepare the "what is in the box" section of a listing.',
    'List each included item separately, restate the warranty in one sentence, and list certifications.',
    'Answer with JSON of this shape:',
    '{"items": string[], "warranty": string, "certifications": string[], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    return `Describe the package contents.\n\n${describeProduct(input)}`;
  }

  fallback(input: ProductInput): ContentPayload {
    const items = splitLines(input.boxContents);
    return {
      items: items.length > 0 ? items : [input.productName],
      warranty: input.warrantyInfo,
      certifications: [...input.certifications]
    };
  }
}
