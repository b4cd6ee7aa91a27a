import { DescriptionPayloadSchema, type DescriptionPayload, type ProductInput } from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct } from './text.js';

export class DescriptionAgent extends ListingAgent<'description'> {
  readonly name = 'description' as const;
  readonly label = 'Product description';
  readonly fallbackConfidence = 0.35;
  protected readonly temperature = 0.7;
  protected readonly responseSchema = DescriptionPayloadSchema;
  protected readonly systemPrompt = [
    'You write long-form product descriptions for online marketplaces.',
    'Write three to five short paragraphs: an introduction, key benefits, usage situations, and what is included.',
    'Do not invent certifications, dimensions, or claims that are not in the input.',
    'Answer with JSON of this shape:',
    '{"description": string, "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    return `Write the product description.\n\n${describeProduct(input)}`;
  }

  fallback(input: ProductInput): DescriptionPayload {
    const intro = input.targetAudience
      ? `${input.productName} is built for ${input.targetAudience.toLowerCase()}.`
      : `${input.productName} is made for everyday ${input.category.toLowerCase()} use.`;

    const sections = [
      intro,
      input.valueProposition,
      input.features.length > 0 ? `Key features: ${input.features.join(', ')}.` : '',
      input.useCases.length > 0 ? `Ideal for: ${input.useCases.join(', ')}.` : '',
      input.boxContents ? `In the box: ${input.boxContents}.` : '',
      input.warrantyInfo ? `Warranty: ${input.warrantyInfo}.` : ''
    ];

    return { description: sections.filter((section) => section.length > 0).join('\n\n') };
  }
}
