import { ImageSearchPayloadSchema, type ImageSearchPayload, type ProductInput } from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct } from './text.js';

export class ImageSearchAgent extends ListingAgent<'image-search'> {
  readonly name = 'image-search' as const;
  readonly label = 'Image search';
  readonly fallbackConfidence = 0.3;
  protected readonly temperature = 0.5;
  protected readonly responseSchema = ImageSearchPayloadSchema;
  protected readonly systemPrompt = [
    'You plan product imagery for a marketplace listing.',
    'Give stock-photo search terms, image generation prompts, and any image URLs from the input assets that fit the listing.',
    'Answer with JSON of this shape:',
    '{"searchTerms": string[], "prompts": string[], "urls": string[], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    const assets = input.availableAssets.length > 0 ? input.availableAssets.join('\n') : 'none';
    return `Plan the listing images.\n\n${describeProduct(input)}\nAvailable assets:\n${assets}`;
  }

  fallback(input: ProductInput): ImageSearchPayload {
    const category = input.category.toLowerCase();
    const useCase = input.useCases[0];

    return {
      searchTerms: [`${input.productName} product photo`, `${input.productName} ${category}`],
      prompts: [
        `Studio product photo of ${input.productName} on a plain white background`,
        useCase
          ? `Lifestyle photo of ${input.productName} during ${useCase.toLowerCase()}`
          : `Lifestyle photo of ${input.productName} in everyday use`
      ],
      urls:
        input.availableAssets.length > 0
          ? [...input.availableAssets]
          : [...this.tables.category(input.category).imageCatalog]
    };
  }
}
