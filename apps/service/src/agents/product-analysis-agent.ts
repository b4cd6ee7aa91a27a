import { ProductAnalysisPayloadSchema, type ProductAnalysisPayload, type ProductInput } from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct, truncate, uniqueTerms } from './text.js';

export const TITLE_MAX_LENGTH = 200;

export class ProductAnalysisAgent extends ListingAgent<'product-analysis'> {
  readonly name = 'product-analysis' as const;
  readonly label = 'Product analysis';
  readonly fallbackConfidence = 0.45;
  protected readonly temperature = 0.3;
  protected readonly responseSchema = ProductAnalysisPayloadSchema;
  protected readonly systemPrompt = [
    'You are a marketplace catalog analyst. Study the product and write its listing title.',
    'The title must start with the product name, name the most important features, and stay under 200 characters.',
    'Answer with JSON of this shape:',
    '{"title": string, "productType": string, "keyFeatures": string[], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    return `Analyse this product and propose a title.\n\n${describeProduct(input)}`;
  }

  fallback(input: ProductInput): ProductAnalysisPayload {
    const highlights = uniqueTerms([...input.competitiveAdvantages, ...input.features]).slice(0, 2);
    const model = input.variants.find((variant) => variant.model)?.model;
    const name = model && !input.productName.includes(model) ? `${input.productName} ${model}` : input.productName;
    const title = highlights.length > 0 ? `${name} - ${highlights.join(', ')}` : name;

    return {
      title: truncate(title, TITLE_MAX_LENGTH),
      productType: input.category,
      keyFeatures: input.features.slice(0, 5)
    };
  }
}
