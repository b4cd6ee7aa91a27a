import { TechnicalSpecsPayloadSchema, type ProductInput, type TechnicalSpecsPayload } from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct } from './text.js';

export class TechnicalSpecsAgent extends ListingAgent<'technical-specs'> {
  readonly name = 'technical-specs' as const;
  readonly label = 'Technical specifications';
  readonly fallbackConfidence = 0.5;
  protected readonly temperature = 0.2;
  protected readonly responseSchema = TechnicalSpecsPayloadSchema;
  protected readonly systemPrompt = [
    'You are a technical writer. Normalise the product specifications into name/value pairs.',
    'Only use facts present in the input. List compatible platforms or accessories when they are stated.',
    'Answer with JSON of this shape:',
    '{"specifications": [{"name": string, "value": string}], "compatibility": string[], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    return `Extract the technical specifications.\n\n${describeProduct(input)}`;
  }

  fallback(input: ProductInput): TechnicalSpecsPayload {
    const fromRaw = input.rawSpecifications
      .split('\n')
      .map((line) => line.split(':'))
      .filter((parts) => parts.length >= 2)
      .map(([name = '', ...rest]) => ({ name: name.trim(), value: rest.join(':').trim() }))
      .filter((spec) => spec.name.length > 0 && spec.value.length > 0);

    const fromFeatures = input.features.map((feature) => ({ name: 'Feature', value: feature }));

    return {
      specifications: [...fromRaw, ...fromFeatures],
      compatibility: []
    };
  }
}
