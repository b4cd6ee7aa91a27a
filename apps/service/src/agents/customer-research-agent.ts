import { CustomerResearchPayloadSchema, type CustomerResearchPayload, type ProductInput } from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct } from './text.js';

const lowerFirst = (value: string): string => value.charAt(0).toLowerCase() + value.slice(1);

export class CustomerResearchAgent extends ListingAgent<'customer-research'> {
  readonly name = 'customer-research' as const;
  readonly label = 'Customer research';
  readonly fallbackConfidence = 0.35;
  protected readonly temperature = 0.6;
  protected readonly responseSchema = CustomerResearchPayloadSchema;
  protected readonly systemPrompt = [
    'You are a consumer researcher. Describe who buys this product, what frustrates them, and why they buy.',
    'Answer with JSON of this shape:',
    '{"primaryPersona": string, "painPoints": string[], "motivations": string[], "useSituations": string[], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    return `Profile the target customer for this product.\n\n${describeProduct(input)}`;
  }

  fallback(input: ProductInput): CustomerResearchPayload {
    return {
      primaryPersona:
        input.targetAudience || `Shoppers looking for ${input.category.toLowerCase()} products like ${input.productName}`,
      painPoints: input.competitiveAdvantages.map((advantage) => `Alternatives lack ${lowerFirst(advantage)}`),
      motivations: input.features.slice(0, 3).map((feature) => `Wants ${lowerFirst(feature)}`),
      useSituations: input.useCases.length > 0 ? [...input.useCases] : ['Everyday use']
    };
  }
}
