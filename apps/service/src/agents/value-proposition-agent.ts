import { ValuePropositionPayloadSchema, type ProductInput, type ValuePropositionPayload } from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct, uniqueTerms } from './text.js';

const MIN_BULLETS = 3;
const MAX_BULLETS = 5;

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

export class ValuePropositionAgent extends ListingAgent<'value-proposition'> {
  readonly name = 'value-proposition' as const;
  readonly label = 'Value proposition';
  readonly fallbackConfidence = 0.4;
  protected readonly temperature = 0.7;
  protected readonly responseSchema = ValuePropositionPayloadSchema;
  protected readonly systemPrompt = [
    'You are a conversion copywriter. Turn the product facts into benefit-led bullet points.',
    'Write between 3 and 5 bullets. Start each bullet with a short capitalised label followed by a colon.',
    'Answer with JSON of this shape:',
    '{"headline": string, "bulletPoints": string[], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    return `Write the value proposition and bullet points.\n\n${describeProduct(input)}`;
  }

  fallback(input: ProductInput): ValuePropositionPayload {
    const useCase = input.useCases[0];
    const candidates = uniqueTerms([
      input.valueProposition,
      ...input.competitiveAdvantages,
      ...input.features,
      useCase ? `Ideal for ${useCase.toLowerCase()}` : ''
    ]).map(capitalize);

    const padding = [
      `Thoughtfully designed ${input.productName} for everyday use`,
      `Backed by ${input.warrantyInfo || 'responsive seller support'}`,
      `A dependable choice in ${input.category}`
    ];

    const bulletPoints = [...candidates.slice(0, MAX_BULLETS)];
    for (const line of padding) {
      if (bulletPoints.length >= MIN_BULLETS) {
        break;
      }
      bulletPoints.push(line);
    }

    return {
      headline: input.valueProposition || `${input.productName}: ${input.features[0] ?? input.category}`,
      bulletPoints
    };
  }
}
