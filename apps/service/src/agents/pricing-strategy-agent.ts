import {
  PricingPayloadSchema,
  type PricePositioning,
  type PricingPayload,
  type ProductInput
} from '@listsmith/core';

import { ListingAgent } from './base-agent.js';
import { describeProduct } from './text.js';

const roundCurrency = (value: number): number => Math.round(value * 100) / 100;

export class PricingStrategyAgent extends ListingAgent<'pricing-strategy'> {
  readonly name = 'pricing-strategy' as const;
  readonly label = 'Pricing strategy';
  readonly fallbackConfidence = 0.4;
  protected readonly temperature = 0.5;
  protected readonly responseSchema = PricingPayloadSchema;
  protected readonly systemPrompt = [
    'You are a marketplace pricing strategist. Recommend a launch price and positioning for the product.',
    'positioning must be one of "budget", "mid-range" or "premium". Prices are plain numbers without currency symbols.',
    'Answer with JSON of this shape:',
    '{"recommendedPrice": number, "positioning": string, "competitorRange": {"low": number, "high": number}, "promotions": string[], "notes": string[], "confidenceScore": number}'
  ].join('\n');

  protected buildPrompt(input: ProductInput): string {
    return `Recommend a pricing strategy.\n\n${describeProduct(input)}`;
  }

  fallback(input: ProductInput): PricingPayload {
    const band = this.tables.category(input.category).priceBand;
    const positioning: PricePositioning =
      input.targetPrice < band.budgetBelow ? 'budget' : input.targetPrice > band.premiumAbove ? 'premium' : 'mid-range';

    return {
      recommendedPrice: roundCurrency(input.targetPrice),
      positioning,
      competitorRange: {
        low: roundCurrency(input.targetPrice * 0.8),
        high: roundCurrency(input.targetPrice * 1.2)
      },
      promotions: ['10% launch coupon for the first two weeks'],
      notes: [
        `Positioned as ${positioning} for ${input.category} at the target price`,
        ...(input.pricingNotes ? [input.pricingNotes] : [])
      ]
    };
  }
}
