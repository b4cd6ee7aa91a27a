import { describe, expect, it } from 'vitest';

import { AgentResultSchema, LISTING_FIELDS, ListingFiltersSchema, ListingPatchSchema } from './listing.js';
import { PricingPayloadSchema } from './payloads.js';

describe('AgentResultSchema', () => {
  it('narrows the payload shape by agent name', () => {
    const valid = AgentResultSchema.safeParse({
      agent: 'seo',
      status: 'success',
      origin: 'model',
      payload: { searchTerms: ['smartwatch'], backendKeywords: [] },
      confidence: 0.8,
      startedAt: 10,
      completedAt: 25,
      durationMs: 15,
      notes: []
    });
    const mismatched = AgentResultSchema.safeParse({
      agent: 'seo',
      status: 'success',
      origin: 'model',
      payload: { title: 'Smartwatch' },
      confidence: 0.8,
      startedAt: 10,
      completedAt: 25,
      durationMs: 15,
      notes: []
    });

    expect(valid.success).toBe(true);
    expect(mismatched.success).toBe(false);
  });

  it('rejects confidence outside the unit interval', () => {
    const result = AgentResultSchema.safeParse({
      agent: 'description',
      status: 'success',
      origin: 'model',
      payload: { description: 'A watch.' },
      confidence: 1.4,
      startedAt: 0,
      completedAt: 0,
      durationMs: 0,
      notes: []
    });

    expect(result.success).toBe(false);
  });
});

describe('PricingPayloadSchema', () => {
  it('requires the competitor range to be ordered', () => {
    const result = PricingPayloadSchema.safeParse({
      recommendedPrice: 199.99,
      positioning: 'premium',
      competitorRange: { low: 250, high: 150 },
      promotions: [],
      notes: []
    });

    expect(result.success).toBe(false);
  });
});

describe('ListingPatchSchema', () => {
  it('accepts partial content edits and rejects provenance fields', () => {
    expect(ListingPatchSchema.safeParse({ title: 'New title', status: 'published' }).success).toBe(true);
    expect(ListingPatchSchema.safeParse({ confidence: 1 }).success).toBe(false);
  });
});

describe('ListingFiltersSchema', () => {
  it('applies paging defaults', () => {
    expect(ListingFiltersSchema.parse({ status: 'draft' })).toEqual({ status: 'draft', offset: 0, limit: 100 });
  });
});

describe('LISTING_FIELDS', () => {
  it('lists every content field', () => {
    expect(LISTING_FIELDS).toEqual([
      'title',
      'description',
      'bulletPoints',
      'searchTerms',
      'backendKeywords',
      'pricing',
      'images',
      'customerProfile',
      'technicalSpecs',
      'boxContents',
      'socialContent',
      'recommendations',
      'reviewScore'
    ]);
  });
});
