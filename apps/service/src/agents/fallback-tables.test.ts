import { PRODUCT_CATEGORIES } from '@listsmith/core';
import { describe, expect, it } from 'vitest';

import { createFallbackTables, loadFallbackTables } from './fallback-tables.js';

describe('fallback tables', () => {
  it('covers every product category in the bundled data', () => {
    const tables = loadFallbackTables();

    for (const category of PRODUCT_CATEGORIES) {
      expect(tables.category(category).keywords.length).toBeGreaterThan(0);
      expect(tables.category(category).hashtags.length).toBeGreaterThan(0);
    }
    expect(tables.category('Electronics').priceBand).toEqual({ budgetBelow: 40, premiumAbove: 250 });
  });

  it('rejects tables that miss a category', () => {
    expect(() =>
      createFallbackTables({
        genericSearchTerms: ['gift idea'],
        categories: {
          Electronics: {
            keywords: ['wireless'],
            hashtags: ['#Electronics'],
            priceBand: { budgetBelow: 40, premiumAbove: 250 },
            imageCatalog: []
          }
        }
      })
    ).toThrow('Fallback tables must cover every product category');
  });
});
