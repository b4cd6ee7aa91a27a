import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { PRODUCT_CATEGORIES, ProductCategorySchema, type ProductCategory } from '@listsmith/core';
import { z } from 'zod';

const CategoryTableSchema = z
  .object({
    keywords: z.array(z.string().min(1)),
    hashtags: z.array(z.string().startsWith('#')),
    priceBand: z.object({
      budgetBelow: z.number().nonnegative(),
      premiumAbove: z.number().nonnegative()
    }),
    imageCatalog: z.array(z.string().url())
  })
  .strict();

export type CategoryTable = z.infer<typeof CategoryTableSchema>;

export const FallbackTablesSchema = z
  .object({
    genericSearchTerms: z.array(z.string().min(1)),
    categories: z.record(ProductCategorySchema, CategoryTableSchema)
  })
  .strict()
  .refine((tables) => PRODUCT_CATEGORIES.every((category) => tables.categories[category] !== undefined), {
    message: 'Fallback tables must cover every product category'
  });

/**
 * Lookup data the rule-based generators draw on when the model is
 * unavailable. Injected into each agent so tests can substitute their own.
 */
export interface FallbackTables {
  readonly genericSearchTerms: readonly string[];
  category(category: ProductCategory): CategoryTable;
}

const EMPTY_TABLE: CategoryTable = {
  keywords: [],
  hashtags: [],
  priceBand: { budgetBelow: 0, premiumAbove: Number.MAX_SAFE_INTEGER },
  imageCatalog: []
};

export const createFallbackTables = (value: unknown): FallbackTables => {
  const parsed = FallbackTablesSchema.parse(value);
  return {
    genericSearchTerms: parsed.genericSearchTerms,
    category: (category) => parsed.categories[category] ?? EMPTY_TABLE
  };
};

const __dirname = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_FALLBACK_TABLES_PATH = resolve(__dirname, '../../data/fallback-tables.json');

export const loadFallbackTables = (path = DEFAULT_FALLBACK_TABLES_PATH): FallbackTables => {
  return createFallbackTables(JSON.parse(readFileSync(path, 'utf-8')));
};
