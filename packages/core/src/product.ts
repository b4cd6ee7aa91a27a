import { z } from 'zod';

const nonEmptyString = z.string().trim().min(1, 'Value must not be empty');
const optionalText = z.string().trim().default('');
const textList = z.array(nonEmptyString).default([]);

export const PRODUCT_CATEGORIES = [
  'Electronics',
  'Home & Garden',
  'Clothing, Shoes & Jewelry',
  'Sports & Outdoors',
  'Health & Personal Care',
  'Automotive',
  'Toys & Games',
  'Books',
  'Other'
] as const;

export const ProductCategorySchema = z.enum(PRODUCT_CATEGORIES);

export type ProductCategory = z.infer<typeof ProductCategorySchema>;

/** Upper bound that keeps price arithmetic in cents within finite numbers. */
export const MAX_TARGET_PRICE = 1_000_000_000;

export const ProductVariantSchema = z
  .object({
    size: nonEmptyString.optional(),
    color: nonEmptyString.optional(),
    model: nonEmptyString.optional()
  })
  .strict();

export type ProductVariant = z.infer<typeof ProductVariantSchema>;

/**
 * Seller-provided description of the item to list. Optional text fields
 * normalise to empty strings and optional lists to empty arrays.
 */
export const ProductInputSchema = z
  .object({
    productName: nonEmptyString.max(200, 'Product name must be 200 characters or fewer'),
    category: ProductCategorySchema,
    features: textList,
    targetPrice: z
      .number({ required_error: 'targetPrice is required' })
      .finite()
      .min(0, { message: 'targetPrice cannot be negative' })
      .max(MAX_TARGET_PRICE, { message: `targetPrice cannot exceed ${MAX_TARGET_PRICE}` }),
    targetAudience: optionalText,
    valueProposition: optionalText,
    competitiveAdvantages: textList,
    useCases: textList,
    boxContents: optionalText,
    warrantyInfo: optionalText,
    keywordHints: textList,
    variants: z.array(ProductVariantSchema).default([]),
    certifications: textList,
    rawSpecifications: optionalText,
    pricingNotes: optionalText,
    availableAssets: z.array(z.string().url()).default([])
  })
  .strict();

export type ProductInput = z.infer<typeof ProductInputSchema>;
export type ProductInputDraft = z.input<typeof ProductInputSchema>;

/** Freezes a value and every object reachable from it. */
export const freezeDeep = <T>(value: T): T => {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      freezeDeep(nested);
    }
    Object.freeze(value);
  }
  return value;
};

/** Validates and freezes a product input so agents can share it without copying. */
export const parseProductInput = (value: unknown): ProductInput => {
  return freezeDeep(ProductInputSchema.parse(value));
};
