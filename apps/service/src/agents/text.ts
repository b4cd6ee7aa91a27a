import type { ProductInput } from '@listsmith/core';

export const truncate = (text: string, max: number): string => {
  if (text.length <= max) {
    return text;
  }
  const cut = text.slice(0, max);
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > max / 2 ? cut.slice(0, lastSpace) : cut).trimEnd();
};

/** Case-insensitive de-duplication that keeps the first spelling. */
export const uniqueTerms = (values: Iterable<string>): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    const key = value.toLowerCase();
    if (value.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(value);
  }
  return result;
};

export const words = (text: string): string[] => {
  return text
    .toLowerCase()
    .split(/[^a-z0-9.+-]+/)
    .filter((word) => word.length > 1);
};

export const toHashtag = (text: string): string => {
  const body = text
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
  return `#${body}`;
};

export const splitLines = (text: string): string[] => {
  return text
    .split(/[\n,;]+/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
};

const list = (values: readonly string[]): string => (values.length > 0 ? values.join('; ') : 'not provided');
const text = (value: string): string => (value.length > 0 ? value : 'not provided');

/** Renders the product input as labelled lines for a prompt. */
export const describeProduct = (input: ProductInput): string => {
  const variants = input.variants
    .map((variant) => [variant.model, variant.size, variant.color].filter(Boolean).join(' / '))
    .filter((variant) => variant.length > 0);

  return [
    `Product name: ${input.productName}`,
    `Category: ${input.category}`,
    `Target price: ${input.targetPrice.toFixed(2)}`,
    `Features: ${list(input.features)}`,
    `Target audience: ${text(input.targetAudience)}`,
    `Value proposition: ${text(input.valueProposition)}`,
    `Competitive advantages: ${list(input.competitiveAdvantages)}`,
    `Use cases: ${list(input.useCases)}`,
    `Variants: ${list(variants)}`,
    `Box contents: ${text(input.boxContents)}`,
    `Warranty: ${text(input.warrantyInfo)}`,
    `Certifications: ${list(input.certifications)}`,
    `Specifications: ${text(input.rawSpecifications.replace(/\n/g, '; '))}`,
    `Pricing notes: ${text(input.pricingNotes)}`,
    `Keyword hints: ${list(input.keywordHints)}`
  ].join('\n');
};
