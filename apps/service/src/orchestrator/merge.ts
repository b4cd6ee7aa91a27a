import {
  LISTING_FIELDS,
  findResult,
  type AgentName,
  type AgentResult,
  type FieldSource,
  type ListingContent,
  type ListingField
} from '@listsmith/core';

/** Every listing field has exactly one owning agent. */
export const FIELD_OWNERS = {
  title: 'product-analysis',
  description: 'description',
  bulletPoints: 'value-proposition',
  searchTerms: 'seo',
  backendKeywords: 'seo',
  pricing: 'pricing-strategy',
  images: 'image-search',
  customerProfile: 'customer-research',
  technicalSpecs: 'technical-specs',
  boxContents: 'content',
  socialContent: 'social-content',
  recommendations: 'listing-review',
  reviewScore: 'listing-review'
} as const satisfies Record<ListingField, AgentName>;

export interface MergedListing {
  readonly content: ListingContent;
  readonly fieldSources: Partial<Record<ListingField, FieldSource>>;
}

const requireResult = <K extends AgentName>(
  results: readonly AgentResult[],
  name: K
): Extract<AgentResult, { agent: K }> => {
  const result = findResult(results, name);
  if (!result) {
    throw new Error(`No result recorded for agent ${name}.`);
  }
  return result;
};

export const fieldsOwnedBy = (agent: AgentName): ListingField[] => {
  return LISTING_FIELDS.filter((field) => FIELD_OWNERS[field] === agent);
};

/** Audit-trail lines for a set of results, in the order given. */
export const formatAgentNotes = (results: readonly AgentResult[]): string[] => {
  return results.flatMap((result) =>
    result.notes.filter((note) => note.trim().length > 0).map((note) => `[${result.agent}] ${note}`)
  );
};

const copyField = <F extends ListingField>(target: Partial<ListingContent>, source: ListingContent, field: F): void => {
  target[field] = source[field];
};

/** The fields `agent` owns in `listing`, with their field sources. */
export const pickOwnedFields = (
  agent: AgentName,
  listing: ListingContent & { readonly fieldSources: Partial<Record<ListingField, FieldSource>> }
): { readonly content: Partial<ListingContent>; readonly fieldSources: Partial<Record<ListingField, FieldSource>> } => {
  const content: Partial<ListingContent> = {};
  const fieldSources: Partial<Record<ListingField, FieldSource>> = {};
  for (const field of fieldsOwnedBy(agent)) {
    copyField(content, listing, field);
    fieldSources[field] = listing.fieldSources[field];
  }
  return { content, fieldSources };
};

/**
 * Copies each owner's payload into its fields; nothing is arbitrated between
 * agents. Nested payload objects are cloned, never shared with the results.
 */
export const mergeAgentResults = (results: readonly AgentResult[]): MergedListing => {
  const analysis = requireResult(results, 'product-analysis');
  const customer = requireResult(results, 'customer-research');
  const value = requireResult(results, 'value-proposition');
  const specs = requireResult(results, 'technical-specs');
  const box = requireResult(results, 'content');
  const description = requireResult(results, 'description');
  const pricing = requireResult(results, 'pricing-strategy');
  const seo = requireResult(results, 'seo');
  const social = requireResult(results, 'social-content');
  const images = requireResult(results, 'image-search');
  const review = requireResult(results, 'listing-review');

  const content: ListingContent = {
    title: analysis.payload.title,
    description: description.payload.description,
    bulletPoints: [...value.payload.bulletPoints],
    searchTerms: [...seo.payload.searchTerms],
    backendKeywords: [...seo.payload.backendKeywords],
    pricing: structuredClone(pricing.payload),
    images: structuredClone(images.payload),
    customerProfile: structuredClone(customer.payload),
    technicalSpecs: structuredClone(specs.payload),
    boxContents: structuredClone(box.payload),
    socialContent: structuredClone(social.payload),
    recommendations: [...review.payload.recommendations],
    reviewScore: review.payload.score
  };

  const fieldSources: Partial<Record<ListingField, FieldSource>> = {};
  for (const field of LISTING_FIELDS) {
    const agent = FIELD_OWNERS[field];
    fieldSources[field] = { agent, origin: requireResult(results, agent).origin };
  }

  return { content, fieldSources };
};
