import type { ListingDraft, ListingFilters, ListingRecord, ListingVersion } from '@listsmith/core';

/** Fields a caller may replace on update; identity and version stay with the store. */
export type ListingUpdate = Partial<
  Omit<ListingRecord, 'id' | 'version' | 'createdAt' | 'updatedAt' | 'duplicatedFrom'>
>;

export interface UpdateListingOptions {
  readonly reason?: string;
}

export interface DuplicateListingOptions {
  readonly productName?: string;
}

export interface ListingPage {
  readonly items: readonly ListingRecord[];
  readonly total: number;
}

export interface ListingStore {
  create(draft: ListingDraft): Promise<ListingRecord>;
  get(id: string): Promise<ListingRecord | undefined>;
  update(id: string, update: ListingUpdate, options?: UpdateListingOptions): Promise<ListingRecord>;
  delete(id: string): Promise<boolean>;
  list(filters?: ListingFilters): Promise<ListingPage>;
  duplicate(id: string, options?: DuplicateListingOptions): Promise<ListingRecord>;
  history(id: string): Promise<readonly ListingVersion[]>;
}

export interface ListingStoreOptions {
  readonly now?: () => Date;
  readonly generateId?: () => string;
}
