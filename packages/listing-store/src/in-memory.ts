import { randomUUID } from 'node:crypto';

import type { ListingDraft, ListingFilters, ListingRecord, ListingVersion } from '@listsmith/core';

import { ListingNotFoundError } from './errors.js';
import { applyUpdate, createEntry, duplicateEntry, selectPage, type ListingEntry } from './records.js';
import type {
  DuplicateListingOptions,
  ListingPage,
  ListingStore,
  ListingStoreOptions,
  ListingUpdate,
  UpdateListingOptions
} from './types.js';

/** Process-local store. Records are cloned on the way in and out. */
export class InMemoryListingStore implements ListingStore {
  private readonly entries = new Map<string, ListingEntry>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: ListingStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async create(draft: ListingDraft): Promise<ListingRecord> {
    const entry = createEntry(structuredClone(draft), this.generateId(), this.now());
    this.entries.set(entry.record.id, entry);
    return structuredClone(entry.record);
  }

  async get(id: string): Promise<ListingRecord | undefined> {
    const entry = this.entries.get(id);
    return entry ? structuredClone(entry.record) : undefined;
  }

  async update(id: string, update: ListingUpdate, options: UpdateListingOptions = {}): Promise<ListingRecord> {
    const next = applyUpdate(this.require(id), structuredClone(update), options.reason ?? 'updated', this.now());
    this.entries.set(id, next);
    return structuredClone(next.record);
  }

  async delete(id: string): Promise<boolean> {
    return this.entries.delete(id);
  }

  async list(filters: ListingFilters = {}): Promise<ListingPage> {
    const page = selectPage(
      [...this.entries.values()].map((entry) => entry.record),
      filters
    );
    return { items: structuredClone(page.items), total: page.total };
  }

  async duplicate(id: string, options: DuplicateListingOptions = {}): Promise<ListingRecord> {
    const entry = duplicateEntry(this.require(id).record, this.generateId(), this.now(), options.productName);
    this.entries.set(entry.record.id, entry);
    return structuredClone(entry.record);
  }

  async history(id: string): Promise<readonly ListingVersion[]> {
    return structuredClone(this.require(id).history);
  }

  private require(id: string): ListingEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new ListingNotFoundError(id);
    }
    return entry;
  }
}
