import {
  ListingFiltersSchema,
  ListingRecordSchema,
  type ListingDraft,
  type ListingFilters,
  type ListingRecord,
  type ListingVersion
} from '@listsmith/core';

import type { ListingPage, ListingUpdate } from './types.js';

export interface ListingEntry {
  readonly record: ListingRecord;
  readonly history: readonly ListingVersion[];
}

const snapshot = (record: ListingRecord, reason: string, at: Date): ListingVersion => ({
  version: record.version,
  recordedAt: at.toISOString(),
  reason,
  snapshot: record
});

export const createEntry = (draft: ListingDraft, id: string, at: Date): ListingEntry => {
  const timestamp = at.toISOString();
  const record = ListingRecordSchema.parse({
    ...draft,
    id,
    version: 1,
    status: 'draft',
    createdAt: timestamp,
    updatedAt: timestamp
  });
  return { record, history: [snapshot(record, 'created', at)] };
};

export const applyUpdate = (
  entry: ListingEntry,
  update: ListingUpdate,
  reason: string,
  at: Date
): ListingEntry => {
  const current = entry.record;
  const publishedAt =
    update.status === 'published' && current.status !== 'published' ? at.toISOString() : current.publishedAt;

  const record = ListingRecordSchema.parse({
    ...current,
    ...update,
    publishedAt: update.publishedAt ?? publishedAt,
    id: current.id,
    version: current.version + 1,
    createdAt: current.createdAt,
    updatedAt: at.toISOString(),
    duplicatedFrom: current.duplicatedFrom
  });

  return { record, history: [...entry.history, snapshot(record, reason, at)] };
};

const replaceAll = (text: string, search: string, replacement: string): string => {
  return search.length === 0 ? text : text.split(search).join(replacement);
};

export const duplicateEntry = (
  source: ListingRecord,
  id: string,
  at: Date,
  productName?: string
): ListingEntry => {
  const previousName = source.input.productName;
  const nextName = productName?.trim() || previousName;
  const timestamp = at.toISOString();

  const record = ListingRecordSchema.parse({
    ...source,
    input: { ...source.input, productName: nextName },
    title: replaceAll(source.title, previousName, nextName),
    description: replaceAll(source.description, previousName, nextName),
    id,
    version: 1,
    status: 'draft',
    createdAt: timestamp,
    updatedAt: timestamp,
    publishedAt: undefined,
    duplicatedFrom: source.id
  });

  return { record, history: [snapshot(record, `duplicated from ${source.id}`, at)] };
};

const matchesSearch = (record: ListingRecord, search: string): boolean => {
  const needle = search.toLowerCase();
  return [record.title, record.description, record.input.productName].some((value) =>
    value.toLowerCase().includes(needle)
  );
};

/** Filters, orders newest first, and pages a set of records. */
export const selectPage = (records: readonly ListingRecord[], filters: ListingFilters = {}): ListingPage => {
  const { status, category, search, offset, limit } = ListingFiltersSchema.parse(filters);

  const matching = records
    .filter((record) => !status || record.status === status)
    .filter((record) => !category || record.input.category === category)
    .filter((record) => !search || matchesSearch(record, search))
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || a.id.localeCompare(b.id));

  return { items: matching.slice(offset, offset + limit), total: matching.length };
};
