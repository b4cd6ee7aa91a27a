import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadListingDraftFixture } from '@listsmith/fixtures';

import { ListingNotFoundError, ListingStoreError } from './errors.js';
import { InMemoryListingStore } from './in-memory.js';
import { LocalFileSystemListingStore } from './local-file-system.js';
import type { ListingStore, ListingStoreOptions } from './types.js';

const createClock = () => {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, tick++));
};

const createIds = () => {
  let counter = 0;
  return () => `listing-${++counter}`;
};

const contentOf = (record: Awaited<ReturnType<ListingStore['create']>>) => {
  const { id: _id, version: _version, createdAt: _createdAt, updatedAt: _updatedAt, ...content } = record;
  return content;
};

const suites: readonly [string, (directory: string, options: ListingStoreOptions) => ListingStore][] = [
  ['LocalFileSystemListingStore', (directory, options) => new LocalFileSystemListingStore({ directory, ...options })],
  ['InMemoryListingStore', (_directory, options) => new InMemoryListingStore(options)]
];

describe.each(suites)('%s', (_name, createStore) => {
  let directory: string;
  let store: ListingStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'listing-store-'));
    store = createStore(directory, { now: createClock(), generateId: createIds() });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('creates draft records at version 1 with a history entry', async () => {
    const created = await store.create(loadListingDraftFixture('smartwatch-pro-x1'));

    expect(created.id).toBe('listing-1');
    expect(created.version).toBe(1);
    expect(created.status).toBe('draft');
    expect(created.createdAt).toBe('2024-01-01T00:00:00.000Z');
    expect(await store.get('listing-1')).toEqual(created);

    const history = await store.history('listing-1');
    expect(history.map((entry) => [entry.version, entry.reason])).toEqual([[1, 'created']]);
  });

  it('round-trips updates with the version incremented by one', async () => {
    const created = await store.create(loadListingDraftFixture('smartwatch-pro-x1'));

    const updated = await store.update(
      created.id,
      { title: created.title, bulletPoints: created.bulletPoints, pricing: created.pricing },
      { reason: 'manual edit' }
    );
    const fetched = await store.get(created.id);

    expect(fetched?.version).toBe(created.version + 1);
    expect(fetched && contentOf(fetched)).toEqual(contentOf(created));
    expect(updated.updatedAt).toBe('2024-01-01T00:01:00.000Z');

    const history = await store.history(created.id);
    expect(history.map((entry) => [entry.version, entry.reason])).toEqual([
      [1, 'created'],
      [2, 'manual edit']
    ]);
  });

  it('stamps publishedAt when a listing is first published', async () => {
    const created = await store.create(loadListingDraftFixture('smartwatch-pro-x1'));

    const published = await store.update(created.id, { status: 'published' }, { reason: 'published' });

    expect(published.status).toBe('published');
    expect(published.publishedAt).toBe('2024-01-01T00:01:00.000Z');
  });

  it('duplicates into independent records starting at version 1', async () => {
    const source = await store.create(loadListingDraftFixture('smartwatch-pro-x1'));
    await store.update(source.id, { title: 'Edited title' });

    const first = await store.duplicate(source.id);
    const second = await store.duplicate(source.id);

    expect(new Set([source.id, first.id, second.id]).size).toBe(3);
    expect(first.version).toBe(1);
    expect(second.version).toBe(1);
    expect(first.title).toBe('Edited title');
    expect(second.title).toBe(first.title);
    expect(first.bulletPoints).toEqual(second.bulletPoints);
    expect(first.duplicatedFrom).toBe(source.id);

    await store.update(first.id, { title: 'Only the first copy' });
    expect((await store.get(second.id))?.version).toBe(1);
  });

  it('replaces the product name when duplicating under a new name', async () => {
    const source = await store.create(loadListingDraftFixture('smartwatch-pro-x1'));

    const copy = await store.duplicate(source.id, { productName: 'Smartwatch Pro X2' });

    expect(copy.input.productName).toBe('Smartwatch Pro X2');
    expect(copy.title).toBe('Smartwatch Pro X2 GPS Fitness Smartwatch with 7-Day Battery Life');
  });

  it('filters and pages listings', async () => {
    const draft = loadListingDraftFixture('smartwatch-pro-x1');
    const first = await store.create(draft);
    await store.create(draft);
    await store.update(first.id, { status: 'archived' });

    const archived = await store.list({ status: 'archived' });
    const drafts = await store.list({ status: 'draft' });
    const searched = await store.list({ search: 'smartwatch', limit: 1 });
    const otherCategory = await store.list({ category: 'Books' });

    expect(archived.items.map((record) => record.id)).toEqual([first.id]);
    expect(drafts.total).toBe(1);
    expect(searched.total).toBe(2);
    expect(searched.items.map((record) => record.id)).toEqual(['listing-2']);
    expect(otherCategory.total).toBe(0);
  });

  it('deletes records and reports missing ids', async () => {
    const created = await store.create(loadListingDraftFixture('smartwatch-pro-x1'));

    expect(await store.delete(created.id)).toBe(true);
    expect(await store.delete(created.id)).toBe(false);
    expect(await store.get(created.id)).toBeUndefined();
    await expect(store.update(created.id, { title: 'Gone' })).rejects.toBeInstanceOf(ListingNotFoundError);
    await expect(store.duplicate('missing')).rejects.toBeInstanceOf(ListingNotFoundError);
  });
});

describe('LocalFileSystemListingStore files', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'listing-store-files-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('leaves exactly one document per listing after concurrent updates', async () => {
    const store = new LocalFileSystemListingStore({ directory, generateId: createIds() });
    const created = await store.create(loadListingDraftFixture('smartwatch-pro-x1'));

    const updates = await Promise.all(
      ['one', 'two', 'three'].map((title) => store.update(created.id, { title }))
    );

    expect(updates.map((record) => record.version)).toEqual([2, 3, 4]);
    expect(await readdir(directory)).toEqual(['listing-1.json']);
    expect((await store.history(created.id)).map((entry) => entry.snapshot.title)).toEqual([
      created.title,
      'one',
      'two',
      'three'
    ]);
  });

  it('raises a store error for corrupt documents', async () => {
    const store = new LocalFileSystemListingStore({ directory });
    await writeFile(join(directory, 'broken.json'), '{ not json', 'utf-8');

    await expect(store.get('broken')).rejects.toBeInstanceOf(ListingStoreError);
  });
});
