import { randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  ListingRecordSchema,
  ListingVersionSchema,
  type ListingDraft,
  type ListingFilters,
  type ListingRecord,
  type ListingVersion
} from '@listsmith/core';
import { z } from 'zod';

import { ListingNotFoundError, ListingStoreError, isNotFoundError } from './errors.js';
import { applyUpdate, createEntry, duplicateEntry, selectPage, type ListingEntry } from './records.js';
import type {
  DuplicateListingOptions,
  ListingPage,
  ListingStore,
  ListingStoreOptions,
  ListingUpdate,
  UpdateListingOptions
} from './types.js';

const FileEntrySchema = z
  .object({
    record: ListingRecordSchema,
    history: z.array(ListingVersionSchema)
  })
  .strict();

const isValidId = (id: string): boolean => /^[A-Za-z0-9_-]+$/.test(id);

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export interface LocalFileSystemListingStoreOptions extends ListingStoreOptions {
  readonly directory: string;
}

/**
 * One JSON document per listing holding the current record and its version
 * history. Each write lands in a temporary file that is renamed over the
 * previous document; writes to the same listing are serialised.
 */
export class LocalFileSystemListingStore implements ListingStore {
  private readonly directory: string;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly ready: Promise<void>;
  private readonly queues = new Map<string, Promise<unknown>>();

  constructor(options: LocalFileSystemListingStoreOptions) {
    this.directory = options.directory;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.ready = mkdir(this.directory, { recursive: true }).then(() => undefined);
  }

  async create(draft: ListingDraft): Promise<ListingRecord> {
    await this.awaitReady();
    const entry = createEntry(draft, this.generateId(), this.now());
    await this.writeEntry(entry);
    return entry.record;
  }

  async get(id: string): Promise<ListingRecord | undefined> {
    await this.awaitReady();
    const entry = await this.readEntry(id);
    return entry?.record;
  }

  async update(id: string, update: ListingUpdate, options: UpdateListingOptions = {}): Promise<ListingRecord> {
    await this.awaitReady();
    return this.serialize(id, async () => {
      const entry = await this.requireEntry(id);
      const next = applyUpdate(entry, update, options.reason ?? 'updated', this.now());
      await this.writeEntry(next);
      return next.record;
    });
  }

  async delete(id: string): Promise<boolean> {
    await this.awaitReady();
    if (!isValidId(id)) {
      return false;
    }
    return this.serialize(id, async () => {
      try {
        await rm(this.pathFor(id));
        return true;
      } catch (error) {
        if (isNotFoundError(error)) {
          return false;
        }
        throw new ListingStoreError('delete', describeError(error), { cause: error });
      }
    });
  }

  async list(filters: ListingFilters = {}): Promise<ListingPage> {
    await this.awaitReady();
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      throw new ListingStoreError('list', describeError(error), { cause: error });
    }

    const records: ListingRecord[] = [];
    for (const name of names) {
      if (!name.endsWith('.json')) {
        continue;
      }
      const entry = await this.readEntry(name.slice(0, -'.json'.length));
      if (entry) {
        records.push(entry.record);
      }
    }

    return selectPage(records, filters);
  }

  async duplicate(id: string, options: DuplicateListingOptions = {}): Promise<ListingRecord> {
    await this.awaitReady();
    const source = await this.requireEntry(id);
    const entry = duplicateEntry(source.record, this.generateId(), this.now(), options.productName);
    await this.writeEntry(entry);
    return entry.record;
  }

  async history(id: string): Promise<readonly ListingVersion[]> {
    await this.awaitReady();
    const entry = await this.requireEntry(id);
    return entry.history;
  }

  private async awaitReady(): Promise<void> {
    try {
      await this.ready;
    } catch (error) {
      throw new ListingStoreError('initialise', describeError(error), { cause: error });
    }
  }

  private serialize<T>(id: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(id) ?? Promise.resolve();
    const run = previous.then(task, task);
    const settled: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.queues.get(id) === settled) {
          this.queues.delete(id);
        }
      });
    this.queues.set(id, settled);
    return run;
  }

  private pathFor(id: string): string {
    return join(this.directory, `${id}.json`);
  }

  private async requireEntry(id: string): Promise<ListingEntry> {
    const entry = await this.readEntry(id);
    if (!entry) {
      throw new ListingNotFoundError(id);
    }
    return entry;
  }

  private async readEntry(id: string): Promise<ListingEntry | undefined> {
    if (!isValidId(id)) {
      return undefined;
    }
    const filePath = this.pathFor(id);
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw new ListingStoreError('read', describeError(error), { cause: error });
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new ListingStoreError('read', `Listing file ${id}.json is not valid JSON`, { cause: error });
    }

    const parsed = FileEntrySchema.safeParse(document);
    if (!parsed.success) {
      throw new ListingStoreError('read', `Listing file ${id}.json is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async writeEntry(entry: ListingEntry): Promise<void> {
    const filePath = this.pathFor(entry.record.id);
    const temporaryPath = `${filePath}.${randomUUID()}.tmp`;
    const serialized = JSON.stringify(entry, null, 2);

    try {
      await writeFile(temporaryPath, `${serialized}\n`, 'utf-8');
      await rename(temporaryPath, filePath);
    } catch (error) {
      await rm(temporaryPath, { force: true });
      throw new ListingStoreError('write', describeError(error), { cause: error });
    }
  }
}
