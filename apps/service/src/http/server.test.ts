import type { ListingRecord } from '@listsmith/core';
import { InMemoryListingStore, ListingStoreError } from '@listsmith/listing-store';
import {
  createScriptedTextGenerationClient,
  loadModelResponsesFixture,
  loadProductFixture,
  respondByLabel
} from '@listsmith/fixtures';
import { describe, expect, it } from 'vitest';

import { createListingAgents, loadFallbackTables } from '../agents/index.js';
import { ListingWorkflowService } from '../listings/service.js';
import { createSilentLogger } from '../logger.js';
import { ListingOrchestrator } from '../orchestrator/index.js';
import { createServer } from './server.js';

class UnreadableListingStore extends InMemoryListingStore {
  async get(): Promise<ListingRecord | undefined> {
    throw new ListingStoreError('read', 'disk unavailable');
  }
}

const createIds = () => {
  let counter = 0;
  return () => `listing-${++counter}`;
};

const createApp = (store: InMemoryListingStore = new InMemoryListingStore({ generateId: createIds() })) => {
  const client = createScriptedTextGenerationClient(respondByLabel(loadModelResponsesFixture('smartwatch-pro-x1')));
  const logger = createSilentLogger();
  const service = new ListingWorkflowService({
    store,
    orchestrator: new ListingOrchestrator({
      agents: createListingAgents({ client, tables: loadFallbackTables(), logger }),
      logger
    }),
    client,
    logger,
    checkModel: async () => ({ reachable: true, available: true, model: 'scripted-model', models: ['scripted-model'] })
  });
  return createServer({ service, logger });
};

const smartwatch = loadProductFixture('smartwatch-pro-x1');

describe('createServer', () => {
  it('builds a listing and serves it back', async () => {
    const app = createApp();

    const created = await app.inject({ method: 'POST', url: '/listings', payload: { input: smartwatch } });
    const fetched = await app.inject({ method: 'GET', url: '/listings/listing-1' });

    expect(created.statusCode).toBe(201);
    expect(created.json().listing.title).toBe('Smartwatch Pro X1 GPS Fitness Smartwatch with 7-Day Battery Life');
    expect(fetched.statusCode).toBe(200);
    expect(fetched.json().version).toBe(1);
  });

  it('answers 400 for invalid product input', async () => {
    const app = createApp();

    const response = await app.inject({
      method: 'POST',
      url: '/listings',
      payload: { input: { productName: 'Desk Lamp', category: 'Gadgets', targetPrice: 20 } }
    });

    expect(response.statusCode).toBe(400);
  });

  it('answers 400 for an unknown agent subset', async () => {
    const app = createApp();

    const response = await app.inject({
      method: 'POST',
      url: '/listings',
      payload: { input: smartwatch, agents: ['copywriter'] }
    });

    expect(response.statusCode).toBe(400);
  });

  it('answers 404 for unknown listings', async () => {
    const app = createApp();

    const response = await app.inject({ method: 'GET', url: '/listings/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Listing missing not found.' });
  });

  it('updates, lists and deletes listings', async () => {
    const app = createApp();
    await app.inject({ method: 'POST', url: '/listings', payload: { input: smartwatch } });

    const patched = await app.inject({
      method: 'PATCH',
      url: '/listings/listing-1',
      payload: { changes: { title: 'Smartwatch Pro X1 Running Watch' }, reason: 'manual edit' }
    });
    const listed = await app.inject({ method: 'GET', url: '/listings?status=draft&limit=10' });
    const history = await app.inject({ method: 'GET', url: '/listings/listing-1/history' });
    const deleted = await app.inject({ method: 'DELETE', url: '/listings/listing-1' });
    const missing = await app.inject({ method: 'GET', url: '/listings/listing-1' });

    expect(patched.json().version).toBe(2);
    expect(listed.json().total).toBe(1);
    expect(listed.json().items[0].title).toBe('Smartwatch Pro X1 Running Watch');
    expect(history.json().versions.map((entry: { reason: string }) => entry.reason)).toEqual(['created', 'manual edit']);
    expect(deleted.statusCode).toBe(204);
    expect(missing.statusCode).toBe(404);
  });

  it('publishes and duplicates listings', async () => {
    const app = createApp();
    await app.inject({ method: 'POST', url: '/listings', payload: { input: smartwatch } });

    const published = await app.inject({ method: 'POST', url: '/listings/listing-1/publish' });
    const duplicate = await app.inject({
      method: 'POST',
      url: '/listings/listing-1/duplicate',
      payload: { productName: 'Smartwatch Pro X2' }
    });

    expect(published.json().status).toBe('published');
    expect(duplicate.statusCode).toBe(201);
    expect(duplicate.json()).toMatchObject({ id: 'listing-2', version: 1, status: 'draft', duplicatedFrom: 'listing-1' });
  });

  it('rejects reruns of unknown agents', async () => {
    const app = createApp();
    await app.inject({ method: 'POST', url: '/listings', payload: { input: smartwatch } });

    const response = await app.inject({ method: 'POST', url: '/listings/listing-1/agents/copywriter/rerun' });

    expect(response.statusCode).toBe(400);
  });

  it('applies recommendations and reports statistics', async () => {
    const app = createApp();
    await app.inject({ method: 'POST', url: '/listings', payload: { input: smartwatch } });

    const applied = await app.inject({
      method: 'POST',
      url: '/listings/listing-1/recommendations/apply',
      payload: { text: 'Improve SEO coverage' }
    });
    const statistics = await app.inject({ method: 'GET', url: '/statistics' });

    expect(applied.json()).toMatchObject({ applied: true, origin: 'fallback', changedFields: ['backendKeywords'] });
    expect(statistics.json()).toMatchObject({ total: 1, averageConfidence: 0.842 });
  });

  it('answers 500 when the store fails', async () => {
    const app = createApp(new UnreadableListingStore());

    const response = await app.inject({ method: 'GET', url: '/listings/listing-1' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Listing store read failed: disk unavailable' });
  });

  it('reports health with the model status', async () => {
    const app = createApp();

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.json()).toEqual({
      status: 'ok',
      model: { reachable: true, available: true, model: 'scripted-model', models: ['scripted-model'] }
    });
  });
});
