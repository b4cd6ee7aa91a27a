import { Writable } from 'node:stream';

import { InMemoryListingStore } from '@listsmith/listing-store';
import type { ModelAvailability } from '@listsmith/model-client';
import {
  createScriptedTextGenerationClient,
  getFixturePath,
  loadModelResponsesFixture,
  respondByLabel
} from '@listsmith/fixtures';
import { describe, expect, it } from 'vitest';

import { createListingAgents, loadFallbackTables } from '../agents/index.js';
import { ListingWorkflowService } from '../listings/service.js';
import { createSilentLogger } from '../logger.js';
import { ListingOrchestrator } from '../orchestrator/index.js';
import { createCli } from './index.js';

const createCapture = () => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  return { stream, text: () => chunks.join('') };
};

const AVAILABLE: ModelAvailability = {
  reachable: true,
  available: true,
  model: 'scripted-model',
  models: ['scripted-model']
};

const createHarness = (availability: ModelAvailability = AVAILABLE) => {
  let counter = 0;
  const client = createScriptedTextGenerationClient(respondByLabel(loadModelResponsesFixture('smartwatch-pro-x1')));
  const logger = createSilentLogger();
  const service = new ListingWorkflowService({
    store: new InMemoryListingStore({ generateId: () => `listing-${++counter}` }),
    orchestrator: new ListingOrchestrator({
      agents: createListingAgents({ client, tables: loadFallbackTables(), logger }),
      logger
    }),
    client,
    logger,
    checkModel: async () => availability
  });
  const stdout = createCapture();
  const stderr = createCapture();

  const run = async (...args: string[]) => {
    const program = createCli({ service, stdout: stdout.stream, stderr: stderr.stream });
    program.exitOverride();
    await program.parseAsync(['node', 'listsmith', ...args]);
  };

  return { run, stdout, stderr };
};

const inputPath = getFixturePath('products', 'smartwatch-pro-x1.json');

describe('createCli', () => {
  it('builds a listing from an input file', async () => {
    const { run, stdout } = createHarness();

    await run('listings:build', '--input', inputPath);

    expect(JSON.parse(stdout.text())).toEqual({
      listingId: 'listing-1',
      version: 1,
      title: 'Smartwatch Pro X1 GPS Fitness Smartwatch with 7-Day Battery Life',
      confidence: 0.842,
      notes: []
    });
  });

  it('limits the build to the selected agents', async () => {
    const { run, stdout } = createHarness();

    await run('listings:build', '--input', inputPath, '--agents', 'product-analysis, seo');

    const output = JSON.parse(stdout.text());
    expect(output.notes).toContain('[description] fallback: agent not requested');
    expect(output.advisory.nonSuccessAgents).toHaveLength(9);
  });

  it('lists and publishes stored listings', async () => {
    const { run, stdout } = createHarness();
    await run('listings:build', '--input', inputPath);
    const afterBuild = stdout.text().length;

    await run('listings:publish', 'listing-1');
    const published = JSON.parse(stdout.text().slice(afterBuild));
    const afterPublish = stdout.text().length;
    await run('listings:list', '--status', 'published');
    const listed = JSON.parse(stdout.text().slice(afterPublish));

    expect(published.status).toBe('published');
    expect(published.version).toBe(2);
    expect(listed.total).toBe(1);
    expect(listed.items[0].id).toBe('listing-1');
  });

  it('writes errors to stderr and rethrows', async () => {
    const { run, stderr } = createHarness();

    await expect(run('listings:show', 'missing')).rejects.toThrow('Listing missing not found.');
    expect(stderr.text()).toBe('Listing missing not found.\n');
  });

  it('reports a missing model from doctor', async () => {
    const { run, stdout, stderr } = createHarness({
      reachable: true,
      available: false,
      model: 'scripted-model',
      models: ['llama3']
    });

    await run('doctor');

    expect(JSON.parse(stdout.text()).status).toBe('degraded');
    expect(stderr.text()).toBe('Model scripted-model is not available: not installed on the server\n');
  });
});
