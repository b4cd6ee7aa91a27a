import { readFile } from 'node:fs/promises';

import { Command } from 'commander';

import type { ListingWorkflowService } from '../listings/service.js';

export interface CreateCliOptions {
  readonly service: ListingWorkflowService;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

const splitList = (value: string): string[] => {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
};

const parseLimit = (value: string): number => {
  const limit = Number.parseInt(value, 10);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid limit: ${value}`);
  }
  return limit;
};

export const createCli = (options: CreateCliOptions): Command => {
  const program = new Command();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const service = options.service;

  const writeJson = (value: unknown) => {
    const serialized = JSON.stringify(value, null, 2);
    stdout.write(`${serialized}\n`);
  };

  const handle = <T extends unknown[]>(runner: (...args: T) => Promise<void>) => {
    return async (...args: T) => {
      try {
        await runner(...args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        stderr.write(`${message}\n`);
        throw error;
      }
    };
  };

  program.name('listsmith').description('Marketplace listing generation CLI');

  program
    .command('listings:build')
    .description('Run every agent against a product file and store the draft listing')
    .requiredOption('--input <file>', 'Path to a product input JSON file')
    .option('--agents <names>', 'Comma-separated agent subset; the rest use their fallbacks', splitList)
    .action(
      handle(async (command: { input: string; agents?: string[] }) => {
        const input: unknown = JSON.parse(await readFile(command.input, 'utf-8'));
        const { listing, orchestration } = await service.buildListing(input, { agents: command.agents });
        writeJson({
          listingId: listing.id,
          version: listing.version,
          title: listing.title,
          confidence: listing.confidence,
          notes: listing.notes,
          advisory: orchestration.advisory
        });
      })
    );

  program
    .command('listings:rerun <listingId> <agent>')
    .description('Run one agent again and store the re-merged listing as a new version')
    .action(
      handle(async (listingId: string, agent: string) => {
        const { listing } = await service.rerunAgent(listingId, agent);
        writeJson({
          listingId: listing.id,
          version: listing.version,
          confidence: listing.confidence,
          source: listing.agentResults.find((result) => result.agent === agent)?.origin
        });
      })
    );

  program
    .command('listings:list')
    .description('List stored listings, newest first')
    .option('--status <status>', 'Only listings in this status')
    .option('--category <category>', 'Only listings in this product category')
    .option('--search <text>', 'Match title, description or product name')
    .option('--limit <count>', 'Maximum number of listings', parseLimit)
    .action(
      handle(async (command: { status?: string; category?: string; search?: string; limit?: number }) => {
        const page = await service.listListings(command);
        writeJson({
          total: page.total,
          items: page.items.map((listing) => ({
            id: listing.id,
            version: listing.version,
            status: listing.status,
            title: listing.title,
            confidence: listing.confidence
          }))
        });
      })
    );

  program
    .command('listings:show <listingId>')
    .description('Print a stored listing')
    .action(
      handle(async (listingId: string) => {
        writeJson(await service.getListing(listingId));
      })
    );

  program
    .command('listings:publish <listingId>')
    .description('Mark a listing as published')
    .action(
      handle(async (listingId: string) => {
        const listing = await service.publishListing(listingId);
        writeJson({ listingId: listing.id, version: listing.version, status: listing.status, publishedAt: listing.publishedAt });
      })
    );

  program
    .command('listings:duplicate <listingId>')
    .description('Copy a listing into a new draft')
    .option('--name <productName>', 'Product name for the copy')
    .action(
      handle(async (listingId: string, command: { name?: string }) => {
        const listing = await service.duplicateListing(listingId, { productName: command.name });
        writeJson({ listingId: listing.id, version: listing.version, title: listing.title, duplicatedFrom: listing.duplicatedFrom });
      })
    );

  program
    .command('listings:delete <listingId>')
    .description('Delete a listing and its history')
    .action(
      handle(async (listingId: string) => {
        await service.deleteListing(listingId);
        writeJson({ listingId, deleted: true });
      })
    );

  program
    .command('doctor')
    .description('Check that the configured model server answers and serves the model')
    .action(
      handle(async () => {
        const health = await service.health();
        writeJson(health);
        if (health.status !== 'ok') {
          stderr.write(`Model ${health.model?.model ?? 'unknown'} is not available: ${health.model?.error ?? 'not installed on the server'}\n`);
        }
      })
    );

  return program;
};
