import { LocalFileSystemListingStore, type ListingStore } from '@listsmith/listing-store';
import {
  checkModelAvailability,
  createOllamaTextGenerationClient,
  type TextGenerationClient
} from '@listsmith/model-client';

import { createListingAgents, loadFallbackTables, type FallbackTables } from '../agents/index.js';
import { loadServiceConfig, type ServiceConfig } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { ListingOrchestrator } from '../orchestrator/index.js';
import { ListingWorkflowService } from './service.js';

export interface CreateWorkflowServiceOptions {
  readonly config?: ServiceConfig;
  readonly logger?: Logger;
  readonly client?: TextGenerationClient;
  readonly store?: ListingStore;
  readonly tables?: FallbackTables;
  readonly now?: () => Date;
}

export const createWorkflowService = (options: CreateWorkflowServiceOptions = {}): ListingWorkflowService => {
  const config = options.config ?? loadServiceConfig();
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const client =
    options.client ??
    createOllamaTextGenerationClient({
      baseUrl: config.model.baseUrl,
      model: config.model.id,
      timeoutMs: config.model.timeoutMs
    });
  const store = options.store ?? new LocalFileSystemListingStore({ directory: config.listingsDirectory, now: options.now });
  const clock = options.now;
  const now = clock ? () => clock().getTime() : undefined;

  const agents = createListingAgents({
    client,
    tables: options.tables ?? loadFallbackTables(),
    logger,
    timeoutMs: config.model.timeoutMs,
    now
  });
  const orchestrator = new ListingOrchestrator({
    agents,
    logger,
    deadlineMs: config.orchestration.deadlineMs,
    maxNonSuccess: config.orchestration.maxNonSuccess,
    now
  });

  return new ListingWorkflowService({
    store,
    orchestrator,
    client,
    logger,
    modelTimeoutMs: config.model.timeoutMs,
    checkModel: () => checkModelAvailability({ baseUrl: config.model.baseUrl, model: config.model.id })
  });
};
