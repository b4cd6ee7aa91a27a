import { ListingNotFoundError } from '@listsmith/listing-store';
import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { Logger } from '../logger.js';
import type { ListingWorkflowService } from '../listings/service.js';

export interface CreateServerOptions {
  readonly service: ListingWorkflowService;
  readonly logger?: Logger;
}

const ListingParamsSchema = z.object({ id: z.string().trim().min(1) });

const RerunParamsSchema = ListingParamsSchema.extend({ agent: z.string().trim().min(1) });

const BuildBodySchema = z
  .object({
    input: z.unknown(),
    agents: z.array(z.string()).optional()
  })
  .strict();

const ListQuerySchema = z
  .object({
    status: z.string().optional(),
    category: z.string().optional(),
    search: z.string().optional(),
    offset: z.coerce.number().optional(),
    limit: z.coerce.number().optional()
  })
  .strict();

const UpdateBodySchema = z
  .object({
    changes: z.record(z.unknown()),
    reason: z.string().trim().min(1).optional()
  })
  .strict();

const DuplicateBodySchema = z
  .object({
    productName: z.string().optional()
  })
  .strict();

export const createServer = (options: CreateServerOptions): FastifyInstance => {
  const app = Fastify({ logger: false });
  const { service, logger } = options;

  app.get('/health', async (_request, reply) => {
    return reply.send(await service.health());
  });

  app.post('/listings', async (request, reply) => {
    const body = BuildBodySchema.parse(request.body ?? {});
    const result = await service.buildListing(body.input, { agents: body.agents });
    return reply.status(201).send({ listing: result.listing, advisory: result.orchestration.advisory });
  });

  app.get('/listings', async (request, reply) => {
    const query = ListQuerySchema.parse(request.query ?? {});
    return reply.send(await service.listListings(query));
  });

  app.get('/listings/:id', async (request, reply) => {
    const { id } = ListingParamsSchema.parse(request.params);
    return reply.send(await service.getListing(id));
  });

  app.patch('/listings/:id', async (request, reply) => {
    const { id } = ListingParamsSchema.parse(request.params);
    const body = UpdateBodySchema.parse(request.body ?? {});
    return reply.send(await service.updateListing(id, body.changes, body.reason));
  });

  app.delete('/listings/:id', async (request, reply) => {
    const { id } = ListingParamsSchema.parse(request.params);
    await service.deleteListing(id);
    return reply.status(204).send();
  });

  app.post('/listings/:id/publish', async (request, reply) => {
    const { id } = ListingParamsSchema.parse(request.params);
    return reply.send(await service.publishListing(id));
  });

  app.post('/listings/:id/archive', async (request, reply) => {
    const { id } = ListingParamsSchema.parse(request.params);
    return reply.send(await service.archiveListing(id));
  });

  app.post('/listings/:id/duplicate', async (request, reply) => {
    const { id } = ListingParamsSchema.parse(request.params);
    const body = DuplicateBodySchema.parse(request.body ?? {});
    return reply.status(201).send(await service.duplicateListing(id, body));
  });

  app.post('/listings/:id/agents/:agent/rerun', async (request, reply) => {
    const { id, agent } = RerunParamsSchema.parse(request.params);
    const result = await service.rerunAgent(id, agent);
    return reply.send({ listing: result.listing, advisory: result.orchestration.advisory });
  });

  app.post('/listings/:id/recommendations/apply', async (request, reply) => {
    const { id } = ListingParamsSchema.parse(request.params);
    return reply.send(await service.applyRecommendation(id, request.body ?? {}));
  });

  app.get('/listings/:id/history', async (request, reply) => {
    const { id } = ListingParamsSchema.parse(request.params);
    return reply.send({ versions: await service.getHistory(id) });
  });

  app.get('/statistics', async (_request, reply) => {
    return reply.send(await service.statistics());
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof z.ZodError) {
      reply.status(400).send({ error: error.issues.map((issue) => issue.message).join('; ') });
      return;
    }
    if (error instanceof ListingNotFoundError) {
      reply.status(404).send({ error: error.message });
      return;
    }
    logger?.error({ err: error, method: request.method, url: request.url }, 'request failed');
    reply.status(500).send({ error: error.message });
  });

  return app;
};
