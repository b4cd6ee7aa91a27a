import { loadServiceConfig } from './config.js';
import { createServer } from './http/server.js';
import { createWorkflowService } from './listings/setup.js';
import { createLogger } from './logger.js';

const config = loadServiceConfig();
const logger = createLogger({ level: config.logLevel });
const service = createWorkflowService({ config, logger });
const app = createServer({ service, logger });

const shutdown = async (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'shutting down');
  await app.close();
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'shutdown failed');
      process.exitCode = 1;
    });
  });
}

try {
  const address = await app.listen({ host: config.server.host, port: config.server.port });
  logger.info({ address, model: config.model.id, listingsDirectory: config.listingsDirectory }, 'listing service ready');
} catch (error) {
  logger.fatal({ err: error }, 'listing service failed to start');
  process.exitCode = 1;
}
