export * from './agents/index.js';
export * from './orchestrator/index.js';
export * from './listings/index.js';
export { createServer, type CreateServerOptions } from './http/server.js';
export { createCli, type CreateCliOptions } from './cli/index.js';
export { loadServiceConfig, type ServiceConfig } from './config.js';
export { createLogger, createSilentLogger, type CreateLoggerOptions, type Logger } from './logger.js';
