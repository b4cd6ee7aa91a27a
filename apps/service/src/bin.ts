import { createCli } from './cli/index.js';
import { loadServiceConfig } from './config.js';
import { createWorkflowService } from './listings/setup.js';
import { createLogger } from './logger.js';

const config = loadServiceConfig();
const logger = createLogger({ level: config.logLevel, stream: 'stderr' });
const program = createCli({ service: createWorkflowService({ config, logger }) });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  logger.debug({ err: error }, 'command failed');
  process.exitCode = 1;
}
