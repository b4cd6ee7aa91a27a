import pino, { type Logger } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {
  readonly level?: string;
  readonly name?: string;
  /** The CLI logs to stderr so stdout stays machine-readable. */
  readonly stream?: 'stdout' | 'stderr';
}

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  return pino(
    {
      name: options.name ?? 'listsmith',
      level: options.level ?? process.env.LOG_LEVEL ?? 'info'
    },
    pino.destination(options.stream === 'stderr' ? 2 : 1)
  );
};

export const createSilentLogger = (): Logger => pino({ level: 'silent' });
