import { resolve } from 'node:path';

import { DEFAULT_GENERATION_TIMEOUT_MS, DEFAULT_MODEL_BASE_URL, DEFAULT_MODEL_ID } from '@listsmith/model-client';
import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

const EnvironmentSchema = z.object({
  LISTSMITH_MODEL_BASE_URL: z.string().url().default(DEFAULT_MODEL_BASE_URL),
  LISTSMITH_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL_ID),
  LISTSMITH_MODEL_TIMEOUT_MS: positiveInt.default(DEFAULT_GENERATION_TIMEOUT_MS),
  LISTSMITH_DEADLINE_MS: positiveInt.default(180_000),
  LISTSMITH_MAX_NON_SUCCESS: z.coerce.number().int().nonnegative().optional(),
  LISTSMITH_LISTINGS_DIR: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  HOST: z.string().trim().min(1).default('127.0.0.1')
});

export interface ServiceConfig {
  readonly model: {
    readonly baseUrl: string;
    readonly id: string;
    readonly timeoutMs: number;
  };
  readonly orchestration: {
    readonly deadlineMs: number;
    readonly maxNonSuccess?: number;
  };
  readonly listingsDirectory: string;
  readonly logLevel: string;
  readonly server: {
    readonly host: string;
    readonly port: number;
  };
}

const definedValues = (env: NodeJS.ProcessEnv): Record<string, string> => {
  return Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim() !== '')
  );
};

export const loadServiceConfig = (env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): ServiceConfig => {
  const parsed = EnvironmentSchema.parse(definedValues(env));
  return {
    model: {
      baseUrl: parsed.LISTSMITH_MODEL_BASE_URL,
      id: parsed.LISTSMITH_MODEL,
      timeoutMs: parsed.LISTSMITH_MODEL_TIMEOUT_MS
    },
    orchestration: {
      deadlineMs: parsed.LISTSMITH_DEADLINE_MS,
      maxNonSuccess: parsed.LISTSMITH_MAX_NON_SUCCESS
    },
    listingsDirectory: resolve(cwd, parsed.LISTSMITH_LISTINGS_DIR ?? '.listings'),
    logLevel: parsed.LOG_LEVEL,
    server: {
      host: parsed.HOST,
      port: parsed.PORT
    }
  };
};
