import type { ZodIssue } from 'zod';

export const RAW_EXCERPT_LIMIT = 500;

export const truncateRaw = (raw: string, limit = RAW_EXCERPT_LIMIT): string => {
  return raw.length > limit ? `${raw.slice(0, limit)}…` : raw;
};

export class GenerationTimeoutError extends Error {
  readonly kind = 'timeout' as const;
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `Model did not respond within ${timeoutMs}ms`) {
    super(message);
    this.name = 'GenerationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class GenerationConnectionError extends Error {
  readonly kind = 'connection' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationConnectionError';
  }
}

export type GenerationError = GenerationTimeoutError | GenerationConnectionError;

export type ParseFailureReason = 'no-structured-block' | 'schema-mismatch';

export class ParseError extends Error {
  readonly kind = 'parse' as const;
  readonly reason: ParseFailureReason;
  readonly issues: readonly ZodIssue[];
  readonly rawExcerpt: string;

  constructor(reason: ParseFailureReason, raw: string, issues: readonly ZodIssue[] = []) {
    const detail =
      reason === 'no-structured-block'
        ? 'No JSON object found in model output'
        : `Model output did not match the expected shape: ${issues
            .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
            .join('; ')}`;
    super(detail);
    this.name = 'ParseError';
    this.reason = reason;
    this.issues = issues;
    this.rawExcerpt = truncateRaw(raw);
  }
}
