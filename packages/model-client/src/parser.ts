import type { z } from 'zod';

import { ParseError } from './errors.js';

export type StructuredDocument = Readonly<Record<string, unknown>>;

export type ParseResult<T> =
  | { readonly success: true; readonly data: T; readonly document: StructuredDocument }
  | { readonly success: false; readonly error: ParseError };

const CODE_FENCE = /```[a-zA-Z]*\s*/g;

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const findClosingBrace = (text: string, start: number): number => {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }

  return -1;
};

/**
 * Returns the first balanced `{...}` span in `raw` that parses as a JSON
 * object. Code fences are ignored and surrounding prose is skipped.
 */
export const extractJsonObject = (raw: string): StructuredDocument | undefined => {
  const text = raw.replace(CODE_FENCE, '');
  let start = text.indexOf('{');

  while (start !== -1) {
    const end = findClosingBrace(text, start);
    if (end === -1) {
      start = text.indexOf('{', start + 1);
      continue;
    }

    try {
      const candidate: unknown = JSON.parse(text.slice(start, end + 1));
      if (isPlainObject(candidate)) {
        return candidate;
      }
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
    }

    start = text.indexOf('{', start + 1);
  }

  return undefined;
};

/**
 * Extracts the structured block from model output and validates it. Never
 * throws and never fills in missing fields; callers decide how to recover.
 */
export const parseStructuredResponse = <TSchema extends z.ZodTypeAny>(
  raw: string,
  schema: TSchema
): ParseResult<z.output<TSchema>> => {
  const document = extractJsonObject(raw);
  if (!document) {
    return { success: false, error: new ParseError('no-structured-block', raw) };
  }

  const parsed = schema.safeParse(document);
  if (!parsed.success) {
    return { success: false, error: new ParseError('schema-mismatch', raw, parsed.error.issues) };
  }

  return { success: true, data: parsed.data, document };
};
