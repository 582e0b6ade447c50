/**
 * JSON Utilities
 *
 * Parsing of JSON columns read back from SQLite, validated against a zod
 * schema so corrupted or foreign data never leaks out typed as something
 * it isn't.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it, returning `fallback` on any failure.
 *
 * @param onError - Called with the parse or validation error and the raw text
 *
 * @example
 * ```typescript
 * const metadata = parseJsonWith(ChunkMetadataSchema, row.metadata, {}, (err) =>
 *   logger.warn(`Bad chunk metadata: ${err.message}`)
 * );
 * ```
 */
export function parseJsonWith<S extends z.ZodTypeAny>(
  schema: S,
  json: string | null | undefined,
  fallback: z.output<S>,
  onError?: (error: Error, rawValue: string) => void
): z.output<S> {
  if (json === null || json === undefined) {
    return fallback;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    onError?.(result.error, json);
    return fallback;
  }
  return result.data;
}

/**
 * JSON.stringify with object keys sorted at every level, so equal values
 * always serialize to the same string.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}
