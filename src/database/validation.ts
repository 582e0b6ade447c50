/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. better-sqlite3
 * returns `unknown` rows; validating them catches schema drift (failed
 * migration, manual edits, version mismatch) at the read site instead of
 * as corrupted data further down.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM projects WHERE name = ?').get(name);
 * return row ? validateRow(ProjectRowSchema, row, `projects.name=${name}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

export const ProjectRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  path: z.string(),
  collection: z.string(),
  created_at: z.string(),
  indexed_at: z.string().nullable(),
  updated_at: z.string(),
  file_count: z.number().int().nonnegative(),
  chunk_count: z.number().int().nonnegative(),
  embedding_model: z.string().nullable(),
  embedding_dimensions: z.number().int().positive().nullable(),
});

export type ProjectRow = z.infer<typeof ProjectRowSchema>;

/**
 * `embedding` is a Buffer (BLOB); Float32Array conversion happens in the store.
 */
export const ChunkRowSchema = z.object({
  collection: z.string(),
  id: z.string(),
  source_path: z.string(),
  ordinal: z.number().int().nonnegative(),
  content: z.string(),
  embedding: z.instanceof(Buffer),
  dimensions: z.number().int().positive(),
  metadata: z.string().nullable(),
  updated_at: z.string(),
});

export type ChunkRow = z.infer<typeof ChunkRowSchema>;

export const FingerprintRowSchema = z.object({
  project_id: z.string(),
  file_path: z.string(),
  file_type: z.string(),
  size: z.number().int().nonnegative(),
  signature: z.string(),
  chunk_count: z.number().int().nonnegative(),
  indexed_at: z.string(),
  extras: z.string().nullable(),
});

export type FingerprintRow = z.infer<typeof FingerprintRowSchema>;

export const CacheRowSchema = z.object({
  key: z.string(),
  project_name: z.string(),
  query: z.string(),
  params: z.string(),
  response: z.string(),
  created_at: z.string(),
});

export type CacheRow = z.infer<typeof CacheRowSchema>;

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * Exit code 5: Database error (same as DatabaseError)
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe database may have been written by a different grantkb version.`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

/**
 * Validate a single database row.
 *
 * @param context - Shown in the error, e.g. "projects.name=alpha"
 * @throws SchemaValidationError
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of rows. Throws on the first invalid row unless
 * `continueOnError` is set, in which case invalid rows are reported through
 * `onError` and left out.
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string,
  options?: {
    continueOnError?: boolean;
    onError?: (row: unknown, error: z.ZodError) => void;
  }
): z.output<T>[] {
  const valid: z.output<T>[] = [];

  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    const result = schema.safeParse(row);

    if (result.success) {
      valid.push(result.data);
    } else if (options?.continueOnError) {
      options.onError?.(row, result.error);
    } else {
      throw new SchemaValidationError(
        `Database schema mismatch in ${context}[${i}]`,
        result.error.issues
      );
    }
  }

  return valid;
}
