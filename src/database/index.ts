/**
 * Database Module
 *
 * SQLite storage for projects, fingerprints, chunks and cached responses.
 *
 * @example
 * ```ts
 * import { openDatabase, runMigrations, DatabaseOperations } from './database/index.js';
 *
 * const db = openDatabase(getDbPath());
 * runMigrations(db);
 * const ops = new DatabaseOperations(db);
 * const projects = ops.listProjects();
 * ```
 */

export { openDatabase, MEMORY_DB } from './connection.js';

export {
  runMigrations,
  getAppliedMigrations,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

export type { Project, FingerprintRecord } from './schema.js';
export { generateId, embeddingToBlob, blobToEmbedding } from './schema.js';

export {
  ProjectRowSchema,
  ChunkRowSchema,
  FingerprintRowSchema,
  CacheRowSchema,
  type ProjectRow,
  type ChunkRow,
  type FingerprintRow,
  type CacheRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

export {
  DatabaseOperations,
  type ProjectInput,
  type ProjectStatsUpdate,
} from './operations.js';
