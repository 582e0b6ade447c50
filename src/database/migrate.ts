/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied in
 * the _migrations table. Safe to run on every start.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { validateRows } from './validation.js';

/**
 * Result of running migrations.
 * Failed migrations do not stop later ones from being attempted.
 */
export interface MigrationResult {
  applied: string[];
  failed: Array<{ name: string; error: string }>;
}

// SQL is embedded so the compiled output needs no data files
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Projects: one per document folder
CREATE TABLE IF NOT EXISTS projects (
  id TEXT PRIMARY KEY,
  name TEXT UNIQUE NOT NULL,
  path TEXT NOT NULL,
  collection TEXT UNIQUE NOT NULL,
  created_at TEXT NOT NULL,
  indexed_at TEXT,
  updated_at TEXT NOT NULL,
  file_count INTEGER NOT NULL DEFAULT 0,
  chunk_count INTEGER NOT NULL DEFAULT 0,
  embedding_model TEXT,
  embedding_dimensions INTEGER
);

-- Chunks: owned by the vector store, keyed by collection rather than project
-- so the store has no dependency on the project table
CREATE TABLE IF NOT EXISTS chunks (
  collection TEXT NOT NULL,
  id TEXT NOT NULL,
  source_path TEXT NOT NULL,
  ordinal INTEGER NOT NULL,
  content TEXT NOT NULL,
  embedding BLOB NOT NULL,
  dimensions INTEGER NOT NULL,
  metadata TEXT,
  updated_at TEXT NOT NULL,
  PRIMARY KEY (collection, id)
);

CREATE INDEX IF NOT EXISTS idx_chunks_source ON chunks(collection, source_path, ordinal);

-- Fingerprints: one per ingested document, superseded on change
CREATE TABLE IF NOT EXISTS fingerprints (
  project_id TEXT NOT NULL,
  file_path TEXT NOT NULL,
  file_type TEXT NOT NULL,
  size INTEGER NOT NULL,
  signature TEXT NOT NULL,
  chunk_count INTEGER NOT NULL,
  indexed_at TEXT NOT NULL,
  extras TEXT,
  PRIMARY KEY (project_id, file_path),
  FOREIGN KEY (project_id) REFERENCES projects(id) ON DELETE CASCADE
);
    `.trim(),
  },
  {
    name: '002-response-cache.sql',
    sql: `
-- Response cache: answers keyed by hash of (project, normalized query, params)
CREATE TABLE IF NOT EXISTS response_cache (
  key TEXT PRIMARY KEY,
  project_name TEXT NOT NULL,
  query TEXT NOT NULL,
  params TEXT NOT NULL,
  response TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_response_cache_project ON response_cache(project_name);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });

/**
 * Run all pending migrations against `db`.
 *
 * @example
 * ```ts
 * const result = runMigrations(db);
 * if (result.failed.length > 0) {
 *   throw new DatabaseError(`Migration failed: ${result.failed[0].name}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const appliedMigrations = getAppliedMigrations(db);

  for (const migration of MIGRATIONS) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
      appliedMigrations.add(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

export function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare('SELECT name FROM _migrations ORDER BY id').all();
  return new Set(validateRows(MigrationNameRowSchema, rows, '_migrations').map((row) => row.name));
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
