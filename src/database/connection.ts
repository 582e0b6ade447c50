/**
 * Database Connection Module
 *
 * Opens SQLite databases with better-sqlite3. Connections are owned by the
 * knowledge-base service that opened them; there is no shared instance.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError } from '../errors/index.js';

export const MEMORY_DB = ':memory:';

/**
 * Open (and create if needed) the database at `dbPath`.
 *
 * @example
 * ```ts
 * const db = openDatabase(getDbPath());
 * runMigrations(db);
 * ```
 */
export function openDatabase(dbPath: string): Database.Database {
  let db: Database.Database;
  try {
    if (dbPath !== MEMORY_DB) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(`Cannot open database at ${dbPath}`, error);
  }

  // Enable foreign keys (OFF by default in SQLite!)
  db.pragma('foreign_keys = ON');

  if (dbPath !== MEMORY_DB) {
    // WAL lets searches read while an ingestion writes
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
  }

  return db;
}
