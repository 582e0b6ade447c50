/**
 * Database Operations
 *
 * Project and fingerprint persistence for the ingestion pipeline and the
 * knowledge-base service. Chunks live in the vector store and cache entries
 * in the response cache; both share the same connection.
 */

import type Database from 'better-sqlite3';
import { generateId, type Project, type FingerprintRecord } from './schema.js';
import {
  ProjectRowSchema,
  FingerprintRowSchema,
  validateRow,
  validateRows,
  type ProjectRow,
  type FingerprintRow,
} from './validation.js';
import { toCollectionName, withCollectionSuffix } from '../search/collection.js';
import { parseJsonWith } from '../utils/json.js';
import { ExtrasSchema } from '../indexer/extract/types.js';

export interface ProjectInput {
  name: string;
  path: string;
}

export interface ProjectStatsUpdate {
  fileCount: number;
  chunkCount: number;
  /** Set when an ingestion run completed */
  indexedAt?: string;
}

function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    path: row.path,
    collection: row.collection,
    createdAt: row.created_at,
    indexedAt: row.indexed_at,
    updatedAt: row.updated_at,
    fileCount: row.file_count,
    chunkCount: row.chunk_count,
    embeddingModel: row.embedding_model,
    embeddingDimensions: row.embedding_dimensions,
  };
}

function toFingerprint(row: FingerprintRow): FingerprintRecord {
  return {
    filePath: row.file_path,
    fileType: row.file_type,
    size: row.size,
    signature: row.signature,
    chunkCount: row.chunk_count,
    indexedAt: row.indexed_at,
    extras: parseJsonWith(ExtrasSchema, row.extras, {}),
  };
}

/**
 * Type-safe wrapper over the projects and fingerprints tables.
 */
export class DatabaseOperations {
  constructor(private readonly db: Database.Database) {}

  // ─────────────────────────────────────────────────────────────────────────────
  // Projects
  // ─────────────────────────────────────────────────────────────────────────────

  getProjectByName(name: string): Project | undefined {
    const row = this.db.prepare('SELECT * FROM projects WHERE name = ?').get(name);
    return row ? toProject(validateRow(ProjectRowSchema, row, `projects.name=${name}`)) : undefined;
  }

  getProjectById(id: string): Project | undefined {
    const row = this.db.prepare('SELECT * FROM projects WHERE id = ?').get(id);
    return row ? toProject(validateRow(ProjectRowSchema, row, `projects.id=${id}`)) : undefined;
  }

  listProjects(): Project[] {
    const rows = this.db.prepare('SELECT * FROM projects ORDER BY name').all();
    return validateRows(ProjectRowSchema, rows, 'projects').map(toProject);
  }

  /**
   * Create a project. Its collection is derived from the name; if another
   * project already owns that collection a numeric suffix is added.
   */
  createProject(input: ProjectInput): Project {
    const id = generateId();
    const now = new Date().toISOString();
    const collection = this.allocateCollection(input.name);

    this.db
      .prepare(
        `INSERT INTO projects (id, name, path, collection, created_at, updated_at)
         VALUES (@id, @name, @path, @collection, @now, @now)`
      )
      .run({ id, name: input.name, path: input.path, collection, now });

    return this.requireProject(id);
  }

  private allocateCollection(projectName: string): string {
    const base = toCollectionName(projectName);
    const taken = this.db.prepare('SELECT 1 FROM projects WHERE collection = ?');

    let candidate = base;
    for (let attempt = 2; taken.get(candidate) !== undefined; attempt++) {
      candidate = withCollectionSuffix(base, attempt);
    }
    return candidate;
  }

  private requireProject(id: string): Project {
    const project = this.getProjectById(id);
    if (!project) {
      throw new Error(`Project ${id} vanished during write`);
    }
    return project;
  }

  updateProjectPath(id: string, path: string): Project {
    this.db
      .prepare('UPDATE projects SET path = ?, updated_at = ? WHERE id = ?')
      .run(path, new Date().toISOString(), id);
    return this.requireProject(id);
  }

  /**
   * Record (or reset, with nulls) the embedding model behind a project's vectors.
   */
  setProjectEmbedding(id: string, model: string | null, dimensions: number | null): Project {
    this.db
      .prepare(
        `UPDATE projects
         SET embedding_model = ?, embedding_dimensions = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(model, dimensions, new Date().toISOString(), id);
    return this.requireProject(id);
  }

  updateProjectStats(id: string, stats: ProjectStatsUpdate): void {
    this.db
      .prepare(
        `UPDATE projects
         SET file_count = @fileCount,
             chunk_count = @chunkCount,
             indexed_at = COALESCE(@indexedAt, indexed_at),
             updated_at = @now
         WHERE id = @id`
      )
      .run({
        id,
        fileCount: stats.fileCount,
        chunkCount: stats.chunkCount,
        indexedAt: stats.indexedAt ?? null,
        now: new Date().toISOString(),
      });
  }

  /**
   * Delete a project row. Fingerprints go with it (foreign-key cascade).
   *
   * @returns Number of fingerprints removed
   */
  deleteProject(id: string): number {
    return this.db.transaction(() => {
      const fingerprints = this.countFingerprints(id);
      this.db.prepare('DELETE FROM projects WHERE id = ?').run(id);
      return fingerprints;
    })();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Fingerprints
  // ─────────────────────────────────────────────────────────────────────────────

  getFingerprints(projectId: string): Map<string, FingerprintRecord> {
    const rows = this.db
      .prepare('SELECT * FROM fingerprints WHERE project_id = ? ORDER BY file_path')
      .all(projectId);
    const records = validateRows(FingerprintRowSchema, rows, `fingerprints.project_id=${projectId}`);
    return new Map(records.map((row) => [row.file_path, toFingerprint(row)]));
  }

  /**
   * Insert or supersede the record for one document.
   */
  commitFingerprint(projectId: string, record: FingerprintRecord): void {
    this.db
      .prepare(
        `INSERT INTO fingerprints
           (project_id, file_path, file_type, size, signature, chunk_count, indexed_at, extras)
         VALUES (@projectId, @filePath, @fileType, @size, @signature, @chunkCount, @indexedAt, @extras)
         ON CONFLICT(project_id, file_path) DO UPDATE SET
           file_type = excluded.file_type,
           size = excluded.size,
           signature = excluded.signature,
           chunk_count = excluded.chunk_count,
           indexed_at = excluded.indexed_at,
           extras = excluded.extras`
      )
      .run({
        projectId,
        filePath: record.filePath,
        fileType: record.fileType,
        size: record.size,
        signature: record.signature,
        chunkCount: record.chunkCount,
        indexedAt: record.indexedAt,
        extras: Object.keys(record.extras).length > 0 ? JSON.stringify(record.extras) : null,
      });
  }

  deleteFingerprint(projectId: string, filePath: string): boolean {
    const result = this.db
      .prepare('DELETE FROM fingerprints WHERE project_id = ? AND file_path = ?')
      .run(projectId, filePath);
    return result.changes > 0;
  }

  clearFingerprints(projectId: string): number {
    return this.db.prepare('DELETE FROM fingerprints WHERE project_id = ?').run(projectId).changes;
  }

  countFingerprints(projectId: string): number {
    const value = this.db
      .prepare('SELECT COUNT(*) FROM fingerprints WHERE project_id = ?')
      .pluck()
      .get(projectId);
    return typeof value === 'number' ? value : 0;
  }
}
