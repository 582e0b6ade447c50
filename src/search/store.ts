/**
 * Vector Store
 *
 * Chunks and their embeddings live in the `chunks` table, one collection
 * per project. Similarity queries are an exact cosine scan over the
 * collection, which is plenty for a few thousand chunks per project.
 *
 * Every operation runs through withRetry: SQLITE_BUSY / SQLITE_LOCKED are
 * retried with backoff, anything else surfaces as VectorStoreError.
 */

import type Database from 'better-sqlite3';

import { VectorStoreError } from '../errors/index.js';
import { blobToEmbedding, embeddingToBlob } from '../database/schema.js';
import { ChunkRowSchema, validateRows } from '../database/validation.js';
import { withRetry, RetryError, parseJsonWith, silentLogger, type Logger } from '../utils/index.js';
import { compareResults, cosineSimilarity } from './ranking.js';
import { ChunkMetadataSchema, type ChunkInput, type RetrievedChunk } from './types.js';

export interface VectorStore {
  /** Insert or overwrite chunks by (collection, id) */
  upsert(collection: string, chunks: ChunkInput[]): Promise<void>;
  /** @returns Number of chunks removed */
  deleteByDocument(collection: string, sourcePath: string): Promise<number>;
  /** Remove a document's chunks with ordinal >= `fromOrdinal` */
  deleteFromOrdinal(collection: string, sourcePath: string, fromOrdinal: number): Promise<number>;
  query(collection: string, vector: Float32Array, topK: number): Promise<RetrievedChunk[]>;
  count(collection: string): Promise<number>;
  dropCollection(collection: string): Promise<number>;
}

export interface SqliteVectorStoreOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  logger?: Logger;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_SQLITE_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED'];

export function isTransientSqliteError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  // Extended codes look like SQLITE_BUSY_SNAPSHOT
  return typeof code === 'string' && TRANSIENT_SQLITE_CODES.some((c) => code.startsWith(c));
}

export class SqliteVectorStore implements VectorStore {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    private readonly options: SqliteVectorStoreOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async upsert(collection: string, chunks: ChunkInput[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    await this.run('upsert', () => {
      const insert = this.db.prepare(
        `INSERT INTO chunks
           (collection, id, source_path, ordinal, content, embedding, dimensions, metadata, updated_at)
         VALUES (@collection, @id, @sourcePath, @ordinal, @content, @embedding, @dimensions, @metadata, @now)
         ON CONFLICT(collection, id) DO UPDATE SET
           source_path = excluded.source_path,
           ordinal = excluded.ordinal,
           content = excluded.content,
           embedding = excluded.embedding,
           dimensions = excluded.dimensions,
           metadata = excluded.metadata,
           updated_at = excluded.updated_at`
      );
      const now = new Date().toISOString();

      this.db.transaction(() => {
        for (const chunk of chunks) {
          insert.run({
            collection,
            id: chunk.id,
            sourcePath: chunk.sourcePath,
            ordinal: chunk.ordinal,
            content: chunk.content,
            embedding: embeddingToBlob(chunk.embedding),
            dimensions: chunk.embedding.length,
            metadata: JSON.stringify(chunk.metadata),
            now,
          });
        }
      })();
    });
  }

  deleteByDocument(collection: string, sourcePath: string): Promise<number> {
    return this.run('deleteByDocument', () =>
      this.db
        .prepare('DELETE FROM chunks WHERE collection = ? AND source_path = ?')
        .run(collection, sourcePath).changes
    );
  }

  deleteFromOrdinal(collection: string, sourcePath: string, fromOrdinal: number): Promise<number> {
    return this.run('deleteFromOrdinal', () =>
      this.db
        .prepare('DELETE FROM chunks WHERE collection = ? AND source_path = ? AND ordinal >= ?')
        .run(collection, sourcePath, fromOrdinal).changes
    );
  }

  query(collection: string, vector: Float32Array, topK: number): Promise<RetrievedChunk[]> {
    return this.run('query', () => {
      const rows = validateRows(
        ChunkRowSchema,
        this.db.prepare('SELECT * FROM chunks WHERE collection = ?').all(collection),
        `chunks.collection=${collection}`
      );

      const results: RetrievedChunk[] = rows.map((row) => {
        if (row.dimensions !== vector.length) {
          throw new VectorStoreError(
            `Query vector has ${vector.length} dimensions but ${collection} stores ${row.dimensions}`,
            { transient: false }
          );
        }
        return {
          chunkId: row.id,
          text: row.content,
          sourcePath: row.source_path,
          ordinal: row.ordinal,
          score: cosineSimilarity(vector, blobToEmbedding(row.embedding)),
          metadata: parseJsonWith(ChunkMetadataSchema, row.metadata, {}, (error) =>
            this.logger.warn(`Ignoring bad metadata on chunk ${row.id}: ${error.message}`)
          ),
        };
      });

      return results.sort(compareResults).slice(0, topK);
    });
  }

  count(collection: string): Promise<number> {
    return this.run('count', () => {
      const value = this.db
        .prepare('SELECT COUNT(*) FROM chunks WHERE collection = ?')
        .pluck()
        .get(collection);
      return typeof value === 'number' ? value : 0;
    });
  }

  dropCollection(collection: string): Promise<number> {
    return this.run('dropCollection', () =>
      this.db.prepare('DELETE FROM chunks WHERE collection = ?').run(collection).changes
    );
  }

  private async run<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return await withRetry(async () => fn(), {
        maxAttempts: this.options.maxAttempts ?? 3,
        baseDelayMs: this.options.baseDelayMs ?? 50,
        maxDelayMs: this.options.maxDelayMs ?? 1000,
        isTransient: isTransientSqliteError,
        onRetry: (_error, attempt, delayMs) =>
          this.logger.debug?.(
            `Vector store ${operation} busy (attempt ${attempt}), retrying in ${delayMs}ms`
          ),
        sleep: this.options.sleep,
      });
    } catch (error) {
      if (!(error instanceof RetryError)) {
        throw error;
      }
      if (error.cause instanceof VectorStoreError) {
        throw error.cause;
      }
      throw new VectorStoreError(`Vector store ${operation} failed: ${error.message}`, {
        transient: error.transient,
        cause: error.cause,
      });
    }
  }
}
