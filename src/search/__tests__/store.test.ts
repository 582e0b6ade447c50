/**
 * SqliteVectorStore Tests
 *
 * Runs against an in-memory database with the real migrations.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';

import { runMigrations } from '../../database/migrate.js';
import { VectorStoreError } from '../../errors/index.js';
import { SqliteVectorStore, isTransientSqliteError } from '../store.js';
import { chunkId, type ChunkInput } from '../types.js';

function chunk(sourcePath: string, ordinal: number, vector: number[], content = `${sourcePath} ${ordinal}`): ChunkInput {
  return {
    id: chunkId(sourcePath, ordinal),
    sourcePath,
    ordinal,
    content,
    embedding: Float32Array.from(vector),
    metadata: { fileType: 'txt', totalChunks: 1 },
  };
}

function busyError(): Error {
  return Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
}

describe('SqliteVectorStore', () => {
  let db: Database.Database;
  let store: SqliteVectorStore;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    store = new SqliteVectorStore(db, { sleep });
    sleep.mockClear();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  it('upserts chunks and counts them per collection', async () => {
    await store.upsert('alpha', [chunk('a.txt', 0, [1, 0]), chunk('a.txt', 1, [0, 1])]);
    await store.upsert('beta', [chunk('a.txt', 0, [1, 0])]);

    expect(await store.count('alpha')).toBe(2);
    expect(await store.count('beta')).toBe(1);
    expect(await store.count('gamma')).toBe(0);
  });

  it('overwrites a chunk with the same id instead of duplicating it', async () => {
    await store.upsert('alpha', [chunk('a.txt', 0, [1, 0], 'old text')]);
    await store.upsert('alpha', [chunk('a.txt', 0, [0, 1], 'new text')]);

    const results = await store.query('alpha', Float32Array.from([0, 1]), 5);

    expect(await store.count('alpha')).toBe(1);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ chunkId: 'a.txt#0', text: 'new text', score: 1 });
  });

  it('orders by descending similarity, ties by source path then ordinal', async () => {
    await store.upsert('alpha', [
      chunk('c.txt', 0, [0, 1]),
      chunk('b.txt', 0, [1, 0]),
      chunk('a.txt', 1, [1, 0]),
      chunk('a.txt', 0, [1, 0]),
      chunk('d.txt', 0, [1, 1]),
    ]);

    const results = await store.query('alpha', Float32Array.from([1, 0]), 10);

    expect(results.map((r) => r.chunkId)).toEqual(['a.txt#0', 'a.txt#1', 'b.txt#0', 'd.txt#0', 'c.txt#0']);
    expect(results[3]?.score).toBeCloseTo(Math.SQRT1_2, 5);
    expect(results[4]?.score).toBe(0);
    for (let i = 1; i < results.length; i++) {
      expect(results[i - 1]?.score ?? 0).toBeGreaterThanOrEqual(results[i]?.score ?? 0);
    }
  });

  it('returns at most topK results with their metadata', async () => {
    await store.upsert('alpha', [chunk('a.txt', 0, [1, 0]), chunk('b.txt', 0, [1, 0])]);

    const results = await store.query('alpha', Float32Array.from([1, 0]), 1);

    expect(results).toEqual([
      {
        chunkId: 'a.txt#0',
        text: 'a.txt 0',
        sourcePath: 'a.txt',
        ordinal: 0,
        score: 1,
        metadata: { fileType: 'txt', totalChunks: 1 },
      },
    ]);
  });

  it('scores a zero vector as 0', async () => {
    await store.upsert('alpha', [chunk('a.txt', 0, [0, 0])]);
    const [result] = await store.query('alpha', Float32Array.from([1, 0]), 1);
    expect(result?.score).toBe(0);
  });

  it('deletes a document and only that document', async () => {
    await store.upsert('alpha', [chunk('a.txt', 0, [1, 0]), chunk('a.txt', 1, [1, 0]), chunk('b.txt', 0, [1, 0])]);

    expect(await store.deleteByDocument('alpha', 'a.txt')).toBe(2);
    expect((await store.query('alpha', Float32Array.from([1, 0]), 10)).map((r) => r.chunkId)).toEqual([
      'b.txt#0',
    ]);
  });

  it('deletes ordinals beyond a new chunk count', async () => {
    await store.upsert('alpha', [chunk('a.txt', 0, [1, 0]), chunk('a.txt', 1, [1, 0]), chunk('a.txt', 2, [1, 0])]);

    expect(await store.deleteFromOrdinal('alpha', 'a.txt', 1)).toBe(2);
    expect(await store.count('alpha')).toBe(1);
  });

  it('drops a whole collection', async () => {
    await store.upsert('alpha', [chunk('a.txt', 0, [1, 0]), chunk('b.txt', 0, [1, 0])]);
    await store.upsert('beta', [chunk('a.txt', 0, [1, 0])]);

    expect(await store.dropCollection('alpha')).toBe(2);
    expect(await store.count('alpha')).toBe(0);
    expect(await store.count('beta')).toBe(1);
  });

  it('rejects a query vector of the wrong dimensionality', async () => {
    await store.upsert('alpha', [chunk('a.txt', 0, [1, 0])]);

    const error = await store.query('alpha', Float32Array.from([1, 0, 0]), 1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VectorStoreError);
    expect(error).toMatchObject({ transient: false });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries a busy database', async () => {
    vi.spyOn(db, 'prepare').mockImplementationOnce(() => {
      throw busyError();
    });

    expect(await store.count('alpha')).toBe(0);
    expect(sleep).toHaveBeenCalledWith(50);
  });

  it('gives up on a database that stays busy', async () => {
    vi.spyOn(db, 'prepare').mockImplementation(() => {
      throw busyError();
    });

    const error = await store.count('alpha').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VectorStoreError);
    expect(error).toMatchObject({ transient: true });
    expect(sleep.mock.calls).toEqual([[50], [100]]);
  });

  it('wraps other SQLite failures without retrying', async () => {
    db.exec('DROP TABLE chunks');

    await expect(store.count('alpha')).rejects.toThrow(
      'Vector store count failed: no such table: chunks'
    );
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('isTransientSqliteError', () => {
  it('matches busy and locked codes, including extended ones', () => {
    expect(isTransientSqliteError({ code: 'SQLITE_BUSY' })).toBe(true);
    expect(isTransientSqliteError({ code: 'SQLITE_LOCKED_SHAREDCACHE' })).toBe(true);
    expect(isTransientSqliteError({ code: 'SQLITE_CONSTRAINT' })).toBe(false);
    expect(isTransientSqliteError(new Error('plain'))).toBe(false);
  });
});
