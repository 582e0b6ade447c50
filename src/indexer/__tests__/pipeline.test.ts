/**
 * Ingestion Pipeline Tests
 *
 * Real temp folders, in-memory SQLite, fake embedding service.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { join } from 'node:path';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';

import { runMigrations } from '../../database/migrate.js';
import { ChunkRowSchema, validateRows } from '../../database/validation.js';
import { DatabaseOperations } from '../../database/operations.js';
import {
  ConfigurationError,
  FileNotFoundError,
  IngestionCancelledError,
} from '../../errors/index.js';
import { SqliteVectorStore } from '../../search/store.js';
import { FakeEmbeddingService } from '../../test-utils/index.js';
import { EmbeddingClient } from '../embedder/index.js';
import { createDefaultRegistry } from '../extract/index.js';
import { IngestionPipeline, type IngestionSettings } from '../pipeline.js';

describe('IngestionPipeline', () => {
  let tempDir: string;
  let projectDir: string;
  let db: Database.Database;
  let ops: DatabaseOperations;
  let store: SqliteVectorStore;
  let service: FakeEmbeddingService;
  let cache: { invalidateProject: Mock<(name: string) => number> };

  function createPipeline(
    embeddingService: FakeEmbeddingService = service,
    settings: Partial<IngestionSettings> = {}
  ): IngestionPipeline {
    const embedder = new EmbeddingClient(embeddingService, {
      batchSize: 8,
      timeoutMs: 1000,
      maxAttempts: 1,
      baseDelayMs: 0,
      maxDelayMs: 0,
    });
    return new IngestionPipeline(
      { ops, store, embedder, registry: createDefaultRegistry(), cache },
      { chunkSize: 1000, chunkOverlap: 200, concurrency: 2, fingerprint: 'content-hash', ...settings }
    );
  }

  function write(relativePath: string, content: string): void {
    writeFileSync(join(projectDir, relativePath), content);
  }

  function storedChunks(): Array<{ id: string; content: string }> {
    const collection = ops.getProjectByName('alpha')?.collection ?? '';
    const rows = db
      .prepare('SELECT * FROM chunks WHERE collection = ? ORDER BY source_path, ordinal')
      .all(collection);
    return validateRows(ChunkRowSchema, rows, 'chunks').map(({ id, content }) => ({ id, content }));
  }

  const alpha = (): { name: string; path: string } => ({ name: 'alpha', path: projectDir });

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'grantkb-pipeline-'));
    projectDir = join(tempDir, 'alpha');
    mkdirSync(projectDir);
    db = new Database(':memory:');
    db.pragma('foreign_keys = ON');
    runMigrations(db);
    ops = new DatabaseOperations(db);
    store = new SqliteVectorStore(db);
    service = new FakeEmbeddingService();
    cache = { invalidateProject: vi.fn((_name: string) => 0) };
  });

  afterEach(() => {
    db.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('ingests new documents and records the project', async () => {
    write('proposal.txt', 'Budget: $50,000 for education.');
    write('notes.md', 'Timeline: six months.');

    const summary = await createPipeline().ingest(alpha());

    expect(summary).toMatchObject({
      projectName: 'alpha',
      documentsAdded: 2,
      documentsUpdated: 0,
      documentsRemoved: 0,
      documentsUnchanged: 0,
      chunksWritten: 2,
      failures: [],
    });
    expect(storedChunks()).toEqual([
      { id: 'notes.md#0', content: 'File: notes.md\nLocation: alpha\n\nTimeline: six months.' },
      { id: 'proposal.txt#0', content: 'File: proposal.txt\nLocation: alpha\n\nBudget: $50,000 for education.' },
    ]);

    const project = ops.getProjectByName('alpha');
    expect(project).toMatchObject({
      fileCount: 2,
      chunkCount: 2,
      embeddingModel: 'fake-embedding',
      embeddingDimensions: 64,
    });
    expect(project?.indexedAt).not.toBeNull();
    expect(cache.invalidateProject).toHaveBeenCalledWith('alpha');
  });

  it('makes no embedding calls when nothing changed', async () => {
    write('proposal.txt', 'Budget: $50,000 for education.');
    const pipeline = createPipeline();
    await pipeline.ingest(alpha());
    const before = storedChunks();
    const calls = service.calls;
    cache.invalidateProject.mockClear();

    const summary = await pipeline.ingest(alpha());

    expect(service.calls).toBe(calls);
    expect(summary).toMatchObject({ documentsAdded: 0, documentsUpdated: 0, documentsUnchanged: 1, chunksWritten: 0 });
    expect(storedChunks()).toEqual(before);
    expect(cache.invalidateProject).not.toHaveBeenCalled();
  });

  it('re-embeds only the modified document', async () => {
    write('proposal.txt', 'Budget: $50,000 for education.');
    write('notes.md', 'Timeline: six months.');
    const pipeline = createPipeline();
    await pipeline.ingest(alpha());
    const embeddedBefore = service.embeddedTexts.length;

    write('proposal.txt', 'Budget: $50,000 for education. Timeline: one year.');
    const summary = await pipeline.ingest(alpha());

    expect(summary).toMatchObject({ documentsUpdated: 1, documentsUnchanged: 1, chunksWritten: 1 });
    expect(service.embeddedTexts.slice(embeddedBefore)).toEqual([
      'File: proposal.txt\nLocation: alpha\n\nBudget: $50,000 for education. Timeline: one year.',
    ]);
  });

  it('removes chunks and fingerprints of deleted documents', async () => {
    write('proposal.txt', 'Budget: $50,000 for education.');
    write('notes.md', 'Timeline: six months.');
    const pipeline = createPipeline();
    await pipeline.ingest(alpha());

    rmSync(join(projectDir, 'notes.md'));
    cache.invalidateProject.mockClear();
    const summary = await pipeline.ingest(alpha());

    expect(summary.documentsRemoved).toBe(1);
    expect(storedChunks().map((c) => c.id)).toEqual(['proposal.txt#0']);
    const project = ops.getProjectByName('alpha');
    expect([...ops.getFingerprints(project?.id ?? '').keys()]).toEqual(['proposal.txt']);
    expect(project).toMatchObject({ fileCount: 1, chunkCount: 1 });
    expect(cache.invalidateProject).toHaveBeenCalledTimes(1);
  });

  it('deletes trailing chunks when a document shrinks', async () => {
    write('long.txt', 'word '.repeat(100));
    const pipeline = createPipeline(service, { chunkSize: 50, chunkOverlap: 10 });
    const first = await pipeline.ingest(alpha());
    expect(first.chunksWritten).toBeGreaterThan(1);

    write('long.txt', 'short');
    await pipeline.ingest(alpha());

    expect(storedChunks()).toEqual([
      { id: 'long.txt#0', content: 'File: long.txt\nLocation: alpha\n\nshort' },
    ]);
  });

  it('commits empty documents with zero chunks and no embedding call', async () => {
    write('empty.txt', '   \n');

    const summary = await createPipeline().ingest(alpha());

    expect(summary).toMatchObject({ documentsAdded: 1, chunksWritten: 0, failures: [] });
    expect(service.calls).toBe(0);
    const project = ops.getProjectByName('alpha');
    expect(ops.getFingerprints(project?.id ?? '').get('empty.txt')?.chunkCount).toBe(0);
  });

  it('reports documents without an extractor and carries on', async () => {
    write('scan.pdf', '%PDF-1.4');
    write('proposal.txt', 'Budget: $50,000 for education.');
    const onWarning = vi.fn();

    const summary = await createPipeline().ingest(alpha(), { onWarning });

    expect(summary.documentsAdded).toBe(1);
    expect(summary.failures).toEqual([
      {
        path: 'scan.pdf',
        kind: 'ExtractionError',
        reason: 'Failed to extract text from scan.pdf: no extractor registered for .pdf',
      },
    ]);
    expect(onWarning).toHaveBeenCalledWith(
      'ExtractionError: Failed to extract text from scan.pdf: no extractor registered for .pdf',
      'scan.pdf'
    );
  });

  it('does not commit a document whose embedding failed, so the next run retries it', async () => {
    write('proposal.txt', 'Budget: $50,000 for education.');
    service.failNext(Object.assign(new Error('Bad request'), { status: 400 }));
    const pipeline = createPipeline();

    const failed = await pipeline.ingest(alpha());

    expect(failed.failures).toEqual([
      {
        path: 'proposal.txt',
        kind: 'EmbeddingServiceError',
        reason: 'Embedding failed after 1 attempt(s): Bad request',
      },
    ]);
    expect(ops.getProjectByName('alpha')?.fileCount).toBe(0);

    const retried = await pipeline.ingest(alpha());
    expect(retried).toMatchObject({ documentsAdded: 1, failures: [] });
  });

  it('refuses vectors from another embedding model unless forced', async () => {
    write('proposal.txt', 'Budget: $50,000 for education.');
    await createPipeline().ingest(alpha());
    const other = new FakeEmbeddingService({ model: 'fake-large', dimensions: 32 });

    await expect(createPipeline(other).ingest(alpha())).rejects.toBeInstanceOf(ConfigurationError);
    expect(other.calls).toBe(0);

    const summary = await createPipeline(other).ingest(alpha(), { force: true });

    expect(summary).toMatchObject({ documentsAdded: 1, chunksWritten: 1 });
    expect(ops.getProjectByName('alpha')).toMatchObject({
      embeddingModel: 'fake-large',
      embeddingDimensions: 32,
      chunkCount: 1,
    });
  });

  it('stops between documents when cancelled and keeps committed work', async () => {
    write('a.txt', 'first');
    write('b.txt', 'second');
    write('c.txt', 'third');
    const controller = new AbortController();
    const pipeline = createPipeline(service, { concurrency: 1 });

    await expect(
      pipeline.ingest(alpha(), {
        signal: controller.signal,
        onDocumentComplete: () => controller.abort(),
      })
    ).rejects.toBeInstanceOf(IngestionCancelledError);

    expect(cache.invalidateProject).toHaveBeenCalledWith('alpha');
    const project = ops.getProjectByName('alpha');
    expect([...ops.getFingerprints(project?.id ?? '').keys()]).toEqual(['a.txt']);

    const resumed = await pipeline.ingest(alpha());
    expect(resumed).toMatchObject({ documentsAdded: 2, documentsUnchanged: 1 });
  });

  it('rejects an already-aborted signal before doing anything', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createPipeline().ingest(alpha(), { signal: controller.signal })).rejects.toBeInstanceOf(
      IngestionCancelledError
    );
    expect(ops.listProjects()).toEqual([]);
  });

  it('creates no project when the document folder is missing', async () => {
    const missing = join(tempDir, 'no-such-folder');

    await expect(createPipeline().ingest({ name: 'typo', path: missing })).rejects.toBeInstanceOf(
      FileNotFoundError
    );
    expect(ops.listProjects()).toEqual([]);
  });

  it('keeps the stored path when re-ingested from a missing folder', async () => {
    write('proposal.txt', 'Budget: $50,000 for education.');
    const pipeline = createPipeline();
    await pipeline.ingest(alpha());

    await expect(
      pipeline.ingest({ name: 'alpha', path: join(tempDir, 'no-such-folder') })
    ).rejects.toBeInstanceOf(FileNotFoundError);

    expect(ops.getProjectByName('alpha')?.path).toBe(projectDir);
  });

  it('fires start and complete callbacks per document', async () => {
    write('proposal.txt', 'Budget: $50,000 for education.');
    const onDocumentStart = vi.fn();
    const onDocumentComplete = vi.fn();

    await createPipeline().ingest(alpha(), { onDocumentStart, onDocumentComplete });

    expect(onDocumentStart).toHaveBeenCalledWith('proposal.txt', 'added');
    expect(onDocumentComplete).toHaveBeenCalledWith('proposal.txt', 1);
  });

  it('rejects invalid chunk settings up front', () => {
    expect(() => createPipeline(service, { chunkSize: 100, chunkOverlap: 100 })).toThrow(ConfigurationError);
  });

  describe('ingestAll', () => {
    it('ingests every sub-folder as a project', async () => {
      write('proposal.txt', 'Budget: $50,000 for education.');
      mkdirSync(join(tempDir, 'beta'));
      writeFileSync(join(tempDir, 'beta', 'plan.txt'), 'Plan');
      mkdirSync(join(tempDir, '.hidden'));
      writeFileSync(join(tempDir, 'loose.txt'), 'not a project');

      const results = await createPipeline().ingestAll(tempDir);

      expect(results.map((r) => [r.projectName, r.status])).toEqual([
        ['alpha', 'ok'],
        ['beta', 'ok'],
      ]);
      expect(ops.listProjects().map((p) => p.name)).toEqual(['alpha', 'beta']);
    });

    it('reports a failing project and continues with the rest', async () => {
      write('proposal.txt', 'Budget: $50,000 for education.');
      mkdirSync(join(tempDir, 'beta'));
      writeFileSync(join(tempDir, 'beta', 'plan.txt'), 'Plan');
      await createPipeline().ingest(alpha());
      const other = new FakeEmbeddingService({ model: 'fake-large', dimensions: 32 });

      const results = await createPipeline(other).ingestAll(tempDir);

      expect(results[0]).toMatchObject({ projectName: 'alpha', status: 'error' });
      expect(results[1]).toMatchObject({ projectName: 'beta', status: 'ok' });
    });

    it('fails when the projects folder is missing', async () => {
      await expect(createPipeline().ingestAll(join(tempDir, 'missing'))).rejects.toBeInstanceOf(
        FileNotFoundError
      );
    });
  });
});
