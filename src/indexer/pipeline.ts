/**
 * Ingestion Pipeline
 *
 * Keeps a project's collection in step with its document folder:
 * Diff → Extract → Chunk → Embed → Upsert → Commit fingerprint
 *
 * Design principles:
 * - Unchanged documents cost one stat (or hash) and nothing else
 * - One document failing never stops the others; failures are reported
 * - A fingerprint is committed only after the document's chunks are stored
 * - Any change to the document set invalidates the project's cached answers,
 *   also when the run is cancelled or fails halfway
 *
 * It doesn't know HOW to display progress; it fires callbacks.
 */

import { readdirSync, existsSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';

import type { DatabaseOperations, Project } from '../database/index.js';
import {
  ConfigurationError,
  ExtractionError,
  FileNotFoundError,
  IngestionCancelledError,
} from '../errors/index.js';
import type { VectorStore } from '../search/store.js';
import { chunkId, type ChunkInput } from '../search/types.js';
import { forEachWithConcurrency, silentLogger, type Logger } from '../utils/index.js';
import { splitText, validateChunkSizes } from './chunker/index.js';
import type { EmbeddingClient } from './embedder/index.js';
import { withDocumentHeader, type ExtractorRegistry } from './extract/index.js';
import { FingerprintTracker, type DocumentChange, type FingerprintStrategy } from './fingerprint.js';
import { SUPPORTED_DOCUMENT_EXTENSIONS } from './types.js';

/**
 * Anything that can drop a project's cached answers.
 */
export interface ProjectCacheInvalidator {
  invalidateProject(projectName: string): number;
}

export interface IngestionDependencies {
  ops: DatabaseOperations;
  store: VectorStore;
  embedder: EmbeddingClient;
  registry: ExtractorRegistry;
  cache?: ProjectCacheInvalidator;
  logger?: Logger;
}

export interface IngestionSettings {
  chunkSize: number;
  chunkOverlap: number;
  /** Documents processed at once */
  concurrency: number;
  fingerprint: FingerprintStrategy;
  /** gitignore-style patterns on top of .gitignore / .grantkbignore */
  ignorePatterns?: string[];
}

export interface ProjectSource {
  name: string;
  /** Document directory */
  path: string;
}

export interface IngestOptions {
  /**
   * Drop the collection and all fingerprints first. Required to switch a
   * project to another embedding model.
   */
  force?: boolean;
  signal?: AbortSignal;
  onDocumentStart?: (relativePath: string, change: 'added' | 'modified') => void;
  onDocumentComplete?: (relativePath: string, chunkCount: number) => void;
  onWarning?: (message: string, relativePath?: string) => void;
}

export interface DocumentFailure {
  path: string;
  /** Error class name, e.g. "ExtractionError" */
  kind: string;
  reason: string;
}

export interface IngestionSummary {
  projectName: string;
  documentsAdded: number;
  documentsUpdated: number;
  documentsRemoved: number;
  documentsUnchanged: number;
  chunksWritten: number;
  failures: DocumentFailure[];
  durationMs: number;
}

export type ProjectIngestionResult =
  | { projectName: string; status: 'ok'; summary: IngestionSummary }
  | { projectName: string; status: 'error'; error: Error };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Per-run mutable state shared by the document workers.
 */
interface RunState {
  project: Project;
  summary: IngestionSummary;
  changed: boolean;
}

export class IngestionPipeline {
  private readonly tracker: FingerprintTracker;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError for invalid chunk sizes
   */
  constructor(
    private readonly deps: IngestionDependencies,
    private readonly settings: IngestionSettings
  ) {
    validateChunkSizes(settings.chunkSize, settings.chunkOverlap);
    this.tracker = new FingerprintTracker({
      strategy: settings.fingerprint,
      scan: {
        // Known formats without an extractor are scanned so they get reported
        extensions: [...new Set([...SUPPORTED_DOCUMENT_EXTENSIONS, ...deps.registry.extensions()])],
        additionalIgnorePatterns: settings.ignorePatterns,
      },
    });
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Ingest one project, creating it on first use.
   *
   * @throws ConfigurationError when the project's vectors came from another
   *   embedding model and `force` is not set
   * @throws FileNotFoundError when the document directory is missing
   * @throws IngestionCancelledError when `signal` aborts
   */
  async ingest(source: ProjectSource, options: IngestOptions = {}): Promise<IngestionSummary> {
    const started = performance.now();
    const { ops, store, embedder } = this.deps;
    const { signal } = options;

    if (signal?.aborted) {
      throw new IngestionCancelledError();
    }

    const projectPath = resolve(source.path);
    // Checked before the project row is created or its path replaced
    if (!existsSync(projectPath) || !statSync(projectPath).isDirectory()) {
      throw new FileNotFoundError(projectPath);
    }
    let project = ops.getProjectByName(source.name) ?? ops.createProject({ name: source.name, path: projectPath });
    if (project.path !== projectPath) {
      project = ops.updateProjectPath(project.id, projectPath);
    }

    const state: RunState = {
      project,
      changed: false,
      summary: {
        projectName: project.name,
        documentsAdded: 0,
        documentsUpdated: 0,
        documentsRemoved: 0,
        documentsUnchanged: 0,
        chunksWritten: 0,
        failures: [],
        durationMs: 0,
      },
    };

    try {
      const mismatch =
        project.embeddingModel !== null &&
        (project.embeddingModel !== embedder.model || project.embeddingDimensions !== embedder.dimensions);

      if (mismatch && !options.force) {
        throw new ConfigurationError(
          `Project ${project.name} holds vectors from ${project.embeddingModel} ` +
            `(${project.embeddingDimensions} dimensions); the configured model is ` +
            `${embedder.model} (${embedder.dimensions} dimensions)`,
          `Run: grantkb ingest ${project.name} --force  to re-embed every document`
        );
      }

      if (options.force) {
        const dropped = await store.dropCollection(project.collection);
        const cleared = ops.clearFingerprints(project.id);
        state.changed = dropped > 0 || cleared > 0;
        this.logger.debug?.(`Force: dropped ${dropped} chunks and ${cleared} fingerprints of ${project.name}`);
      }

      if (options.force || project.embeddingModel === null) {
        state.project = ops.setProjectEmbedding(project.id, embedder.model, embedder.dimensions);
      }

      const diff = await this.tracker.diff(projectPath, ops.getFingerprints(project.id));
      state.summary.documentsUnchanged = diff.unchanged.length;

      for (const { document, error } of diff.unreadable) {
        const failure = new ExtractionError(document.relativePath, error.message, error);
        this.recordFailure(state, document.relativePath, failure, options);
      }

      for (const record of diff.removed) {
        await store.deleteByDocument(project.collection, record.filePath);
        ops.deleteFingerprint(project.id, record.filePath);
        state.changed = true;
        state.summary.documentsRemoved++;
      }

      const work: Array<{ change: DocumentChange; kind: 'added' | 'modified' }> = [
        ...diff.added.map((change) => ({ change, kind: 'added' as const })),
        ...diff.modified.map((change) => ({ change, kind: 'modified' as const })),
      ];

      await forEachWithConcurrency(
        work,
        this.settings.concurrency,
        ({ change, kind }) => this.processDocument(state, change, kind, options),
        signal
      );

      if (signal?.aborted) {
        throw new IngestionCancelledError();
      }
    } finally {
      if (state.changed) {
        const invalidated = this.deps.cache?.invalidateProject(project.name) ?? 0;
        this.logger.debug?.(`Invalidated ${invalidated} cached responses for ${project.name}`);
      }
    }

    ops.updateProjectStats(project.id, {
      fileCount: ops.countFingerprints(project.id),
      chunkCount: await store.count(project.collection),
      indexedAt: new Date().toISOString(),
    });

    state.summary.durationMs = Math.round(performance.now() - started);
    return state.summary;
  }

  /**
   * Ingest every immediate sub-folder of `projectsDir` as a project named
   * after the folder. One project failing does not stop the rest;
   * cancellation does.
   */
  async ingestAll(projectsDir: string, options: IngestOptions = {}): Promise<ProjectIngestionResult[]> {
    const root = resolve(projectsDir);
    if (!existsSync(root) || !statSync(root).isDirectory()) {
      throw new FileNotFoundError(root);
    }

    const folders = readdirSync(root, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();

    const results: ProjectIngestionResult[] = [];

    for (const name of folders) {
      try {
        const summary = await this.ingest({ name, path: join(root, name) }, options);
        results.push({ projectName: name, status: 'ok', summary });
      } catch (error) {
        if (error instanceof IngestionCancelledError) {
          throw error;
        }
        this.logger.warn(`Ingestion of ${name} failed: ${toError(error).message}`);
        results.push({ projectName: name, status: 'error', error: toError(error) });
      }
    }

    return results;
  }

  private async processDocument(
    state: RunState,
    change: DocumentChange,
    kind: 'added' | 'modified',
    options: IngestOptions
  ): Promise<void> {
    const { ops, store, embedder, registry } = this.deps;
    const { document, signature } = change;
    const { project } = state;
    const { signal } = options;

    options.onDocumentStart?.(document.relativePath, kind);

    try {
      const extracted = await registry.extract(document);
      const extras = extracted.extras ?? {};
      const pieces = splitText(
        withDocumentHeader(document.relativePath, project.name, extracted.text),
        this.settings.chunkSize,
        this.settings.chunkOverlap
      );

      const vectors = pieces.length > 0 ? await embedder.embed(pieces, signal) : [];

      // Nothing stored yet: leave the document for the next run
      if (signal?.aborted) {
        return;
      }

      const chunks: ChunkInput[] = pieces.map((content, ordinal) => {
        const embedding = vectors[ordinal];
        if (!embedding) {
          throw new Error(`Missing embedding for chunk ${ordinal}`);
        }
        return {
          id: chunkId(document.relativePath, ordinal),
          sourcePath: document.relativePath,
          ordinal,
          content,
          embedding,
          metadata: { ...extras, fileType: document.extension, totalChunks: pieces.length },
        };
      });

      state.changed = true;
      await store.upsert(project.collection, chunks);
      await store.deleteFromOrdinal(project.collection, document.relativePath, chunks.length);

      ops.commitFingerprint(project.id, {
        filePath: document.relativePath,
        fileType: document.extension,
        size: document.size,
        signature,
        chunkCount: chunks.length,
        indexedAt: new Date().toISOString(),
        extras,
      });

      if (kind === 'added') {
        state.summary.documentsAdded++;
      } else {
        state.summary.documentsUpdated++;
      }
      state.summary.chunksWritten += chunks.length;
      options.onDocumentComplete?.(document.relativePath, chunks.length);
    } catch (error) {
      // Failures caused by cancellation are not document failures
      if (signal?.aborted) {
        return;
      }
      this.recordFailure(state, document.relativePath, error, options);
    }
  }

  private recordFailure(state: RunState, path: string, error: unknown, options: IngestOptions): void {
    const err = toError(error);
    const failure: DocumentFailure = { path, kind: err.name, reason: err.message };
    state.summary.failures.push(failure);
    options.onWarning?.(`${failure.kind}: ${failure.reason}`, path);
    this.logger.debug?.(`Skipped ${path}: ${failure.reason}`);
  }
}
