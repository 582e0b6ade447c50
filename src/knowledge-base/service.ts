/**
 * Knowledge Base Service
 *
 * Composes the database, vector store, embedding client, ingestion
 * pipeline, retriever, response cache and ask service for one process.
 * Construct it once with createKnowledgeBase() and call close() on
 * shutdown; nothing here is a module-level singleton.
 *
 * Network-backed services are built on first use, so listing or removing
 * projects works without an API key.
 */

import { join } from 'node:path';
import type Database from 'better-sqlite3';

import { AskService, type Answer, type AskOptions } from '../agent/index.js';
import { ResponseCache, type CacheStats } from '../cache/index.js';
import { getDbPath, resolveEndpoint, resolveProjectsDir, type Config } from '../config/index.js';
import {
  DatabaseOperations,
  openDatabase,
  runMigrations,
  type Project,
} from '../database/index.js';
import { DatabaseError, ProjectNotFoundError } from '../errors/index.js';
import {
  EmbeddingClient,
  IngestionPipeline,
  OpenAIEmbeddingService,
  createDefaultRegistry,
  type EmbeddingService,
  type ExtractorRegistry,
  type IngestOptions,
  type IngestionSummary,
  type ProjectIngestionResult,
} from '../indexer/index.js';
import { OpenAIGenerationService, type GenerationService } from '../providers/index.js';
import {
  Retriever,
  SqliteVectorStore,
  type RetrievalOutcome,
  type RetrievedChunk,
} from '../search/index.js';
import { consoleLogger, type Logger } from '../utils/index.js';

export interface KnowledgeBaseOptions {
  /** Defaults to ~/.grantkb/grantkb.db; ':memory:' for tests */
  dbPath?: string;
  /** Defaults to the configured OpenAI/Ollama embedding model */
  embeddingService?: EmbeddingService;
  /** Defaults to the configured OpenAI/Ollama chat model */
  generationService?: GenerationService;
  /** Defaults to plain text and markdown only */
  registry?: ExtractorRegistry;
  logger?: Logger;
}

export interface ProjectIngestOptions extends IngestOptions {
  /** Document folder; defaults to the stored path, then projects_dir/<name> */
  path?: string;
}

export interface RemovedProject {
  projectName: string;
  chunksRemoved: number;
  fingerprintsRemoved: number;
  cacheEntriesRemoved: number;
}

export class KnowledgeBase {
  private readonly ops: DatabaseOperations;
  private readonly store: SqliteVectorStore;
  private readonly cache: ResponseCache;
  private readonly registry: ExtractorRegistry;
  private readonly logger: Logger;
  private closed = false;

  private embeddingClient?: EmbeddingClient;
  private pipelineInstance?: IngestionPipeline;
  private retrieverInstance?: Retriever;
  private askService?: AskService;

  constructor(
    readonly config: Config,
    private readonly db: Database.Database,
    private readonly options: KnowledgeBaseOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.ops = new DatabaseOperations(db);
    this.store = new SqliteVectorStore(db, {
      maxAttempts: config.embedding.max_attempts,
      baseDelayMs: config.embedding.base_delay_ms,
      maxDelayMs: config.embedding.max_delay_ms,
      logger: this.logger,
    });
    this.cache = new ResponseCache(db, { logger: this.logger });
    this.registry = options.registry ?? createDefaultRegistry();
  }

  get projectsDir(): string {
    return resolveProjectsDir(this.config.projects_dir);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Ingestion
  // ─────────────────────────────────────────────────────────────────────────────

  async ingest(projectName: string, options: ProjectIngestOptions = {}): Promise<IngestionSummary> {
    this.assertOpen();
    const { path, ...ingestOptions } = options;
    const projectPath =
      path ?? this.ops.getProjectByName(projectName)?.path ?? join(this.projectsDir, projectName);
    return this.pipeline().ingest({ name: projectName, path: projectPath }, ingestOptions);
  }

  async ingestAll(options: IngestOptions = {}): Promise<ProjectIngestionResult[]> {
    this.assertOpen();
    return this.pipeline().ingestAll(this.projectsDir, options);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────────

  async search(projectName: string, query: string, topK?: number, signal?: AbortSignal): Promise<RetrievedChunk[]> {
    this.assertOpen();
    return this.retriever().retrieve(projectName, query, topK ?? this.config.search.top_k, signal);
  }

  async searchBatch(projectName: string, queries: string[], topK?: number): Promise<RetrievalOutcome[]> {
    this.assertOpen();
    return this.retriever().retrieveBatch(projectName, queries, topK ?? this.config.search.top_k);
  }

  async ask(projectName: string, question: string, options: AskOptions = {}): Promise<Answer> {
    this.assertOpen();
    if (!this.askService) {
      this.askService = new AskService(this.retriever(), this.generator(), this.cache, {
        defaultTopK: this.config.search.top_k,
        temperature: this.config.generation.temperature,
      });
    }
    return this.askService.ask(projectName, question, options);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Projects & cache
  // ─────────────────────────────────────────────────────────────────────────────

  listProjects(): Project[] {
    this.assertOpen();
    return this.ops.listProjects();
  }

  getProject(projectName: string): Project | undefined {
    this.assertOpen();
    return this.ops.getProjectByName(projectName);
  }

  /**
   * Delete a project with its chunks, fingerprints and cached answers.
   * The document folder is left alone.
   *
   * @throws ProjectNotFoundError
   */
  async removeProject(projectName: string): Promise<RemovedProject> {
    this.assertOpen();
    const project = this.ops.getProjectByName(projectName);
    if (!project) {
      throw new ProjectNotFoundError(projectName);
    }

    const chunksRemoved = await this.store.dropCollection(project.collection);
    const cacheEntriesRemoved = this.cache.invalidateProject(project.name);
    const fingerprintsRemoved = this.ops.deleteProject(project.id);

    return { projectName: project.name, chunksRemoved, fingerprintsRemoved, cacheEntriesRemoved };
  }

  clearCache(): number {
    this.assertOpen();
    return this.cache.clear();
  }

  cacheStats(): CacheStats {
    this.assertOpen();
    return this.cache.stats();
  }

  /**
   * Close the database. Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Lazily built services
  // ─────────────────────────────────────────────────────────────────────────────

  private assertOpen(): void {
    if (this.closed) {
      throw new DatabaseError('Knowledge base is closed');
    }
  }

  private embedder(): EmbeddingClient {
    if (!this.embeddingClient) {
      const { embedding } = this.config;
      const service =
        this.options.embeddingService ??
        new OpenAIEmbeddingService({
          ...resolveEndpoint(embedding.provider),
          model: embedding.model,
          dimensions: embedding.dimensions,
        });
      this.embeddingClient = new EmbeddingClient(service, {
        batchSize: embedding.batch_size,
        timeoutMs: embedding.timeout_ms,
        maxAttempts: embedding.max_attempts,
        baseDelayMs: embedding.base_delay_ms,
        maxDelayMs: embedding.max_delay_ms,
        logger: this.logger,
      });
    }
    return this.embeddingClient;
  }

  private generator(): GenerationService {
    if (this.options.generationService) {
      return this.options.generationService;
    }
    const { generation } = this.config;
    return new OpenAIGenerationService({
      ...resolveEndpoint(generation.provider),
      model: generation.model,
    });
  }

  private pipeline(): IngestionPipeline {
    if (!this.pipelineInstance) {
      const { chunking, ingestion } = this.config;
      this.pipelineInstance = new IngestionPipeline(
        {
          ops: this.ops,
          store: this.store,
          embedder: this.embedder(),
          registry: this.registry,
          cache: this.cache,
          logger: this.logger,
        },
        {
          chunkSize: chunking.chunk_size,
          chunkOverlap: chunking.chunk_overlap,
          concurrency: ingestion.concurrency,
          fingerprint: ingestion.fingerprint,
          ignorePatterns: ingestion.ignore_patterns,
        }
      );
    }
    return this.pipelineInstance;
  }

  private retriever(): Retriever {
    if (!this.retrieverInstance) {
      this.retrieverInstance = new Retriever(this.ops, this.store, this.embedder());
    }
    return this.retrieverInstance;
  }
}

/**
 * Open the database, apply migrations and build the service.
 *
 * @throws DatabaseError when a migration fails
 */
export function createKnowledgeBase(config: Config, options: KnowledgeBaseOptions = {}): KnowledgeBase {
  const db = openDatabase(options.dbPath ?? getDbPath());

  const migrations = runMigrations(db);
  const [failed] = migrations.failed;
  if (failed) {
    db.close();
    throw new DatabaseError(`Migration ${failed.name} failed: ${failed.error}`);
  }

  return new KnowledgeBase(config, db, options);
}
