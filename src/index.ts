/**
 * grant-kb - Library Entry Point
 *
 * The CLI (`grantkb`) covers everyday use. This module exposes the same
 * building blocks for scripts and services that embed the knowledge base.
 *
 * @example
 * ```typescript
 * import { createKnowledgeBase, loadConfig } from 'grant-kb';
 *
 * const kb = createKnowledgeBase(loadConfig());
 * try {
 *   await kb.ingest('alpha');
 *   const answer = await kb.ask('alpha', 'What is the total budget?');
 *   console.log(answer.answer, answer.sources);
 * } finally {
 *   kb.close();
 * }
 * ```
 *
 * @example Lower-level composition
 * ```typescript
 * import { openDatabase, runMigrations, DatabaseOperations, SqliteVectorStore, Retriever } from 'grant-kb';
 *
 * const db = openDatabase(':memory:');
 * runMigrations(db);
 * const retriever = new Retriever(new DatabaseOperations(db), new SqliteVectorStore(db), embedder);
 * ```
 *
 * @packageDocumentation
 */

export {
  KnowledgeBase,
  createKnowledgeBase,
  type KnowledgeBaseOptions,
  type ProjectIngestOptions,
  type RemovedProject,
} from './knowledge-base/index.js';

export {
  loadConfig,
  mergeConfig,
  validateConfig,
  DEFAULT_CONFIG,
  ConfigSchema,
  getGrantKbDir,
  getDbPath,
  getConfigPath,
  resolveProjectsDir,
  type Config,
  type PartialConfig,
  type ProviderType,
} from './config/index.js';

export {
  openDatabase,
  runMigrations,
  DatabaseOperations,
  SchemaValidationError,
  type Project,
  type FingerprintRecord,
} from './database/index.js';

export {
  IngestionPipeline,
  FingerprintTracker,
  computeSignature,
  EmbeddingClient,
  OpenAIEmbeddingService,
  ExtractorRegistry,
  createDefaultRegistry,
  splitText,
  type EmbeddingService,
  type TextExtractor,
  type FingerprintStrategy,
  type IngestOptions,
  type IngestionSummary,
  type DocumentFailure,
  type ProjectIngestionResult,
} from './indexer/index.js';

export {
  SqliteVectorStore,
  Retriever,
  cosineSimilarity,
  type VectorStore,
  type ChunkInput,
  type RetrievedChunk,
  type RetrievalOutcome,
} from './search/index.js';

export { ResponseCache, cacheKey, type CacheParams, type CacheStats, type CachedResponse } from './cache/index.js';

export { AskService, type Answer, type AskOptions } from './agent/index.js';

export { OpenAIGenerationService, type GenerationService, type GenerationRequest } from './providers/index.js';

export {
  CLIError,
  FileNotFoundError,
  ConfigurationError,
  DatabaseError,
  ValidationError,
  ExtractionError,
  EmbeddingServiceError,
  VectorStoreError,
  CacheError,
  ProjectNotFoundError,
  IngestionCancelledError,
} from './errors/index.js';

export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
