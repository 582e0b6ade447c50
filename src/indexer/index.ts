/**
 * Indexer Module
 *
 * Document discovery, change detection, extraction, chunking, embedding and
 * the ingestion pipeline that ties them together.
 *
 * @example
 * ```ts
 * import { IngestionPipeline, createDefaultRegistry } from './indexer/index.js';
 *
 * const pipeline = new IngestionPipeline(
 *   { ops, store, embedder, registry: createDefaultRegistry(), cache },
 *   { chunkSize: 1000, chunkOverlap: 200, concurrency: 4, fingerprint: 'content-hash' }
 * );
 * const summary = await pipeline.ingest({ name: 'alpha', path: '/grants/alpha' });
 * console.log(`${summary.chunksWritten} chunks written`);
 * ```
 */

export { scanDocuments, buildGlobPattern } from './scanner.js';
export {
  createIgnoreFilter,
  loadIgnoreFile,
  parseIgnoreContent,
  IGNORE_FILES,
} from './ignore.js';
export {
  SUPPORTED_DOCUMENT_EXTENSIONS,
  DEFAULT_IGNORE_PATTERNS,
  type DocumentInfo,
  type ScanOptions,
} from './types.js';

export {
  FingerprintTracker,
  computeSignature,
  type FingerprintStrategy,
  type FingerprintDiff,
  type DocumentChange,
  type FingerprintTrackerOptions,
} from './fingerprint.js';

export {
  IngestionPipeline,
  type IngestionDependencies,
  type IngestionSettings,
  type IngestOptions,
  type IngestionSummary,
  type DocumentFailure,
  type ProjectSource,
  type ProjectIngestionResult,
  type ProjectCacheInvalidator,
} from './pipeline.js';

export * from './chunker/index.js';
export * from './embedder/index.js';
export * from './extract/index.js';
