/**
 * Search Module
 *
 * Vector persistence and similarity retrieval, scoped per project collection.
 *
 * @example
 * ```typescript
 * import { SqliteVectorStore, Retriever } from './search/index.js';
 *
 * const store = new SqliteVectorStore(db);
 * const retriever = new Retriever(ops, store, embedder);
 * const results = await retriever.retrieve('alpha', 'project budget', 5);
 * ```
 */

export { toCollectionName, withCollectionSuffix } from './collection.js';
export { cosineSimilarity, compareResults } from './ranking.js';
export {
  SqliteVectorStore,
  isTransientSqliteError,
  type VectorStore,
  type SqliteVectorStoreOptions,
} from './store.js';
export { Retriever } from './retriever.js';
export {
  ChunkMetadataSchema,
  chunkId,
  type ChunkMetadata,
  type ChunkInput,
  type RetrievedChunk,
  type RetrievalOutcome,
} from './types.js';
