/**
 * Cache Module
 *
 * Persistent query/response memo, invalidated per project by ingestion.
 */

export { ResponseCache, type ResponseCacheOptions } from './response-cache.js';
export { cacheKey, normalizeQuery, type CacheParams } from './key.js';
export {
  CachedResponseSchema,
  ChunkReferenceSchema,
  type CachedResponse,
  type ChunkReference,
  type ComputedResponse,
  type CacheStats,
} from './types.js';
