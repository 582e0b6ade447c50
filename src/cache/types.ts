/**
 * Response cache types
 */

import { z } from 'zod';

export const ChunkReferenceSchema = z.object({
  chunkId: z.string(),
  sourcePath: z.string(),
  ordinal: z.number().int().nonnegative(),
  score: z.number(),
});

export type ChunkReference = z.infer<typeof ChunkReferenceSchema>;

export const CachedResponseSchema = z.object({
  answer: z.string(),
  sources: z.array(ChunkReferenceSchema),
  createdAt: z.string(),
});

/**
 * What a cached query produced: the generated text plus the chunks it was
 * built from.
 */
export type CachedResponse = z.infer<typeof CachedResponseSchema>;

/** What `computeFn` returns; the cache stamps `createdAt` */
export type ComputedResponse = Omit<CachedResponse, 'createdAt'>;

export interface CacheStats {
  entries: number;
  byProject: Array<{ project: string; entries: number }>;
  /** Since this cache instance was created */
  hits: number;
  misses: number;
}
