/**
 * Search Module Types
 */

import { z } from 'zod';

/**
 * Per-chunk metadata: `fileType`, `totalChunks`, plus extractor extras
 * such as page counts.
 */
export const ChunkMetadataSchema = z.record(z.union([z.string(), z.number()]));

export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>;

/**
 * A chunk ready to be written to a collection.
 */
export interface ChunkInput {
  /** `<sourcePath>#<ordinal>`, stable across re-ingestion */
  id: string;
  sourcePath: string;
  ordinal: number;
  content: string;
  embedding: Float32Array;
  metadata: ChunkMetadata;
}

/**
 * A chunk returned by a similarity query.
 */
export interface RetrievedChunk {
  chunkId: string;
  text: string;
  /** Relative to the project root */
  sourcePath: string;
  ordinal: number;
  /** 1 - cosine distance; higher is more similar */
  score: number;
  metadata: ChunkMetadata;
}

/**
 * Outcome of one query in a batch. An error is never reported as an empty
 * result list.
 */
export type RetrievalOutcome =
  | { status: 'ok'; query: string; results: RetrievedChunk[] }
  | { status: 'error'; query: string; error: Error };

export function chunkId(sourcePath: string, ordinal: number): string {
  return `${sourcePath}#${ordinal}`;
}
