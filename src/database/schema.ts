/**
 * Database Schema Types
 *
 * Domain shapes for the rows in projects and fingerprints, plus the
 * embedding BLOB conversions shared by the vector store.
 */

import { randomUUID } from 'node:crypto';

/**
 * A project: one folder of grant documents with its own collection.
 */
export interface Project {
  id: string;
  /** Unique, user-facing name (usually the folder name) */
  name: string;
  /** Absolute path to the project's document directory */
  path: string;
  /** Vector-store namespace derived from the name */
  collection: string;
  createdAt: string;
  /** Last completed ingestion, null before the first one */
  indexedAt: string | null;
  updatedAt: string;
  fileCount: number;
  chunkCount: number;
  /** Recorded on the first ingestion that stores vectors */
  embeddingModel: string | null;
  embeddingDimensions: number | null;
}

/**
 * What the pipeline remembers about an ingested document.
 */
export interface FingerprintRecord {
  /** Relative to the project root, forward slashes */
  filePath: string;
  /** Lower-case extension without the dot, e.g. "pdf" */
  fileType: string;
  size: number;
  /** "sha256:<hex>" or "stat:<size>:<mtimeMs>" */
  signature: string;
  chunkCount: number;
  indexedAt: string;
  /** Format-specific metadata from the extractor (page count, sheet names) */
  extras: Record<string, string>;
}

export function generateId(): string {
  return randomUUID();
}

/**
 * Convert Float32Array to Buffer for BLOB storage.
 * Respects byteOffset so views into a larger buffer store only their slice.
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Convert a BLOB back to Float32Array.
 * Copies first: Buffers from SQLite are not guaranteed to be 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(blob.byteLength / 4));
}
