/**
 * Similarity scoring and result ordering
 */

import type { RetrievedChunk } from './types.js';

/**
 * Cosine similarity, i.e. 1 - cosine distance. A zero vector is similar to
 * nothing (0).
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Descending score, then ascending (sourcePath, ordinal). Paths compare by
 * code unit so the order never depends on the locale.
 */
export function compareResults(a: RetrievedChunk, b: RetrievedChunk): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.sourcePath !== b.sourcePath) {
    return a.sourcePath < b.sourcePath ? -1 : 1;
  }
  return a.ordinal - b.ordinal;
}
