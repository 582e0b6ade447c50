/**
 * Embedder Types
 */

import type { Logger } from '../../utils/index.js';

/**
 * An external embedding service. Implementations make one request per
 * call; batching, timeouts and retries are the EmbeddingClient's job.
 */
export interface EmbeddingService {
  readonly model: string;
  /** Length of every vector the service returns */
  readonly dimensions: number;
  embed(texts: string[], options?: { signal?: AbortSignal }): Promise<number[][]>;
}

export interface EmbeddingClientOptions {
  /** Texts per service call */
  batchSize: number;
  /** Per-call timeout */
  timeoutMs: number;
  /** Attempts per batch, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  logger?: Logger;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
}
