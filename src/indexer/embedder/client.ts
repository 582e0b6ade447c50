/**
 * Embedding Client
 *
 * Wraps an EmbeddingService with the policy ingestion and retrieval rely on:
 *
 * 1. Split input into batches of `batchSize`
 * 2. Time out each call after `timeoutMs`
 * 3. Retry transient failures (408/409/429/5xx, network errors, timeouts)
 *    with exponential backoff
 * 4. Check one vector per input, the configured length, finite values
 * 5. Return Float32Array[] in input order
 *
 * Anything that still fails surfaces as EmbeddingServiceError.
 */

import { EmbeddingServiceError } from '../../errors/index.js';
import { withRetry, RetryError, silentLogger, type Logger } from '../../utils/index.js';
import type { EmbeddingClientOptions, EmbeddingService } from './types.js';

export class EmbeddingTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Embedding request timed out after ${timeoutMs}ms`);
    this.name = 'EmbeddingTimeoutError';
  }
}

const TRANSIENT_STATUS = new Set([408, 409, 429]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Whether a failed embedding call is worth retrying. Works on the openai
 * SDK's errors (which carry `status`) and on raw network errors (`code`).
 */
export function isTransientEmbeddingError(error: unknown): boolean {
  if (error instanceof EmbeddingTimeoutError) {
    return true;
  }
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('status' in error && typeof error.status === 'number') {
    return TRANSIENT_STATUS.has(error.status) || error.status >= 500;
  }
  if ('code' in error && typeof error.code === 'string' && TRANSIENT_NETWORK_CODES.has(error.code)) {
    return true;
  }
  if ('cause' in error && error.cause !== error) {
    return isTransientEmbeddingError(error.cause);
  }
  // openai SDK: APIConnectionError / APIConnectionTimeoutError have no status
  return error instanceof Error && error.name.startsWith('APIConnection');
}

export class EmbeddingClient {
  private readonly logger: Logger;

  constructor(
    private readonly service: EmbeddingService,
    private readonly options: EmbeddingClientOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get model(): string {
    return this.service.model;
  }

  get dimensions(): number {
    return this.service.dimensions;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const vectors: Float32Array[] = [];
    const batchSize = Math.max(1, this.options.batchSize);

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      vectors.push(...(await this.embedBatch(batch, signal)));
    }

    return vectors;
  }

  async embedOne(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text], signal);
    if (!vector) {
      throw new EmbeddingServiceError('Embedding service returned no vector', {
        transient: false,
        attempts: 1,
      });
    }
    return vector;
  }

  private async embedBatch(batch: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    let attempts = 0;
    let raw: number[][];

    try {
      raw = await withRetry(
        (attempt) => {
          attempts = attempt;
          return this.callWithTimeout(batch, signal);
        },
        {
          maxAttempts: this.options.maxAttempts,
          baseDelayMs: this.options.baseDelayMs,
          maxDelayMs: this.options.maxDelayMs,
          isTransient: (error) => !signal?.aborted && isTransientEmbeddingError(error),
          onRetry: (error, attempt, delayMs) =>
            this.logger.debug?.(
              `Embedding batch of ${batch.length} failed (attempt ${attempt}): ${describe(error)}; retrying in ${delayMs}ms`
            ),
          sleep: this.options.sleep,
        }
      );
    } catch (error) {
      if (error instanceof RetryError) {
        throw new EmbeddingServiceError(
          `Embedding failed after ${error.attempts} attempt(s): ${error.message}`,
          { transient: error.transient, attempts: error.attempts, cause: error.cause }
        );
      }
      throw error;
    }

    return this.validate(raw, batch.length, attempts);
  }

  private async callWithTimeout(batch: string[], signal?: AbortSignal): Promise<number[][]> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      onAbort();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new EmbeddingTimeoutError(this.options.timeoutMs));
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([this.service.embed(batch, { signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private validate(raw: number[][], expected: number, attempts: number): Float32Array[] {
    const fail = (message: string): never => {
      throw new EmbeddingServiceError(message, { transient: false, attempts });
    };

    if (raw.length !== expected) {
      fail(`Embedding service returned ${raw.length} vectors for ${expected} inputs`);
    }

    return raw.map((vector, i) => {
      if (vector.length !== this.service.dimensions) {
        fail(
          `Embedding ${i} has ${vector.length} dimensions, expected ${this.service.dimensions} (${this.service.model})`
        );
      }
      if (!vector.every(Number.isFinite)) {
        fail(`Embedding ${i} contains non-finite values`);
      }
      return Float32Array.from(vector);
    });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
