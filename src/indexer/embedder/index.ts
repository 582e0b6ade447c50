/**
 * Embedder Module
 *
 * ```typescript
 * const service = new OpenAIEmbeddingService({ ...resolveEndpoint('openai'), model, dimensions });
 * const client = new EmbeddingClient(service, { batchSize: 64, timeoutMs: 60000, maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000 });
 * const vectors = await client.embed(chunks);
 * ```
 */

export { EmbeddingClient, EmbeddingTimeoutError, isTransientEmbeddingError } from './client.js';
export { OpenAIEmbeddingService, type OpenAIEmbeddingOptions } from './openai.js';
export type { EmbeddingService, EmbeddingClientOptions } from './types.js';
