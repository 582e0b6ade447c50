/**
 * Test Utilities Module
 *
 * Shared stand-ins for the embedding and generation services.
 *
 * @example
 * ```typescript
 * import { FakeEmbeddingService } from '../test-utils/index.js';
 *
 * const service = new FakeEmbeddingService({ dimensions: 16 });
 * ```
 */

export {
  FakeEmbeddingService,
  FakeGenerationService,
  bagOfWords,
  tokenize,
  type FakeEmbeddingOptions,
} from './fakes.js';
