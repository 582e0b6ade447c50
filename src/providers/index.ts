/**
 * Providers Module
 *
 * Chat models used to phrase answers from retrieved context.
 */

export {
  OpenAIGenerationService,
  DEFAULT_GENERATION_MODEL,
  type OpenAIGenerationOptions,
} from './openai.js';
export type { GenerationService, GenerationRequest } from './types.js';
