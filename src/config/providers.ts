/**
 * Service endpoint resolution
 *
 * Both providers are reached through the openai SDK; Ollama serves an
 * OpenAI-compatible API under /v1 and ignores the key.
 */

import type { ProviderType } from './schema.js';
import { loadEnv, SETUP_INSTRUCTIONS } from './env.js';
import { ConfigurationError } from '../errors/index.js';

export interface ServiceEndpoint {
  apiKey: string;
  /** Undefined means the SDK default (api.openai.com) */
  baseURL?: string;
}

export function resolveEndpoint(provider: ProviderType): ServiceEndpoint {
  const env = loadEnv();

  switch (provider) {
    case 'openai': {
      const apiKey = env.OPENAI_API_KEY?.trim();
      if (!apiKey) {
        throw new ConfigurationError('OpenAI API key not configured', SETUP_INSTRUCTIONS.openai);
      }
      return { apiKey, baseURL: env.OPENAI_BASE_URL };
    }
    case 'ollama':
      return {
        apiKey: 'ollama',
        baseURL: `${env.OLLAMA_HOST.replace(/\/+$/, '')}/v1`,
      };
  }
}
