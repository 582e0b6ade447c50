/**
 * OpenAI chat generation
 *
 * Also reaches Ollama through its OpenAI-compatible /v1 endpoint; see
 * resolveEndpoint() in config/providers.ts.
 *
 * SECURITY: the API key is only handed to the SDK client. It never appears
 * in error messages or logs.
 */

import OpenAI from 'openai';
import type { GenerationRequest, GenerationService } from './types.js';

export interface OpenAIGenerationOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  /** Request timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** SDK-level retries (default: 2) */
  maxRetries?: number;
}

/** Default model for answers */
export const DEFAULT_GENERATION_MODEL = 'gpt-4o';

export class OpenAIGenerationService implements GenerationService {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIGenerationOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseURL ? { baseURL: options.baseURL } : {}),
      timeout: options.timeout ?? 60_000,
      maxRetries: options.maxRetries ?? 2,
    });
  }

  async generate(request: GenerationRequest, options: { signal?: AbortSignal } = {}): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: request.temperature,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
      },
      { signal: options.signal }
    );

    return completion.choices[0]?.message.content?.trim() ?? '';
  }
}
