/**
 * OpenAI embedding service
 *
 * Also serves Ollama through its OpenAI-compatible endpoint
 * (baseURL http://host:11434/v1).
 */

import OpenAI from 'openai';
import type { EmbeddingService } from './types.js';

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  dimensions: number;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  readonly model: string;
  readonly dimensions: number;
  private readonly client: OpenAI;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    // Retries and timeouts are handled by EmbeddingClient
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseURL ? { baseURL: options.baseURL } : {}),
      maxRetries: 0,
    });
  }

  async embed(texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: texts,
        // Only the text-embedding-3 family accepts a requested size
        ...(this.model.startsWith('text-embedding-3') ? { dimensions: this.dimensions } : {}),
      },
      { signal: options.signal }
    );

    // Sort by index to preserve order
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}
