/**
 * In-process stand-ins for the external services.
 *
 * FakeEmbeddingService hashes words into buckets, so texts sharing words
 * get similar vectors and retrieval order is predictable in tests.
 */

import type { EmbeddingService } from '../indexer/embedder/types.js';
import type { GenerationRequest, GenerationService } from '../providers/types.js';

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function bucket(token: string, dimensions: number): number {
  // FNV-1a
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash % dimensions;
}

export function bagOfWords(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of tokenize(text)) {
    const index = bucket(token, dimensions);
    vector[index] = (vector[index] ?? 0) + 1;
  }
  return vector;
}

export interface FakeEmbeddingOptions {
  model?: string;
  dimensions?: number;
}

export class FakeEmbeddingService implements EmbeddingService {
  readonly model: string;
  readonly dimensions: number;
  /** Every batch passed to embed(), in call order */
  readonly batches: string[][] = [];
  private readonly failures: unknown[] = [];

  constructor(options: FakeEmbeddingOptions = {}) {
    this.model = options.model ?? 'fake-embedding';
    this.dimensions = options.dimensions ?? 64;
  }

  get calls(): number {
    return this.batches.length;
  }

  get embeddedTexts(): string[] {
    return this.batches.flat();
  }

  /** Make the next `times` calls reject with `error` */
  failNext(error: unknown, times = 1): this {
    for (let i = 0; i < times; i++) {
      this.failures.push(error);
    }
    return this;
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }
    return texts.map((text) => bagOfWords(text, this.dimensions));
  }
}

export class FakeGenerationService implements GenerationService {
  readonly model: string;
  readonly requests: GenerationRequest[] = [];

  constructor(
    private readonly reply: (request: GenerationRequest) => string = () => 'fake answer',
    model = 'fake-chat'
  ) {
    this.model = model;
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.reply(request);
  }
}
