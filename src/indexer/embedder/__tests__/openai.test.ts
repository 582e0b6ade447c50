/**
 * OpenAI embedding service tests (SDK mocked)
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { create, OpenAIMock } = vi.hoisted(() => {
  const create = vi.fn();
  const OpenAIMock = vi.fn().mockImplementation(() => ({ embeddings: { create } }));
  return { create, OpenAIMock };
});

vi.mock('openai', () => ({ default: OpenAIMock }));

import { OpenAIEmbeddingService } from '../openai.js';

describe('OpenAIEmbeddingService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns vectors in input order regardless of response order', async () => {
    create.mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    });
    const service = new OpenAIEmbeddingService({
      apiKey: 'test-secret',
      model: 'text-embedding-3-small',
      dimensions: 2,
    });

    await expect(service.embed(['first', 'second'])).resolves.toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('requests a size only from text-embedding-3 models', async () => {
    create.mockResolvedValue({ data: [{ index: 0, embedding: [1, 0] }] });

    await new OpenAIEmbeddingService({
      apiKey: 'test-secret',
      model: 'text-embedding-3-small',
      dimensions: 2,
    }).embed(['a']);
    await new OpenAIEmbeddingService({
      apiKey: 'ollama',
      baseURL: 'http://localhost:11434/v1',
      model: 'nomic-embed-text',
      dimensions: 2,
    }).embed(['a']);

    expect(create).toHaveBeenNthCalledWith(
      1,
      { model: 'text-embedding-3-small', input: ['a'], dimensions: 2 },
      { signal: undefined }
    );
    expect(create).toHaveBeenNthCalledWith(
      2,
      { model: 'nomic-embed-text', input: ['a'] },
      { signal: undefined }
    );
  });

  it('disables SDK retries', () => {
    new OpenAIEmbeddingService({ apiKey: 'test-secret', model: 'm', dimensions: 2 });
    expect(OpenAIMock).toHaveBeenCalledWith({ apiKey: 'test-secret', maxRetries: 0 });
  });

  it('skips the request for empty input', async () => {
    const service = new OpenAIEmbeddingService({ apiKey: 'test-secret', model: 'm', dimensions: 2 });
    await expect(service.embed([])).resolves.toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });
});
