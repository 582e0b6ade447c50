/**
 * Ask Service
 *
 * Question answering over one project:
 * cached? → retrieve top-K → prompt → generate
 *
 * The cache key covers the project, the normalized question, topK and the
 * generation model, so changing either parameter never serves a stale
 * answer. Ingestion drops the project's entries when its documents change.
 */

import type { ResponseCache, ChunkReference } from '../cache/index.js';
import type { GenerationService } from '../providers/index.js';
import type { Retriever } from '../search/index.js';
import { ANSWER_SYSTEM_PROMPT, buildAnswerPrompt } from './prompt.js';

export interface AskOptions {
  topK?: number;
  signal?: AbortSignal;
}

export interface AskServiceOptions {
  /** Used when a call gives no topK */
  defaultTopK: number;
  temperature: number;
}

export interface Answer {
  answer: string;
  /** Distinct source documents in rank order */
  sources: string[];
  /** The chunks behind the answer */
  references: ChunkReference[];
  createdAt: string;
}

export function distinctSources(references: ChunkReference[]): string[] {
  return [...new Set(references.map((ref) => ref.sourcePath))];
}

export class AskService {
  constructor(
    private readonly retriever: Retriever,
    private readonly generator: GenerationService,
    private readonly cache: ResponseCache,
    private readonly options: AskServiceOptions
  ) {}

  async ask(project: string, question: string, options: AskOptions = {}): Promise<Answer> {
    const topK = options.topK ?? this.options.defaultTopK;

    const response = await this.cache.getOrCompute(
      project,
      question,
      { topK, model: this.generator.model },
      async () => {
        const chunks = await this.retriever.retrieve(project, question, topK, options.signal);
        const answer = await this.generator.generate(
          {
            system: ANSWER_SYSTEM_PROMPT,
            prompt: buildAnswerPrompt(question, chunks),
            temperature: this.options.temperature,
          },
          { signal: options.signal }
        );
        return {
          answer,
          sources: chunks.map(({ chunkId, sourcePath, ordinal, score }) => ({
            chunkId,
            sourcePath,
            ordinal,
            score,
          })),
        };
      }
    );

    return {
      answer: response.answer,
      sources: distinctSources(response.sources),
      references: response.sources,
      createdAt: response.createdAt,
    };
  }
}
