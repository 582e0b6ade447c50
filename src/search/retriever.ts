/**
 * Retriever
 *
 * Answers "which chunks of this project are most like this query":
 * 1. Look up the project and its collection
 * 2. Skip the embedding call when the collection is empty
 * 3. Embed the query with the same model the project was ingested with
 * 4. Rank by similarity, ties by (sourcePath, ordinal)
 *
 * @example
 * ```typescript
 * const retriever = new Retriever(ops, store, embedder);
 * const results = await retriever.retrieve('alpha', 'What is the budget?', 5);
 *
 * for (const r of results) {
 *   console.log(`${r.sourcePath}#${r.ordinal} ${r.score.toFixed(3)}`);
 * }
 * ```
 */

import type { DatabaseOperations, Project } from '../database/index.js';
import { ConfigurationError, ProjectNotFoundError, ValidationError } from '../errors/index.js';
import type { EmbeddingClient } from '../indexer/embedder/index.js';
import type { VectorStore } from './store.js';
import type { RetrievalOutcome, RetrievedChunk } from './types.js';

export class Retriever {
  constructor(
    private readonly ops: DatabaseOperations,
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingClient
  ) {}

  async retrieve(
    projectName: string,
    query: string,
    topK: number,
    signal?: AbortSignal
  ): Promise<RetrievedChunk[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('topK must be a positive integer', [`topK: ${topK}`]);
    }
    if (query.trim() === '') {
      throw new ValidationError('Query must not be empty');
    }

    const project = this.ops.getProjectByName(projectName);
    if (!project) {
      throw new ProjectNotFoundError(projectName);
    }

    if ((await this.store.count(project.collection)) === 0) {
      return [];
    }

    this.assertCompatibleModel(project);
    const vector = await this.embedder.embedOne(query, signal);
    return this.store.query(project.collection, vector, topK);
  }

  /**
   * Run several queries against one project. A failing query yields an
   * error outcome; the others still run.
   */
  async retrieveBatch(
    projectName: string,
    queries: string[],
    topK: number,
    signal?: AbortSignal
  ): Promise<RetrievalOutcome[]> {
    const outcomes: RetrievalOutcome[] = [];

    for (const query of queries) {
      try {
        const results = await this.retrieve(projectName, query, topK, signal);
        outcomes.push({ status: 'ok', query, results });
      } catch (error) {
        outcomes.push({
          status: 'error',
          query,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }

    return outcomes;
  }

  private assertCompatibleModel(project: Project): void {
    const { embeddingModel, embeddingDimensions } = project;
    if (embeddingModel === null) {
      return;
    }
    if (embeddingModel !== this.embedder.model || embeddingDimensions !== this.embedder.dimensions) {
      throw new ConfigurationError(
        `Project ${project.name} was ingested with ${embeddingModel} (${embeddingDimensions} dimensions), ` +
          `but the configured model is ${this.embedder.model} (${this.embedder.dimensions} dimensions)`,
        `Run: grantkb ingest ${project.name} --force  to re-embed with the configured model`
      );
    }
  }
}
