/**
 * Query/Response Cache
 *
 * Persistent memo of answered queries in the `response_cache` table.
 * Entries have no TTL: the ingestion pipeline drops a project's entries
 * whenever its document set changes.
 *
 * Reads and writes never fail a query. A broken row, a locked database or
 * an unparsable value is logged as a CacheError warning and the query is
 * computed directly.
 *
 * @example
 * ```typescript
 * const cache = new ResponseCache(db, { logger });
 * const response = await cache.getOrCompute('alpha', 'What is the budget?', { topK: 5 }, async () => {
 *   const chunks = await retriever.retrieve('alpha', 'What is the budget?', 5);
 *   return { answer: await generate(chunks), sources: chunks.map(toReference) };
 * });
 * ```
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

import { CacheRowSchema, validateRow } from '../database/validation.js';
import { CacheError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import { cacheKey, type CacheParams } from './key.js';
import {
  CachedResponseSchema,
  type CachedResponse,
  type CacheStats,
  type ComputedResponse,
} from './types.js';

const StatsRowSchema = z.object({ project: z.string(), entries: z.number().int() });

export interface ResponseCacheOptions {
  logger?: Logger;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ResponseCache {
  private readonly logger: Logger;
  private hits = 0;
  private misses = 0;
  /** Bumped by every invalidation; answers computed across a bump are not stored */
  private readonly generations = new Map<string, number>();
  private clearGeneration = 0;

  constructor(
    private readonly db: Database.Database,
    options: ResponseCacheOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
  }

  async getOrCompute(
    project: string,
    query: string,
    params: CacheParams,
    computeFn: () => Promise<ComputedResponse>
  ): Promise<CachedResponse> {
    const key = cacheKey(project, query, params);

    const cached = this.tryRead(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const generation = this.generationOf(project);
    const computed = await computeFn();
    const response: CachedResponse = { ...computed, createdAt: new Date().toISOString() };
    if (this.generationOf(project) === generation) {
      this.tryWrite(key, project, query, params, response);
    } else {
      this.logger.debug?.(`Not caching answer for ${project}: invalidated while computing`);
    }
    return response;
  }

  private generationOf(project: string): string {
    return `${this.clearGeneration}:${this.generations.get(project) ?? 0}`;
  }

  /**
   * Drop every entry of a project.
   *
   * @throws CacheError - stale entries would otherwise be served
   */
  invalidateProject(project: string): number {
    this.generations.set(project, (this.generations.get(project) ?? 0) + 1);
    try {
      return this.db.prepare('DELETE FROM response_cache WHERE project_name = ?').run(project).changes;
    } catch (error) {
      throw new CacheError(`Cannot invalidate cached responses for ${project}: ${describe(error)}`, error);
    }
  }

  clear(): number {
    this.clearGeneration++;
    try {
      return this.db.prepare('DELETE FROM response_cache').run().changes;
    } catch (error) {
      throw new CacheError(`Cannot clear the response cache: ${describe(error)}`, error);
    }
  }

  /**
   * @throws CacheError when the table cannot be read
   */
  stats(): CacheStats {
    let rows: unknown[];
    try {
      rows = this.db
        .prepare(
          `SELECT project_name AS project, COUNT(*) AS entries
           FROM response_cache GROUP BY project_name ORDER BY project_name`
        )
        .all();
    } catch (error) {
      throw new CacheError(`Cannot read response cache statistics: ${describe(error)}`, error);
    }

    const byProject = rows.flatMap((row) => {
      const parsed = StatsRowSchema.safeParse(row);
      return parsed.success ? [parsed.data] : [];
    });

    return {
      entries: byProject.reduce((sum, p) => sum + p.entries, 0),
      byProject,
      hits: this.hits,
      misses: this.misses,
    };
  }

  private tryRead(key: string): CachedResponse | undefined {
    try {
      const row = this.db.prepare('SELECT * FROM response_cache WHERE key = ?').get(key);
      if (row === undefined) {
        return undefined;
      }
      const { response } = validateRow(CacheRowSchema, row, `response_cache.key=${key}`);
      const parsed = CachedResponseSchema.safeParse(JSON.parse(response));
      if (!parsed.success) {
        throw new Error(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
      }
      return parsed.data;
    } catch (error) {
      const cacheError = new CacheError(`Unreadable cache entry ${key.slice(0, 12)}: ${describe(error)}`, error);
      this.logger.warn(cacheError.message);
      return undefined;
    }
  }

  private tryWrite(
    key: string,
    project: string,
    query: string,
    params: CacheParams,
    response: CachedResponse
  ): void {
    try {
      this.db
        .prepare(
          `INSERT INTO response_cache (key, project_name, query, params, response, created_at)
           VALUES (@key, @project, @query, @params, @response, @createdAt)
           ON CONFLICT(key) DO UPDATE SET
             project_name = excluded.project_name,
             query = excluded.query,
             params = excluded.params,
             response = excluded.response,
             created_at = excluded.created_at`
        )
        .run({
          key,
          project,
          query,
          params: JSON.stringify(params),
          response: JSON.stringify(response),
          createdAt: response.createdAt,
        });
    } catch (error) {
      const cacheError = new CacheError(`Cannot store cache entry ${key.slice(0, 12)}: ${describe(error)}`, error);
      this.logger.warn(cacheError.message);
    }
  }
}
