/**
 * Cache keys
 *
 * Two queries that differ only in case, Unicode form or spacing share a
 * key. Params are serialized with sorted keys so their order never matters.
 */

import { sha256Hex, stableStringify } from '../utils/index.js';

export type CacheParams = Record<string, string | number | boolean>;

export function normalizeQuery(query: string): string {
  return query.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

export function cacheKey(project: string, query: string, params: CacheParams): string {
  return sha256Hex(stableStringify({ project, query: normalizeQuery(query), params }));
}
