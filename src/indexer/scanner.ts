/**
 * Document Scanner
 *
 * Lists the documents under a project directory using fast-glob, filtered
 * by extension and by the ignore rules. Results are sorted by relative
 * path so ingestion order is deterministic.
 */

import { existsSync, statSync } from 'node:fs';
import { resolve, extname, posix } from 'node:path';
import fg from 'fast-glob';

import { createIgnoreFilter } from './ignore.js';
import { SUPPORTED_DOCUMENT_EXTENSIONS, type DocumentInfo, type ScanOptions } from './types.js';
import { FileNotFoundError } from '../errors/index.js';

/**
 * Build the glob pattern for a set of extensions. Matching is
 * case-insensitive so "Budget.PDF" is found.
 */
export function buildGlobPattern(extensions: string[]): string {
  const list = extensions.map((ext) => ext.toLowerCase());
  if (list.length === 1) {
    return `**/*.${list[0]}`;
  }
  return `**/*.{${list.join(',')}}`;
}

/**
 * @throws FileNotFoundError if `rootPath` does not exist or is not a directory
 *
 * @example
 * ```ts
 * const documents = await scanDocuments('/grants/alpha', { additionalIgnorePatterns: ['drafts/'] });
 * ```
 */
export async function scanDocuments(
  rootPath: string,
  options: ScanOptions = {}
): Promise<DocumentInfo[]> {
  const absoluteRoot = resolve(rootPath);
  if (!existsSync(absoluteRoot) || !statSync(absoluteRoot).isDirectory()) {
    throw new FileNotFoundError(absoluteRoot);
  }

  const extensions = options.extensions ?? SUPPORTED_DOCUMENT_EXTENSIONS;
  if (extensions.length === 0) {
    return [];
  }

  const shouldIgnore = createIgnoreFilter({
    rootPath: absoluteRoot,
    additionalPatterns: options.additionalIgnorePatterns,
  });

  // fast-glob returns posix-style relative paths
  const entries = await fg(buildGlobPattern(extensions), {
    cwd: absoluteRoot,
    dot: false,
    onlyFiles: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: options.followSymlinks ?? false,
    suppressErrors: true,
  });

  const documents: DocumentInfo[] = [];

  for (const relativePath of entries) {
    if (shouldIgnore(relativePath)) {
      continue;
    }

    const absolutePath = resolve(absoluteRoot, relativePath);
    try {
      const stat = statSync(absolutePath);
      documents.push({
        path: absolutePath,
        relativePath: posix.normalize(relativePath),
        extension: extname(relativePath).slice(1).toLowerCase(),
        size: stat.size,
        mtimeMs: Math.trunc(stat.mtimeMs),
      });
    } catch (error) {
      options.onError?.(absolutePath, error instanceof Error ? error : new Error(String(error)));
    }
  }

  return documents.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}
