/**
 * Ignore Pattern Handling
 *
 * gitignore-style filtering via the 'ignore' package. A project folder can
 * carry a .gitignore or a .grantkbignore; both are honoured.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import { DEFAULT_IGNORE_PATTERNS } from './types.js';

export const IGNORE_FILES = ['.gitignore', '.grantkbignore'];

export interface IgnoreFilterOptions {
  /** Project root containing the ignore files */
  rootPath: string;

  /** Highest-priority patterns (from config) */
  additionalPatterns?: string[];

  /** @default true */
  useDefaults?: boolean;
}

/**
 * Returns true if the (root-relative, forward-slash) path should be IGNORED.
 */
export type IgnoreFilter = (relativePath: string) => boolean;

/**
 * Load patterns from an ignore file; [] if it doesn't exist.
 */
export function loadIgnoreFile(filePath: string): string[] {
  if (!existsSync(filePath)) {
    return [];
  }
  return parseIgnoreContent(readFileSync(filePath, 'utf-8'));
}

/**
 * Split ignore file content into patterns, dropping blanks and comments.
 */
export function parseIgnoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Patterns are added lowest priority first: defaults, ignore files,
 * then `additionalPatterns`, so later sources can re-include with `!`.
 *
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({ rootPath: '/grants/alpha', additionalPatterns: ['drafts/'] });
 * shouldIgnore('drafts/v1.docx'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true } = options;

  const ig: Ignore = ignore.default();

  if (useDefaults) {
    ig.add(DEFAULT_IGNORE_PATTERNS);
  }

  for (const fileName of IGNORE_FILES) {
    ig.add(loadIgnoreFile(join(rootPath, fileName)));
  }

  if (additionalPatterns.length > 0) {
    ig.add(additionalPatterns);
  }

  return (relativePath: string): boolean => {
    if (relativePath === '') {
      return false;
    }
    return ig.ignores(relativePath);
  };
}
