/**
 * Document Discovery Types
 */

/**
 * A candidate document found under a project directory.
 */
export interface DocumentInfo {
  /** Absolute path to the file */
  path: string;

  /** Path relative to the project root, always with forward slashes */
  relativePath: string;

  /** Lower-case extension without the dot (e.g. 'pdf') */
  extension: string;

  /** File size in bytes */
  size: number;

  /** Last modification time in epoch milliseconds */
  mtimeMs: number;
}

export interface ScanOptions {
  /**
   * Only include files with these extensions (without dot).
   * Defaults to the extensions the extractor registry handles.
   */
  extensions?: string[];

  /**
   * Additional gitignore-style patterns, merged with .gitignore,
   * .grantkbignore and DEFAULT_IGNORE_PATTERNS.
   */
  additionalIgnorePatterns?: string[];

  /** @default false */
  followSymlinks?: boolean;

  /**
   * Called when a file is skipped because it could not be stat'ed.
   */
  onError?: (path: string, error: Error) => void;
}

/**
 * Formats grant folders are expected to hold. Plain text and markdown are
 * extracted in-process; the rest need an extractor registered for them.
 */
export const SUPPORTED_DOCUMENT_EXTENSIONS = ['pdf', 'docx', 'doc', 'xlsx', 'xls', 'txt', 'md'];

/**
 * Files that are never documents: editor lock/temp files, OS metadata,
 * version control and dependency folders.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  // Version control
  '.git',
  '.svn',

  // Dependencies that end up inside shared folders
  'node_modules',
  '.venv',

  // Office lock and temp files
  '~$*',
  '.~lock.*',
  '*.tmp',
  '*.bak',

  // OS files
  '.DS_Store',
  'Thumbs.db',
  'desktop.ini',
];
