import type { KnowledgeBase } from '../knowledge-base/index.js';

/**
 * Global CLI options available to all commands
 * These are parsed at the root level and passed down to subcommands
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Output results as JSON instead of human-readable text */
  json: boolean;
}

/**
 * Context passed to all command handlers
 * Combines parsed options with runtime utilities. Satisfies the library
 * Logger shape, so commands hand it straight to the knowledge base.
 */
export interface CommandContext {
  options: GlobalOptions;
  /** Log a message (respects --json flag) */
  log: (message: string) => void;
  /** Log a debug message (only shown with --verbose) */
  debug: (message: string) => void;
  /** Non-fatal problems: skipped documents, cache fallbacks */
  warn: (message: string) => void;
  /** Log an error message */
  error: (message: string) => void;
  /** Load config, open the database and migrate it. Callers close it. */
  openKnowledgeBase: () => KnowledgeBase;
}
