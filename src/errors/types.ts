/**
 * Error type definitions for grant-kb
 *
 * Every error carries:
 * - An actionable message with a recovery hint
 * - An exit code for the CLI and for scripts driving it
 *
 * Library code throws the same classes; the ingestion pipeline and the
 * retriever catch the per-document / per-query kinds and report them
 * instead of aborting the whole run.
 */

/**
 * Base class for all grant-kb errors.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: lets scripts tell failures apart
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Invalid configuration: bad TOML, out-of-range option, chunk overlap not
 * smaller than chunk size, or an embedding model that does not match the
 * vectors already stored for a project.
 *
 * Fatal at startup - never recovered mid-run.
 *
 * Exit code 2: Configuration error
 */
export class ConfigurationError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Check ~/.grantkb/config.toml', 2);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown for database-related errors.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Run: grantkb list  to check database health', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A source document could not be turned into text (unreadable file or no
 * extractor registered for its format). The document is skipped and
 * reported; the rest of the run continues.
 *
 * Exit code 7
 */
export class ExtractionError extends CLIError {
  /** Path of the document that failed (relative to the project root) */
  public readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: unknown) {
    super(
      `Failed to extract text from ${filePath}: ${reason}`,
      'Check that the file is readable and in a supported format',
      7
    );
    this.name = 'ExtractionError';
    this.filePath = filePath;
    this.cause = cause;
  }
}

/**
 * The embedding service failed permanently, or kept failing transiently
 * until the retry budget ran out.
 *
 * Exit code 8
 */
export class EmbeddingServiceError extends CLIError {
  /** Whether the last failure was a transient one (rate limit, timeout, 5xx) */
  public readonly transient: boolean;
  /** Number of attempts made before giving up */
  public readonly attempts: number;

  constructor(
    message: string,
    options: { transient: boolean; attempts: number; cause?: unknown }
  ) {
    super(
      message,
      options.transient
        ? 'The embedding service is unavailable or rate limited - re-run ingestion later'
        : 'Check the embedding model, API key and base URL in your configuration',
      8
    );
    this.name = 'EmbeddingServiceError';
    this.transient = options.transient;
    this.attempts = options.attempts;
    this.cause = options.cause;
  }
}

/**
 * The vector store rejected an operation. The affected document's
 * fingerprint is not committed, so it is retried on the next run.
 *
 * Exit code 9
 */
export class VectorStoreError extends CLIError {
  public readonly transient: boolean;

  constructor(message: string, options: { transient?: boolean; cause?: unknown } = {}) {
    super(message, 'Re-run ingestion; unchanged documents will be skipped', 9);
    this.name = 'VectorStoreError';
    this.transient = options.transient ?? false;
    this.cause = options.cause;
  }
}

/**
 * The response cache could not be read or written. Callers treat this as a
 * cache miss - it never blocks a query.
 *
 * Exit code 10
 */
export class CacheError extends CLIError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Run: grantkb cache clear  to reset the response cache', 10);
    this.name = 'CacheError';
    this.cause = cause;
  }
}

/**
 * A query or removal named a project that has never been ingested.
 *
 * Exit code 11
 */
export class ProjectNotFoundError extends CLIError {
  public readonly projectName: string;

  constructor(projectName: string) {
    super(
      `Project not found: ${projectName}`,
      'Run: grantkb list  to see ingested projects, or grantkb ingest  to create it',
      11
    );
    this.name = 'ProjectNotFoundError';
    this.projectName = projectName;
  }
}

/**
 * Ingestion was cancelled through its AbortSignal. Documents committed
 * before the cancellation stay valid.
 *
 * Exit code 130 (same as SIGINT)
 */
export class IngestionCancelledError extends CLIError {
  constructor() {
    super('Ingestion cancelled', 'Re-run ingestion to finish the remaining documents', 130);
    this.name = 'IngestionCancelledError';
  }
}
