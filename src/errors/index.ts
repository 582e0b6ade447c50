/**
 * Error handling module
 *
 *   import { ConfigurationError, handleError } from './errors/index.js';
 *
 *   throw new ConfigurationError('chunk_overlap must be smaller than chunk_size');
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigurationError,
  DatabaseError,
  ValidationError,
  ExtractionError,
  EmbeddingServiceError,
  VectorStoreError,
  CacheError,
  ProjectNotFoundError,
  IngestionCancelledError,
} from './types.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
