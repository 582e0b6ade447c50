/**
 * Utilities Module
 */

export { consoleLogger, silentLogger, type Logger } from './logger.js';
export { parseJsonWith, stableStringify } from './json.js';
export { sha256Hex } from './hash.js';
export { withRetry, backoffDelay, RetryError, type RetryOptions } from './retry.js';
export { forEachWithConcurrency } from './pool.js';
