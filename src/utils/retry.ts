/**
 * Retry with exponential backoff
 *
 * Shared by the embedding client (rate limits, timeouts, 5xx) and the
 * SQLite vector store (SQLITE_BUSY / SQLITE_LOCKED). Callers decide what
 * counts as transient; everything else fails on the first attempt.
 */

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Growth factor between delays (default: 2) */
  backoffMultiplier?: number;
  isTransient: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Raised when the operation failed for good. `cause` is the last error seen.
 */
export class RetryError extends Error {
  public readonly attempts: number;
  /** False when the last failure was not worth retrying */
  public readonly transient: boolean;

  constructor(cause: unknown, attempts: number, transient: boolean) {
    super(cause instanceof Error ? cause.message : String(cause));
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'RetryError';
    this.attempts = attempts;
    this.transient = transient;
    this.cause = cause;
  }
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before attempt `attempt + 1`, where `attempt` is 1-based.
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>
): number {
  const multiplier = options.backoffMultiplier ?? 2;
  const delay = options.baseDelayMs * Math.pow(multiplier, attempt - 1);
  return Math.min(delay, options.maxDelayMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const transient = options.isTransient(error);
      if (!transient || attempt >= maxAttempts) {
        throw new RetryError(error, attempt, transient);
      }
      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
