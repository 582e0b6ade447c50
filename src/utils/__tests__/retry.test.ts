/**
 * Tests for exponential backoff retry
 */

import { describe, it, expect, vi } from 'vitest';
import { withRetry, backoffDelay, RetryError } from '../retry.js';

const noSleep = vi.fn(async (_ms: number) => {});

describe('backoffDelay', () => {
  it('doubles from the base delay and caps at the maximum', () => {
    const options = { baseDelayMs: 500, maxDelayMs: 3000 };

    expect(backoffDelay(1, options)).toBe(500);
    expect(backoffDelay(2, options)).toBe(1000);
    expect(backoffDelay(3, options)).toBe(2000);
    expect(backoffDelay(4, options)).toBe(3000);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn(async () => 'ok');

    await expect(
      withRetry(fn, { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, isTransient: () => true })
    ).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries transient failures with growing delays', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;
    const fn = async (): Promise<string> => {
      calls++;
      if (calls < 3) throw new Error('rate limited');
      return 'done';
    };

    const result = await withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 100,
      maxDelayMs: 1000,
      isTransient: () => true,
      sleep,
    });

    expect(result).toBe('done');
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200]);
  });

  it('gives up after maxAttempts with a transient RetryError', async () => {
    const fn = vi.fn(async () => {
      throw new Error('timeout');
    });

    const error = await withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 1,
      maxDelayMs: 1,
      isTransient: () => true,
      sleep: noSleep,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    expect(error).toMatchObject({ attempts: 3, transient: true, message: 'timeout' });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry permanent failures', async () => {
    const fn = vi.fn(async () => {
      throw new Error('invalid model');
    });

    const error = await withRetry(fn, {
      maxAttempts: 5,
      baseDelayMs: 1,
      maxDelayMs: 1,
      isTransient: () => false,
      sleep: noSleep,
    }).catch((e: unknown) => e);

    expect(error).toMatchObject({ attempts: 1, transient: false });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports each retry', async () => {
    const onRetry = vi.fn();
    let calls = 0;

    await withRetry(
      async () => {
        if (calls++ === 0) throw new Error('busy');
        return 1;
      },
      { maxAttempts: 2, baseDelayMs: 50, maxDelayMs: 50, isTransient: () => true, onRetry, sleep: noSleep }
    );

    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 50);
  });
});
