/**
 * Bounded-concurrency iteration
 *
 * Runs `fn` over `items` with at most `limit` calls in flight. Workers stop
 * picking up new items once the signal aborts or any call throws; calls
 * already running are awaited before the returned promise settles, so no
 * work is left behind when the caller moves on.
 */
export async function forEachWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && !signal?.aborted && next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        await fn(item, index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  const outcomes = await Promise.allSettled(
    Array.from({ length: workerCount }, () => worker())
  );

  const rejected = outcomes.find(
    (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
  );
  if (rejected) {
    throw rejected.reason;
  }
}
