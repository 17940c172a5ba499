export type PoolTask<T, R> = (item: T, index: number) => Promise<R>;

export type PoolOptions<T, R> = {
  concurrency: number;
  signal?: AbortSignal;
  /** Result recorded for items that were never started because the signal fired. */
  onSkipped: (item: T, index: number) => R;
  /** Result recorded when a task throws instead of resolving. */
  onThrown: (item: T, index: number, error: unknown) => R;
};

/**
 * Fixed-size worker pool. Each worker pulls the next unclaimed index and
 * writes its result into that slot, so results keep input order no matter
 * which item finishes first. A task that throws does not affect its siblings.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: PoolTask<T, R>,
  options: PoolOptions<T, R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(options.concurrency, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];

      if (options.signal?.aborted) {
        results[index] = options.onSkipped(item, index);
        continue;
      }

      try {
        results[index] = await task(item, index);
      } catch (error) {
        results[index] = options.onThrown(item, index, error);
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
