export interface PoolOptions<R> {
  /** Stops dispatching new items once aborted; in-flight items still finish */
  signal?: AbortSignal | undefined;
  /** Called in completion order, once per finished item */
  onSettled?: ((result: R, index: number) => void) | undefined;
}

export interface PoolReport {
  dispatched: number;
  cancelled: boolean;
}

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 *
 * Resolves only after every started worker has returned, so nothing outlives
 * the call. If a worker rejects, dispatch stops, the remaining in-flight calls
 * drain, and the first error is rethrown.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions<R> = {},
): Promise<PoolReport> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Pool limit must be a positive integer, got ${limit}`);
  }

  const { signal, onSettled } = options;
  const queue = items.entries();
  let dispatched = 0;
  let failed: { error: unknown } | undefined;

  const runWorker = async (): Promise<void> => {
    while (!signal?.aborted && !failed) {
      const step = queue.next();
      if (step.done) return;

      const [index, item] = step.value;
      dispatched++;

      try {
        const result = await worker(item, index);
        onSettled?.(result, index);
      } catch (error) {
        failed ??= { error };
      }
    }
  };

  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));

  if (failed) {
    throw failed.error;
  }

  return { dispatched, cancelled: dispatched < items.length };
}
