export type PoolOptions = {
  concurrency: number;
  signal?: AbortSignal;
};

export type PoolResult<R> = {
  results: (R | undefined)[];
  // Number of items never started because the signal was aborted.
  skipped: number;
};

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order whatever order the calls finish in. Once
 * `signal` aborts no new item starts; calls already running finish.
 */
export const runPool = async <T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<PoolResult<R>> => {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(
      `concurrency must be a positive integer, got ${options.concurrency}`,
    );
  }

  const results = new Array<R | undefined>(items.length).fill(undefined);
  const running = new Set<Promise<void>>();
  let next = 0;

  while (next < items.length || running.size > 0) {
    while (
      next < items.length &&
      running.size < options.concurrency &&
      !options.signal?.aborted
    ) {
      const index = next;
      next += 1;
      const promise: Promise<void> = worker(items[index], index).then(
        (result) => {
          results[index] = result;
          running.delete(promise);
        },
      );
      running.add(promise);
    }

    if (running.size === 0) {
      break;
    }
    await Promise.race(running);
  }

  return { results, skipped: items.length - next };
};
