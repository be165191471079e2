export interface ParallelResult<T, R> {
  item: T;
  index: number;
  result?: R;
  error?: Error;
}

/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight.
 * Never rejects: each failure is captured on its own result. Results are
 * returned in input order.
 */
export async function runParallel<T, R>(opts: {
  items: T[];
  fn: (item: T) => Promise<R>;
  concurrency: number;
  onStart?: (item: T, index: number) => void;
  onDone?: (item: T, result: R, index: number) => void;
  onError?: (item: T, err: Error, index: number) => void;
}): Promise<ParallelResult<T, R>[]> {
  const results: ParallelResult<T, R>[] = [];
  const queue = opts.items.map((item, index) => ({ item, index }));
  const limit = Math.max(1, Math.floor(opts.concurrency));
  let active = 0;

  return new Promise((resolve) => {
    function finish() {
      resolve(results.sort((a, b) => a.index - b.index));
    }

    function next() {
      while (active < limit && queue.length > 0) {
        const job = queue.shift();
        if (!job) break;
        const { item, index } = job;
        active++;
        opts.onStart?.(item, index);

        Promise.resolve()
          .then(() => opts.fn(item))
          .then((result) => {
            results.push({ item, index, result });
            opts.onDone?.(item, result, index);
          })
          .catch((err: unknown) => {
            const error = err instanceof Error ? err : new Error(String(err));
            results.push({ item, index, error });
            opts.onError?.(item, error, index);
          })
          .finally(() => {
            active--;
            if (queue.length === 0 && active === 0) {
              finish();
            } else {
              next();
            }
          });
      }
    }

    if (queue.length === 0) finish();
    else next();
  });
}
