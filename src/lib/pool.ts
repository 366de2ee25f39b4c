export const DEFAULT_CONCURRENCY = 8;

export interface PoolOptions<T, R> {
  concurrency?: number;
  signal?: AbortSignal;
  /**
   * Runs for each completed unit, in completion order. Unlike worker errors,
   * a rejection here stops the pool and is rethrown.
   */
  onResult?: (value: R, item: T, index: number) => void | Promise<void>;
  onError?: (error: unknown, item: T, index: number) => void;
}

export interface PoolFailure<T> {
  item: T;
  index: number;
  error: unknown;
}

export interface PoolResult<T, R> {
  /** Completion order. */
  results: R[];
  failures: PoolFailure<T>[];
  cancelled: boolean;
}

/**
 * Processes `items` with at most `concurrency` workers in flight. The signal
 * is polled before each dispatch and after each completed unit; on abort the
 * remaining items are dropped and whatever already finished is returned.
 */
export async function runWithPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions<T, R> = {}
): Promise<PoolResult<T, R>> {
  const { signal, onResult, onError } = options;
  const limit = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const results: R[] = [];
  const failures: PoolFailure<T>[] = [];
  let cancelled = false;
  let stopped = false;
  let next = 0;

  const exec = async () => {
    while (next < items.length && !stopped) {
      if (signal?.aborted) {
        cancelled = true;
        return;
      }
      const index = next++;
      const item = items[index];

      const settled = await Promise.resolve()
        .then(() => worker(item, index))
        .then(
          (value) => ({ ok: true as const, value }),
          (error: unknown) => ({ ok: false as const, error })
        );
      if (signal?.aborted) cancelled = true;
      // another runner's onResult failed while this unit was in flight
      if (stopped) return;

      if (!settled.ok) {
        failures.push({ item, index, error: settled.error });
        if (onError) {
          onError(settled.error, item, index);
        } else {
          console.error(`Skipping unit ${index}`, settled.error);
        }
        continue;
      }

      results.push(settled.value);
      if (onResult) {
        try {
          await onResult(settled.value, item, index);
        } catch (err) {
          stopped = true;
          throw err;
        }
      }
      if (cancelled) return;
    }
  };

  const runners = Array.from({ length: Math.min(limit, items.length) }, () => exec());
  await Promise.all(runners);

  return { results, failures, cancelled };
}
