import { availableParallelism } from "node:os";

export interface PoolOptions<T, R> {
  /** Stops workers from picking up new items once aborted. */
  signal?: AbortSignal;
  /** Result for an item that was never picked up because the signal fired. */
  onSkip?: (item: T) => R;
}

/**
 * Worker pool size used when nothing else is configured.
 */
export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Process items in parallel with bounded concurrency.
 * Workers pick up the next item as soon as they're free (work-stealing pattern).
 * Results preserve input order.
 */
export async function poolMap<T, R>(
  items: readonly T[],
  fn: (item: T) => Promise<R>,
  concurrency: number,
  options: PoolOptions<T, R> = {},
): Promise<R[]> {
  const { signal, onSkip } = options;
  if (signal && !onSkip) {
    throw new Error("poolMap: onSkip is required when a signal is given");
  }

  const results: R[] = new Array(items.length);
  let index = 0;

  async function worker() {
    while (index < items.length) {
      const i = index++;
      if (signal?.aborted && onSkip) {
        results[i] = onSkip(items[i]);
        continue;
      }
      results[i] = await fn(items[i]);
    }
  }

  const workerCount = Math.min(Math.max(concurrency, 1), items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
