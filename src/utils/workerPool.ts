/**
 * Bounded worker pool
 *
 * At most `concurrency` workers pull items from a shared cursor. New items
 * stop being issued when the signal aborts, `shouldStop` returns true or a
 * worker throws; in-flight work always finishes before the call settles.
 */

export interface BoundedRunOptions {
  concurrency: number;
  signal?: AbortSignal;
  shouldStop?: () => boolean;
}

export interface BoundedRunResult<R> {
  /** Indexed like the input; undefined for items never started */
  results: Array<R | undefined>;
  /** True when some items were never started */
  stopped: boolean;
}

export async function runBounded<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: BoundedRunOptions
): Promise<BoundedRunResult<R>> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let cursor = 0;
  const failure: { failed: boolean; error?: unknown } = { failed: false };

  const halted = (): boolean =>
    failure.failed || options.signal?.aborted === true || options.shouldStop?.() === true;

  const runWorker = async (): Promise<void> => {
    while (cursor < items.length && !halted()) {
      const index = cursor++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        if (!failure.failed) {
          failure.failed = true;
          failure.error = error;
        }
      }
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => runWorker());
  await Promise.all(workers);

  if (failure.failed) {
    throw failure.error;
  }

  return { results, stopped: cursor < items.length };
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
