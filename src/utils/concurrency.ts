import { debugLogger } from './debug-logger';
import { isCancellation, throwIfCancelled } from './errors';

export interface ConcurrencyOptions {
  /** Number of workers pulling from the shared queue. Default: 25 */
  concurrency?: number;
  /** Label for logging purposes */
  label?: string;
  /** Stops workers from taking new items; the pool then rejects with a cancellation error */
  signal?: AbortSignal;
}

export interface ConcurrencyResult<T, R> {
  successful: R[];
  failed: Array<{ item: T; error: Error; index: number }>;
}

/**
 * Process items with a fixed-size worker pool.
 * Each worker takes the next unclaimed item from a shared queue until the queue is drained,
 * so at most `concurrency` calls to `fn` are ever in flight.
 *
 * Errors thrown by `fn` are collected in `failed`; a cancellation error (or an aborted
 * `signal`) is not collected but rejects the whole call once in-flight work settles.
 *
 * @example
 * const results = await processConcurrently(
 *   ids,
 *   async (id) => fetchOne(id),
 *   { concurrency: 8, label: 'Story Fetch', signal }
 * );
 */
export async function processConcurrently<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {}
): Promise<ConcurrencyResult<T, R>> {
  const { concurrency = 25, label = 'Operation', signal } = options;

  throwIfCancelled(signal);

  if (items.length === 0) {
    return { successful: [], failed: [] };
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  const stepId = debugLogger.stepStart('FAN_OUT', `${label} (${items.length} items, concurrency: ${workerCount})`, {
    itemCount: items.length,
    concurrency: workerCount,
  });
  const startTime = Date.now();

  const successful: R[] = [];
  const failed: Array<{ item: T; error: Error; index: number }> = [];
  let cancellation: unknown = null;
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && cancellation === null && !signal?.aborted) {
      const index = next++;
      const item = items[index];

      try {
        successful.push(await fn(item, index));
      } catch (error) {
        if (isCancellation(error)) {
          cancellation = error;
          return;
        }
        const err = error instanceof Error ? error : new Error(String(error));
        debugLogger.warn('FAN_OUT', `${label}: Item ${index + 1}/${items.length} failed`, {
          error: err.message,
        });
        failed.push({ item, error: err, index });
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (cancellation !== null) {
    debugLogger.stepError(stepId, 'FAN_OUT', `${label} cancelled`, cancellation);
    throw cancellation;
  }
  throwIfCancelled(signal);

  const duration = Date.now() - startTime;
  debugLogger.stepFinish(stepId, {
    successful: successful.length,
    failed: failed.length,
    avgTimePerItem: `${(duration / items.length).toFixed(0)}ms`,
  });

  return { successful, failed };
}
