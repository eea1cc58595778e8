/**
 * Background job that rebuilds the best-stories snapshot
 */

import type { RefreshCycleStats, StoryFetcher, StoryIdSource } from '../types';
import { fetchStoriesRateLimited } from '../refresh/fan-out';
import { retryFailed } from '../refresh/retry';
import type { RetryOptions } from '../refresh/retry';
import type { SnapshotStore } from '../refresh/snapshot-store';
import { debugLogger } from '../utils/debug-logger';
import { isCancellation, throwIfCancelled } from '../utils/errors';
import { FixedWindowRateLimiter } from '../utils/rate-limiter';
import type { FixedWindowRateLimiterOptions } from '../utils/rate-limiter';
import type { MetricsTracker } from './metrics-tracker';

export interface RefreshJobOptions {
  source: StoryIdSource;
  fetcher: StoryFetcher;
  store: SnapshotStore;
  metrics: MetricsTracker;
  maxParallelism: number;
  limiter?: FixedWindowRateLimiterOptions;
  retry?: Pick<RetryOptions, 'maxRetries' | 'delayMs' | 'sleep'>;
}

export class RefreshJob {
  private isRunning = false;
  private readonly options: RefreshJobOptions;

  constructor(options: RefreshJobOptions) {
    if (!Number.isInteger(options.maxParallelism) || options.maxParallelism < 1) {
      throw new RangeError(`maxParallelism must be a positive integer, got ${options.maxParallelism}`);
    }
    this.options = options;
  }

  isCycleRunning(): boolean {
    return this.isRunning;
  }

  /**
   * Run one refresh cycle: ID list, fan-out, retries, publish.
   *
   * Returns null without doing anything if a cycle is already in progress.
   * Cancellation and any error escaping the per-item boundary are rethrown;
   * in both cases nothing is published.
   */
  async run(signal?: AbortSignal): Promise<RefreshCycleStats | null> {
    // Prevent overlapping cycles: the store has a single writer
    if (this.isRunning) {
      debugLogger.info('REFRESH', 'Refresh already running, skipping this tick');
      this.options.metrics.recordSkippedTick();
      return null;
    }

    this.isRunning = true;
    const { source, fetcher, store, metrics, maxParallelism } = this.options;
    const startTime = Date.now();
    const stepId = debugLogger.stepStart('REFRESH', 'Refreshing best stories snapshot');
    const limiter = new FixedWindowRateLimiter(this.options.limiter);

    try {
      metrics.recordCycleStart();

      const ids = await source.fetchBestStoryIds(signal);
      const fanOut = (batch: readonly number[]) =>
        fetchStoriesRateLimited(batch, { fetcher, limiter, maxParallelism, signal });

      const firstPass = await fanOut(ids);
      const retried = await retryFailed(firstPass.failed, {
        ...this.options.retry,
        fanOut,
        signal,
      });

      // Never publish a cycle that was cancelled part-way
      throwIfCancelled(signal);

      const stories = [...firstPass.succeeded, ...retried.succeeded];
      store.publish(stories);

      const cycle: RefreshCycleStats = {
        requested: ids.length,
        succeeded: stories.length,
        dropped: retried.failed.length,
        retryAttempts: retried.attempts,
        completenessRatio: ids.length === 0 ? 1 : stories.length / ids.length,
        durationMs: Date.now() - startTime,
      };
      metrics.recordCycleSuccess(cycle);
      debugLogger.stepFinish(stepId, { ...cycle });

      if (cycle.dropped > 0) {
        console.log(
          `⚠️ Refresh: published ${cycle.succeeded}/${cycle.requested} stories, ` +
          `${cycle.dropped} dropped after ${cycle.retryAttempts} retries (${cycle.durationMs}ms)`
        );
      } else {
        console.log(`🔄 Refresh: published ${cycle.succeeded} stories (${cycle.durationMs}ms)`);
      }

      return cycle;
    } catch (error) {
      if (isCancellation(error)) {
        metrics.recordCycleCancelled();
        debugLogger.stepError(stepId, 'REFRESH', 'Refresh cancelled', error);
        throw error;
      }

      const errorMessage = error instanceof Error ? error.message : String(error);
      metrics.recordCycleFailure(errorMessage);
      debugLogger.stepError(stepId, 'REFRESH', 'Refresh failed', error);
      console.error(`❌ Refresh failed: ${errorMessage} (${Date.now() - startTime}ms)`);
      throw error;
    } finally {
      limiter.dispose();
      this.isRunning = false;
    }
  }
}
