/**
 * Tracks metrics for background refresh cycles
 */

import type { RefreshCycleStats } from '../types';

export interface RefreshStats {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  cancelledRuns: number;
  skippedTicks: number;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
  averageDurationMs: number;
  totalStoriesFetched: number;
  totalStoriesDropped: number;
  lastCycle: RefreshCycleStats | null;
}

export class MetricsTracker {
  private stats: RefreshStats = {
    totalRuns: 0,
    successfulRuns: 0,
    failedRuns: 0,
    cancelledRuns: 0,
    skippedTicks: 0,
    lastRunAt: null,
    lastSuccessAt: null,
    lastError: null,
    averageDurationMs: 0,
    totalStoriesFetched: 0,
    totalStoriesDropped: 0,
    lastCycle: null,
  };

  recordCycleStart(): void {
    this.stats.lastRunAt = new Date();
    this.stats.totalRuns++;
  }

  recordCycleSuccess(cycle: RefreshCycleStats): void {
    this.stats.successfulRuns++;
    this.stats.lastSuccessAt = new Date();
    this.stats.lastError = null;
    this.stats.lastCycle = { ...cycle };

    this.stats.totalStoriesFetched += cycle.succeeded;
    this.stats.totalStoriesDropped += cycle.dropped;

    const totalDuration = this.stats.averageDurationMs * (this.stats.successfulRuns - 1);
    this.stats.averageDurationMs = (totalDuration + cycle.durationMs) / this.stats.successfulRuns;
  }

  recordCycleFailure(error: string): void {
    this.stats.failedRuns++;
    this.stats.lastError = error;
  }

  recordCycleCancelled(): void {
    this.stats.cancelledRuns++;
  }

  /**
   * A tick fired while the previous cycle was still running
   */
  recordSkippedTick(): void {
    this.stats.skippedTicks++;
  }

  getStats(): RefreshStats {
    return {
      ...this.stats,
      lastCycle: this.stats.lastCycle ? { ...this.stats.lastCycle } : null,
    };
  }
}
