/**
 * API endpoint for background refresh status and metrics
 */

import { Router } from 'express';
import type { MetricsTracker } from '../jobs/metrics-tracker';
import type { SchedulerStatus } from '../jobs/scheduler';

export interface SchedulerStatusSource {
  getStatus(): SchedulerStatus;
}

/**
 * GET /api/job-status
 */
export function createJobStatusRouter(scheduler: SchedulerStatusSource, metrics: MetricsTracker): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const schedulerStatus = scheduler.getStatus();
    const stats = metrics.getStats();

    const isHealthy = schedulerStatus.state !== 'stopped' && stats.lastError === null;

    let timeSinceLastRunMs: number | null = null;
    if (stats.lastRunAt) {
      timeSinceLastRunMs = Date.now() - stats.lastRunAt.getTime();
    }

    res.json({
      healthy: isHealthy,
      scheduler: {
        running: schedulerStatus.isRunning,
        state: schedulerStatus.state,
        cronExpression: schedulerStatus.cronExpression,
        currentlyExecuting: schedulerStatus.isCycleCurrentlyExecuting,
      },
      stats: {
        totalRuns: stats.totalRuns,
        successfulRuns: stats.successfulRuns,
        failedRuns: stats.failedRuns,
        cancelledRuns: stats.cancelledRuns,
        skippedTicks: stats.skippedTicks,
        averageDurationMs: Math.round(stats.averageDurationMs),
        totalStoriesFetched: stats.totalStoriesFetched,
        totalStoriesDropped: stats.totalStoriesDropped,
      },
      lastRun: {
        startedAt: stats.lastRunAt,
        lastSuccessAt: stats.lastSuccessAt,
        lastError: stats.lastError,
        timeSinceLastRunMs,
      },
      lastCycle: stats.lastCycle,
    });
  });

  return router;
}
