/**
 * Background refresh scheduler using node-cron
 */

import * as cron from 'node-cron';
import { debugLogger } from '../utils/debug-logger';
import { isCancellation } from '../utils/errors';
import type { RefreshJob } from './refresh-job';

export type SchedulerState = 'idle' | 'refreshing' | 'stopped';

export interface SchedulerStatus {
  isRunning: boolean;
  cronExpression: string;
  isCycleCurrentlyExecuting: boolean;
  state: SchedulerState;
}

/**
 * Cron expression firing every `minutes` minutes
 */
export function cronExpressionForInterval(minutes: number): string {
  if (!Number.isInteger(minutes) || minutes < 1 || minutes > 59) {
    throw new RangeError(`Refresh interval must be 1-59 minutes, got ${minutes}`);
  }
  return `*/${minutes} * * * *`;
}

/**
 * Drives a RefreshJob: one cycle right away, then one per cron tick.
 *
 * Cancellation through stop() ends the loop cleanly. Any other error escaping a
 * cycle stops the scheduler for good and rejects whenStopped() with that error.
 */
export class RefreshScheduler {
  private scheduledTask: cron.ScheduledTask | null = null;
  private readonly controller = new AbortController();
  private stopped = false;
  private readonly stoppedPromise: Promise<void>;
  private readonly resolveStopped: () => void;
  private readonly rejectStopped: (error: unknown) => void;

  constructor(
    private readonly job: RefreshJob,
    readonly cronExpression: string
  ) {
    let resolveStopped: () => void = () => undefined;
    let rejectStopped: (error: unknown) => void = () => undefined;
    this.stoppedPromise = new Promise<void>((resolve, reject) => {
      resolveStopped = resolve;
      rejectStopped = reject;
    });
    this.resolveStopped = resolveStopped;
    this.rejectStopped = rejectStopped;
    // Fatal errors surface through whenStopped(); callers may never ask for it
    this.stoppedPromise.catch(() => undefined);
  }

  /**
   * Start the scheduler and run the first cycle without waiting for a tick
   */
  start(): void {
    if (this.scheduledTask) {
      console.warn('Refresh scheduler is already running');
      return;
    }
    if (this.stopped) {
      throw new Error('Refresh scheduler has been stopped and cannot be restarted');
    }

    if (!cron.validate(this.cronExpression)) {
      throw new Error(`Invalid cron expression: ${this.cronExpression}`);
    }

    this.scheduledTask = cron.schedule(this.cronExpression, () => {
      this.tick();
    });

    console.log(`🤖 Refresh scheduler started (${this.cronExpression})`);

    // Run immediately on startup (don't wait for first cron tick)
    this.tick();
  }

  /**
   * Cancel the loop and wait (up to `maxWaitMs`) for an in-flight cycle to observe it
   */
  async stop(maxWaitMs = 30000): Promise<void> {
    if (this.stopped) return;
    console.log('Stopping refresh scheduler...');

    this.halt();
    this.controller.abort();

    // Wait for the current cycle to observe cancellation (with timeout)
    const startWait = Date.now();
    while (this.job.isCycleRunning() && Date.now() - startWait < maxWaitMs) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    if (this.job.isCycleRunning()) {
      console.warn('Refresh cycle did not finish within timeout period');
    }

    console.log('Refresh scheduler shut down gracefully');
    this.resolveStopped();
  }

  /**
   * Resolves after a clean stop(); rejects with the error that ended the loop
   */
  whenStopped(): Promise<void> {
    return this.stoppedPromise;
  }

  getStatus(): SchedulerStatus {
    const isCycleCurrentlyExecuting = this.job.isCycleRunning();
    return {
      isRunning: this.scheduledTask !== null,
      cronExpression: this.cronExpression,
      isCycleCurrentlyExecuting,
      state: this.stopped ? 'stopped' : isCycleCurrentlyExecuting ? 'refreshing' : 'idle',
    };
  }

  private tick(): void {
    if (this.stopped) return;

    this.runCycle().catch((error) => {
      console.error('Unexpected error in refresh scheduler:', error);
    });
  }

  private async runCycle(): Promise<void> {
    try {
      // Returns null (and records a skipped tick) while the previous cycle is still running
      await this.job.run(this.controller.signal);
    } catch (error) {
      if (isCancellation(error)) {
        console.log('Refresh cycle cancelled: scheduler is stopping');
        return;
      }

      console.error('🚨 Refresh scheduler stopped by an unrecoverable error:', error);
      this.halt();
      this.rejectStopped(error);
    }
  }

  private halt(): void {
    this.stopped = true;
    if (this.scheduledTask) {
      this.scheduledTask.stop();
      this.scheduledTask = null;
      debugLogger.info('SCHEDULER', 'Cron task stopped');
    }
  }
}
