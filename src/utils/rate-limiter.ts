import { debugLogger } from './debug-logger';
import { RefreshCancelledError } from './errors';

export interface FixedWindowRateLimiterOptions {
  /** Permits handed out per window. Default: 30 */
  permitLimit?: number;
  /** Window length in milliseconds. Default: 1000 */
  windowMs?: number;
  /** Maximum number of callers waiting for a permit. Default: 200 */
  queueLimit?: number;
}

/**
 * - granted: a permit was free right away
 * - queued: the caller waited in line and then received a permit
 * - rejected: the wait queue was full
 */
export type AcquireResult = 'granted' | 'queued' | 'rejected';

interface Waiter {
  resolve: (result: AcquireResult) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Fixed-window rate limiter with a bounded FIFO wait queue.
 *
 * All permits are restored at the start of every window; queued callers are then
 * served oldest-first. The window timer only runs while the limiter is in use and
 * is unref'd so it never keeps the process alive.
 */
export class FixedWindowRateLimiter {
  readonly permitLimit: number;
  readonly windowMs: number;
  readonly queueLimit: number;

  private available: number;
  private queue: Waiter[] = [];
  private timer: NodeJS.Timeout | null = null;
  private disposed = false;

  constructor(options: FixedWindowRateLimiterOptions = {}) {
    const { permitLimit = 30, windowMs = 1000, queueLimit = 200 } = options;

    if (!Number.isInteger(permitLimit) || permitLimit < 1) {
      throw new RangeError(`permitLimit must be a positive integer, got ${permitLimit}`);
    }
    if (!(windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${windowMs}`);
    }
    if (!Number.isInteger(queueLimit) || queueLimit < 0) {
      throw new RangeError(`queueLimit must be a non-negative integer, got ${queueLimit}`);
    }

    this.permitLimit = permitLimit;
    this.windowMs = windowMs;
    this.queueLimit = queueLimit;
    this.available = permitLimit;
  }

  get availablePermits(): number {
    return this.available;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Take one permit. Never throws for a full queue (that is 'rejected');
   * rejects only if `signal` aborts while waiting or the limiter was disposed.
   */
  acquire(signal?: AbortSignal): Promise<AcquireResult> {
    if (this.disposed) {
      return Promise.reject(new Error('Rate limiter has been disposed'));
    }
    if (signal?.aborted) {
      return Promise.reject(new RefreshCancelledError());
    }

    this.ensureWindow();

    if (this.available > 0 && this.queue.length === 0) {
      this.available--;
      return Promise.resolve('granted');
    }

    if (this.queue.length >= this.queueLimit) {
      debugLogger.warn('RATE_LIMIT', 'Permit rejected, wait queue is full', {
        queueLimit: this.queueLimit,
      });
      return Promise.resolve('rejected');
    }

    return new Promise<AcquireResult>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = () => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
          }
          reject(new RefreshCancelledError());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.queue.push(waiter);
    });
  }

  /**
   * Stop the window timer and fail every waiter
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.stopWindow();

    const pending = this.queue;
    this.queue = [];
    for (const waiter of pending) {
      this.detach(waiter);
      waiter.reject(new Error('Rate limiter has been disposed'));
    }
  }

  private ensureWindow(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.replenish(), this.windowMs);
    this.timer.unref();
  }

  private stopWindow(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private replenish(): void {
    this.available = this.permitLimit;

    while (this.available > 0 && this.queue.length > 0) {
      const waiter = this.queue.shift();
      if (!waiter) break;
      this.available--;
      this.detach(waiter);
      waiter.resolve('queued');
    }

    // Idle with a full bucket: nothing left for the timer to do
    if (this.queue.length === 0 && this.available === this.permitLimit) {
      this.stopWindow();
    }
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }
}
