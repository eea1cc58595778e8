/**
 * Per-request resilience for upstream calls: bounded retry with exponential
 * backoff, and a failure-ratio circuit breaker shared by every request of a client.
 */

import { debugLogger } from '../utils/debug-logger';

export interface ResilienceOptions {
  /** Extra attempts after the first one. Default: 3 */
  retryCount: number;
  /** Base backoff; attempt k waits backoffMs * 2^(k-1). Default: 2000 */
  backoffMs: number;
  /** Failure ratio in the sampling window that opens the circuit. Default: 0.5 */
  failureRatio: number;
  /** Default: 30000 */
  samplingDurationMs: number;
  /** Outcomes needed in the window before the ratio is evaluated. Default: 10 */
  minimumThroughput: number;
  /** How long the circuit stays open before a trial request. Default: 5000 */
  breakDurationMs: number;
}

export const DEFAULT_RESILIENCE_OPTIONS: ResilienceOptions = {
  retryCount: 3,
  backoffMs: 2000,
  failureRatio: 0.5,
  samplingDurationMs: 30000,
  minimumThroughput: 10,
  breakDurationMs: 5000,
};

export class CircuitOpenError extends Error {
  constructor(readonly retryAfterMs: number) {
    super('Circuit breaker is open');
    this.name = 'CircuitOpenError';
  }
}

/**
 * Statuses worth another attempt: timeouts, throttling and server errors
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function backoffDelay(attempt: number, backoffMs: number): number {
  return backoffMs * 2 ** (attempt - 1);
}

export type CircuitState = 'closed' | 'open' | 'half-open';

interface Sample {
  at: number;
  failed: boolean;
}

export type CircuitBreakerOptions = Pick<
  ResilienceOptions,
  'failureRatio' | 'samplingDurationMs' | 'minimumThroughput' | 'breakDurationMs'
>;

export class CircuitBreaker {
  private samples: Sample[] = [];
  private state: CircuitState = 'closed';
  private openedAt = 0;
  private trialInFlight = false;
  private readonly options: CircuitBreakerOptions;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions, now: () => number = Date.now) {
    if (!(options.failureRatio > 0 && options.failureRatio <= 1)) {
      throw new RangeError(`failureRatio must be in (0, 1], got ${options.failureRatio}`);
    }
    this.options = options;
    this.now = now;
  }

  getState(): CircuitState {
    return this.state;
  }

  /**
   * Ask to send a request. Throws CircuitOpenError while the circuit is open,
   * and while the single half-open trial request is still in flight.
   */
  acquire(): void {
    if (this.state === 'open') {
      const elapsed = this.now() - this.openedAt;
      if (elapsed < this.options.breakDurationMs) {
        throw new CircuitOpenError(this.options.breakDurationMs - elapsed);
      }
      this.state = 'half-open';
      debugLogger.info('CIRCUIT', 'Circuit half-open, sending a trial request');
    }

    if (this.state === 'half-open') {
      if (this.trialInFlight) {
        throw new CircuitOpenError(0);
      }
      this.trialInFlight = true;
    }
  }

  recordSuccess(): void {
    if (this.state === 'half-open') {
      this.trialInFlight = false;
      this.state = 'closed';
      this.samples = [];
      console.log('✅ Hacker News circuit closed');
      return;
    }
    this.addSample(false);
  }

  recordFailure(): void {
    if (this.state === 'half-open') {
      this.trialInFlight = false;
      this.open();
      return;
    }
    this.addSample(true);

    const failures = this.samples.filter((sample) => sample.failed).length;
    if (
      this.samples.length >= this.options.minimumThroughput &&
      failures / this.samples.length >= this.options.failureRatio
    ) {
      this.open();
    }
  }

  /**
   * The acquired request ended without an outcome (cancelled by the caller)
   */
  release(): void {
    if (this.state === 'half-open') {
      this.trialInFlight = false;
    }
  }

  private addSample(failed: boolean): void {
    const now = this.now();
    const cutoff = now - this.options.samplingDurationMs;
    this.samples = this.samples.filter((sample) => sample.at > cutoff);
    this.samples.push({ at: now, failed });
  }

  private open(): void {
    this.state = 'open';
    this.openedAt = this.now();
    this.samples = [];
    console.error(`🚨 Hacker News circuit opened for ${this.options.breakDurationMs}ms: upstream is failing`);
  }
}
