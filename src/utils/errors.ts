/**
 * Error classes shared by the refresh pipeline and the HTTP layer
 */

/**
 * Raised when the upstream API answers the ID list request with a bad status or payload.
 * Escapes the per-item boundary, so it ends the background refresh process.
 */
export class UpstreamError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, url: string, status: number | null = null) {
    super(message);
    this.name = 'UpstreamError';
    this.url = url;
    this.status = status;
  }
}

/**
 * A correctness property of the pipeline did not hold. Never retried.
 */
export class InvariantViolationError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'InvariantViolationError';
    this.details = details;
  }
}

/**
 * Cooperative shutdown observed during refresh work
 */
export class RefreshCancelledError extends Error {
  constructor(message = 'Refresh cancelled') {
    super(message);
    this.name = 'RefreshCancelledError';
  }
}

/**
 * Invalid environment configuration, listing every offending variable
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * True for our own cancellation error and for the AbortError that fetch and timers raise
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof RefreshCancelledError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Throw a RefreshCancelledError if the signal has been aborted
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RefreshCancelledError();
  }
}
