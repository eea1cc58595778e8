import type { Story } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { sleep as defaultSleep } from '../utils/time';
import type { FanOutResult } from './fan-out';

export const MAX_FAILED_REQUEST_RETRIES = 5;
export const RETRY_DELAY_MS = 5000;

export interface RetryOptions {
  /** Runs one fan-out pass over the given IDs */
  fanOut: (ids: number[]) => Promise<FanOutResult>;
  maxRetries?: number;
  delayMs?: number;
  signal?: AbortSignal;
  /** Injected for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RetryResult {
  /** Stories recovered by retry passes */
  succeeded: Story[];
  /** IDs still failing after the last pass; these are dropped */
  failed: number[];
  /** Number of retry passes run */
  attempts: number;
}

/**
 * Re-run the fan-out over failed IDs with a fixed pause between passes,
 * until nothing fails or the retry ceiling is reached.
 */
export async function retryFailed(initialFailed: readonly number[], options: RetryOptions): Promise<RetryResult> {
  const {
    fanOut,
    maxRetries = MAX_FAILED_REQUEST_RETRIES,
    delayMs = RETRY_DELAY_MS,
    signal,
    sleep = defaultSleep,
  } = options;

  const succeeded: Story[] = [];
  let failed = [...initialFailed];
  let attempts = 0;

  while (failed.length > 0 && attempts < maxRetries) {
    // Give the upstream rate limits time to reset
    await sleep(delayMs, signal);
    attempts++;

    const stepId = debugLogger.stepStart('RETRY', `Retry ${attempts}/${maxRetries}`, { pending: failed.length });
    const pass = await fanOut(failed);
    succeeded.push(...pass.succeeded);
    failed = pass.failed;
    debugLogger.stepFinish(stepId, { recovered: pass.succeeded.length, stillFailing: failed.length });
  }

  if (failed.length > 0) {
    debugLogger.warn('RETRY', `Dropping ${failed.length} stories after ${attempts} retries`, { ids: failed });
  }

  return { succeeded, failed, attempts };
}
