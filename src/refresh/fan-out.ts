import type { RefreshOutcome, Story, StoryFetcher } from '../types';
import { processConcurrently } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import { InvariantViolationError } from '../utils/errors';
import type { FixedWindowRateLimiter } from '../utils/rate-limiter';

export interface FanOutOptions {
  fetcher: StoryFetcher;
  limiter: FixedWindowRateLimiter;
  /** Maximum number of fetches in flight */
  maxParallelism: number;
  signal?: AbortSignal;
}

export interface FanOutResult extends RefreshOutcome {
  /** Requests actually sent, i.e. permits granted */
  attempted: number;
}

type ItemOutcome =
  | { kind: 'story'; story: Story }
  | { kind: 'failed'; id: number };

/**
 * Fetch story details for `ids` through a bounded worker pool, taking one rate-limit
 * permit per request. Rejected permits, failed fetches and unexpected errors all
 * land in `failed`; nothing is retried inside a pass.
 *
 * @throws InvariantViolationError if the outcome does not account for every input ID exactly once
 */
export async function fetchStoriesRateLimited(
  ids: readonly number[],
  options: FanOutOptions
): Promise<FanOutResult> {
  const { fetcher, limiter, maxParallelism, signal } = options;
  let attempted = 0;

  const { successful, failed: errored } = await processConcurrently<number, ItemOutcome>(
    ids,
    async (id) => {
      const permit = await limiter.acquire(signal);
      if (permit === 'rejected') {
        debugLogger.info('FAN_OUT', `[Rejected] Could not acquire permit for item ${id}`);
        return { kind: 'failed', id };
      }

      attempted++;
      const result = await fetcher.fetchStory(id, signal);
      if (!result.ok) {
        debugLogger.info('FAN_OUT', `[Failed] Could not acquire story for item ${id}`, { reason: result.reason });
        return { kind: 'failed', id };
      }
      return { kind: 'story', story: result.story };
    },
    { concurrency: maxParallelism, label: 'Story Fetch', signal }
  );

  const succeeded: Story[] = [];
  const failed: number[] = [];
  for (const outcome of successful) {
    if (outcome.kind === 'story') {
      succeeded.push(outcome.story);
    } else {
      failed.push(outcome.id);
    }
  }
  for (const { item, error } of errored) {
    debugLogger.info('FAN_OUT', `[Error] Exception while fetching story ${item}`, { error: error.message });
    failed.push(item);
  }

  assertOutcomeCoversInput(ids, succeeded, failed);

  debugLogger.info('FAN_OUT', `${attempted} story requests sent`, {
    requested: ids.length,
    succeeded: succeeded.length,
    failed: failed.length,
  });

  return { succeeded, failed, attempted };
}

/**
 * Every input ID must come out exactly once, either as a story or as a failure.
 * Always on: a violation means lost or duplicated work, not a transient fault.
 */
export function assertOutcomeCoversInput(
  ids: readonly number[],
  succeeded: readonly Story[],
  failed: readonly number[]
): void {
  if (succeeded.length + failed.length !== ids.length) {
    throw new InvariantViolationError('Fan-out outcome count does not match input', {
      input: ids.length,
      succeeded: succeeded.length,
      failed: failed.length,
    });
  }

  const remaining = new Map<number, number>();
  for (const id of ids) {
    remaining.set(id, (remaining.get(id) ?? 0) + 1);
  }

  const seen = [...succeeded.map((story) => story.id), ...failed];
  for (const id of seen) {
    const count = remaining.get(id) ?? 0;
    if (count === 0) {
      throw new InvariantViolationError(`Fan-out produced unexpected or duplicate ID ${id}`, { id });
    }
    remaining.set(id, count - 1);
  }
}
