import type { FetchResult, Story, StoryFetcher, StoryIdSource } from '../types';
import { HackerNewsItemSchema, MAX_BEST_STORIES, StoryIdListSchema } from '../schemas';
import type { HackerNewsItem } from '../schemas';
import { debugLogger } from '../utils/debug-logger';
import { RefreshCancelledError, UpstreamError } from '../utils/errors';
import { sleep as defaultSleep } from '../utils/time';
import { backoffDelay, CircuitBreaker, DEFAULT_RESILIENCE_OPTIONS, isTransientStatus } from './resilience';
import type { ResilienceOptions } from './resilience';

export const DEFAULT_HN_BASE_URL = 'https://hacker-news.firebaseio.com/v0/';

const BEST_STORIES_PATH = 'beststories.json';
const DISCUSSION_URL = 'https://news.ycombinator.com/item?id=';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HackerNewsClientOptions {
  baseUrl?: string;
  /** Per-request timeout in milliseconds. Default: 10000 */
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetchFn?: FetchFn;
  resilience?: Partial<ResilienceOptions>;
  /** Injected for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Clock for the circuit breaker; injected for tests */
  now?: () => number;
}

/**
 * Convert a validated upstream item into a frozen Story.
 * Text posts have no url, so they link to their discussion page instead.
 */
export function toStory(item: HackerNewsItem): Story {
  return Object.freeze({
    id: item.id,
    title: item.title,
    url: item.url ?? `${DISCUSSION_URL}${item.id}`,
    author: item.by,
    time: item.time,
    score: item.score,
    descendants: item.descendants ?? 0,
  });
}

/**
 * Read client for the Hacker News Firebase API
 */
export class HackerNewsClient implements StoryFetcher, StoryIdSource {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly resilience: ResilienceOptions;
  private readonly breaker: CircuitBreaker;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: HackerNewsClientOptions = {}) {
    const { baseUrl = DEFAULT_HN_BASE_URL, timeoutMs = 10000, fetchFn = fetch, sleep = defaultSleep } = options;
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.timeoutMs = timeoutMs;
    this.fetchFn = fetchFn;
    this.sleep = sleep;
    this.resilience = { ...DEFAULT_RESILIENCE_OPTIONS, ...options.resilience };
    if (!Number.isInteger(this.resilience.retryCount) || this.resilience.retryCount < 0) {
      throw new RangeError(`retryCount must be a non-negative integer, got ${this.resilience.retryCount}`);
    }
    this.breaker = new CircuitBreaker(this.resilience, options.now);
  }

  itemUrl(id: number): string {
    return `${this.baseUrl}item/${id}.json`;
  }

  /**
   * Fetch the ordered best-story ID list, truncated to MAX_BEST_STORIES.
   * Any failure here is an UpstreamError: there is nothing to fan out without it.
   */
  async fetchBestStoryIds(signal?: AbortSignal): Promise<number[]> {
    const url = `${this.baseUrl}${BEST_STORIES_PATH}`;
    const stepId = debugLogger.stepStart('HN_FETCH', 'Fetching best story IDs', { url });

    let body: unknown;
    try {
      const response = await this.send(url, signal);
      if (!response.ok) {
        await response.body?.cancel();
        throw new UpstreamError(`Best stories request failed with status ${response.status}`, url, response.status);
      }
      body = await response.json();
    } catch (error) {
      if (signal?.aborted) {
        throw new RefreshCancelledError();
      }
      debugLogger.stepError(stepId, 'HN_FETCH', 'Best story ID request failed', error);
      if (error instanceof UpstreamError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Best stories request failed: ${message}`, url);
    }

    const parsed = StoryIdListSchema.safeParse(body);
    if (!parsed.success) {
      const error = new UpstreamError(`Malformed best stories payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`, url);
      debugLogger.stepError(stepId, 'HN_FETCH', 'Best story ID payload rejected', error);
      throw error;
    }

    const ids = parsed.data.slice(0, MAX_BEST_STORIES);
    debugLogger.stepFinish(stepId, { received: parsed.data.length, kept: ids.length });
    return ids;
  }

  /**
   * Fetch one story. Network errors, timeouts, bad statuses, malformed
   * payloads and an open circuit all come back as `{ ok: false }`; only
   * cancellation throws.
   */
  async fetchStory(id: number, signal?: AbortSignal): Promise<FetchResult> {
    const url = this.itemUrl(id);

    try {
      const response = await this.send(url, signal);
      if (!response.ok) {
        await response.body?.cancel();
        return { ok: false, id, reason: `HTTP ${response.status}` };
      }

      const parsed = HackerNewsItemSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { ok: false, id, reason: 'Malformed or missing story payload' };
      }
      if (parsed.data.id !== id) {
        return { ok: false, id, reason: `Payload is for item ${parsed.data.id}` };
      }

      return { ok: true, story: toStory(parsed.data) };
    } catch (error) {
      if (signal?.aborted) {
        throw new RefreshCancelledError();
      }
      const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      debugLogger.warn('HN_FETCH', `Story ${id} request failed`, { reason });
      return { ok: false, id, reason };
    }
  }

  /**
   * GET `url` through the circuit breaker, retrying network errors and transient
   * statuses with exponential backoff. After the last attempt a transient
   * response is returned as-is and a network error is rethrown.
   */
  private async send(url: string, signal?: AbortSignal): Promise<Response> {
    const { retryCount, backoffMs } = this.resilience;

    for (let attempt = 0; ; attempt++) {
      if (attempt > 0) {
        const delay = backoffDelay(attempt, backoffMs);
        debugLogger.info('HN_FETCH', `Retry ${attempt}/${retryCount} for ${url} in ${delay}ms`);
        await this.sleep(delay, signal);
      }

      this.breaker.acquire();

      let response: Response;
      try {
        response = await this.fetchFn(url, { signal: this.requestSignal(signal) });
      } catch (error) {
        if (signal?.aborted) {
          this.breaker.release();
          throw new RefreshCancelledError();
        }
        this.breaker.recordFailure();
        if (attempt >= retryCount) throw error;
        continue;
      }

      if (!isTransientStatus(response.status)) {
        this.breaker.recordSuccess();
        return response;
      }

      this.breaker.recordFailure();
      if (attempt >= retryCount) return response;
      await response.body?.cancel();
    }
  }

  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}
