import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RefreshJob } from './refresh-job';
import type { RefreshJobOptions } from './refresh-job';
import { MetricsTracker } from './metrics-tracker';
import { SnapshotStore } from '../refresh/snapshot-store';
import { FakeHackerNews, makeStory } from '../test/fixtures';
import { RefreshCancelledError, UpstreamError } from '../utils/errors';
import type { StoryIdSource } from '../types';

async function noSleep(): Promise<void> {}

function createJob(upstream: FakeHackerNews, overrides: Partial<RefreshJobOptions> = {}) {
  const store = new SnapshotStore();
  const metrics = new MetricsTracker();
  const job = new RefreshJob({
    source: upstream,
    fetcher: upstream,
    store,
    metrics,
    maxParallelism: 4,
    retry: { sleep: noSleep },
    ...overrides,
  });
  return { job, store, metrics };
}

describe('RefreshJob', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('publishes every fetched story as a new snapshot', async () => {
    const { job, store, metrics } = createJob(new FakeHackerNews([1, 2, 3]));

    const cycle = await job.run();

    expect(store.current().map((s) => s.id).sort()).toEqual([1, 2, 3]);
    expect(cycle).toMatchObject({
      requested: 3,
      succeeded: 3,
      dropped: 0,
      retryAttempts: 0,
      completenessRatio: 1,
    });
    expect(metrics.getStats().successfulRuns).toBe(1);
  });

  it('recovers transient failures through retries', async () => {
    const upstream = new FakeHackerNews([1, 2, 3], { 2: 2 });
    const { job, store } = createJob(upstream);

    const cycle = await job.run();

    expect(store.current().map((s) => s.id).sort()).toEqual([1, 2, 3]);
    expect(cycle?.retryAttempts).toBe(2);
    expect(upstream.requests.filter((id) => id === 2)).toHaveLength(3);
  });

  it('publishes without ids that fail every retry', async () => {
    const upstream = new FakeHackerNews([1, 2, 3, 4], { 4: Infinity });
    const { job, store, metrics } = createJob(upstream);

    const cycle = await job.run();

    expect(store.current().map((s) => s.id).sort()).toEqual([1, 2, 3]);
    expect(cycle).toMatchObject({ requested: 4, succeeded: 3, dropped: 1, retryAttempts: 5, completenessRatio: 0.75 });
    expect(upstream.requests.filter((id) => id === 4)).toHaveLength(6);
    expect(metrics.getStats().totalStoriesDropped).toBe(1);
  });

  it('replaces the previous snapshot instead of merging into it', async () => {
    const upstream = new FakeHackerNews([1, 2]);
    const { job, store } = createJob(upstream);

    await job.run();
    upstream.ids = [3];
    await job.run();

    expect(store.current().map((s) => s.id)).toEqual([3]);
  });

  it('propagates an ID list failure and keeps the previous snapshot', async () => {
    const upstream = new FakeHackerNews([1]);
    const { job, store, metrics } = createJob(upstream);
    await job.run();

    upstream.idListError = new UpstreamError('Best stories request failed with status 503', 'https://hn.example.test/', 503);

    await expect(job.run()).rejects.toBe(upstream.idListError);
    expect(store.current().map((s) => s.id)).toEqual([1]);
    expect(store.version()).toBe(1);
    expect(metrics.getStats().failedRuns).toBe(1);
    expect(job.isCycleRunning()).toBe(false);
  });

  it('does not publish a cycle cancelled during retries', async () => {
    const upstream = new FakeHackerNews([1, 2], { 2: Infinity });
    const controller = new AbortController();
    const { job, store, metrics } = createJob(upstream, {
      retry: {
        sleep: async () => {
          controller.abort();
          throw new RefreshCancelledError();
        },
      },
    });

    await expect(job.run(controller.signal)).rejects.toBeInstanceOf(RefreshCancelledError);
    expect(store.version()).toBe(0);
    expect(metrics.getStats().cancelledRuns).toBe(1);
  });

  it('skips a run requested while a cycle is in progress', async () => {
    let release: (ids: number[]) => void = () => undefined;
    const source: StoryIdSource = {
      fetchBestStoryIds: () => new Promise<number[]>((resolve) => {
        release = resolve;
      }),
    };
    const upstream = new FakeHackerNews([]);
    const { job, store, metrics } = createJob(upstream, { source });

    const first = job.run();
    expect(job.isCycleRunning()).toBe(true);

    await expect(job.run()).resolves.toBeNull();
    expect(metrics.getStats().skippedTicks).toBe(1);

    release([5]);
    await first;
    expect(store.current()).toEqual([makeStory(5)]);
    expect(job.isCycleRunning()).toBe(false);
  });

  it('rejects a non-positive parallelism', () => {
    expect(() => createJob(new FakeHackerNews([]), { maxParallelism: 0 })).toThrow(RangeError);
  });
});
