import { beforeEach, describe, expect, it, vi } from 'vitest';

const cronMock = vi.hoisted(() => {
  const state: { callback: (() => void) | null; stop: ReturnType<typeof vi.fn> } = {
    callback: null,
    stop: vi.fn(),
  };
  return {
    state,
    schedule: vi.fn((_expression: string, callback: () => void) => {
      state.callback = callback;
      return { stop: state.stop, start: vi.fn() };
    }),
    validate: vi.fn((expression: string) => expression.split(' ').length === 5),
  };
});

vi.mock('node-cron', () => ({
  schedule: cronMock.schedule,
  validate: cronMock.validate,
}));

import { cronExpressionForInterval, RefreshScheduler } from './scheduler';
import { RefreshJob } from './refresh-job';
import { MetricsTracker } from './metrics-tracker';
import { SnapshotStore } from '../refresh/snapshot-store';
import { FakeHackerNews } from '../test/fixtures';
import type { StoryIdSource } from '../types';
import { UpstreamError } from '../utils/errors';

async function noSleep(): Promise<void> {}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

function createScheduler(source?: StoryIdSource) {
  const upstream = new FakeHackerNews([1, 2]);
  const store = new SnapshotStore();
  const metrics = new MetricsTracker();
  const job = new RefreshJob({
    source: source ?? upstream,
    fetcher: upstream,
    store,
    metrics,
    maxParallelism: 2,
    retry: { sleep: noSleep },
  });
  return { scheduler: new RefreshScheduler(job, '*/5 * * * *'), upstream, store, metrics };
}

describe('cronExpressionForInterval', () => {
  it('builds a minute-step expression', () => {
    expect(cronExpressionForInterval(5)).toBe('*/5 * * * *');
  });

  it('rejects intervals cron cannot express as a minute step', () => {
    expect(() => cronExpressionForInterval(0)).toThrow(RangeError);
    expect(() => cronExpressionForInterval(60)).toThrow(RangeError);
    expect(() => cronExpressionForInterval(1.5)).toThrow(RangeError);
  });
});

describe('RefreshScheduler', () => {
  beforeEach(() => {
    cronMock.state.callback = null;
    cronMock.state.stop.mockClear();
    cronMock.schedule.mockClear();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('runs the first cycle immediately on start', async () => {
    const { scheduler, store } = createScheduler();

    scheduler.start();
    await flush();

    expect(cronMock.schedule).toHaveBeenCalledWith('*/5 * * * *', expect.any(Function));
    expect(store.version()).toBe(1);
    expect(scheduler.getStatus()).toEqual({
      isRunning: true,
      cronExpression: '*/5 * * * *',
      isCycleCurrentlyExecuting: false,
      state: 'idle',
    });
    await scheduler.stop();
  });

  it('refreshes again on every tick', async () => {
    const { scheduler, store, upstream } = createScheduler();
    scheduler.start();
    await flush();

    upstream.ids = [7];
    cronMock.state.callback?.();
    await flush();

    expect(store.version()).toBe(2);
    expect(store.current().map((s) => s.id)).toEqual([7]);
    await scheduler.stop();
  });

  it('skips a tick that fires while a cycle is still running', async () => {
    let release: (ids: number[]) => void = () => undefined;
    const source: StoryIdSource = {
      fetchBestStoryIds: () => new Promise<number[]>((resolve) => {
        release = resolve;
      }),
    };
    const { scheduler, metrics, store } = createScheduler(source);

    scheduler.start();
    expect(scheduler.getStatus().state).toBe('refreshing');
    cronMock.state.callback?.();
    await flush();

    expect(metrics.getStats().skippedTicks).toBe(1);

    release([1]);
    await flush();
    expect(store.version()).toBe(1);
    await scheduler.stop();
  });

  it('stops cleanly on cancellation without publishing the cycle in flight', async () => {
    const source: StoryIdSource = {
      fetchBestStoryIds: (signal) => new Promise<number[]>((_resolve, reject) => {
        signal?.addEventListener('abort', () => {
          const error = new Error('This operation was aborted');
          error.name = 'AbortError';
          reject(error);
        });
      }),
    };
    const { scheduler, store, metrics } = createScheduler(source);
    scheduler.start();

    await scheduler.stop();

    await expect(scheduler.whenStopped()).resolves.toBeUndefined();
    expect(cronMock.state.stop).toHaveBeenCalledTimes(1);
    expect(store.version()).toBe(0);
    expect(metrics.getStats().cancelledRuns).toBe(1);
    expect(scheduler.getStatus().state).toBe('stopped');
  });

  it('terminates on a cycle-fatal error and never refreshes again', async () => {
    const failure = new UpstreamError('Best stories request failed with status 500', 'https://hn.example.test/', 500);
    const fetchBestStoryIds = vi.fn(async (): Promise<number[]> => {
      throw failure;
    });
    const { scheduler } = createScheduler({ fetchBestStoryIds });

    scheduler.start();

    await expect(scheduler.whenStopped()).rejects.toBe(failure);
    expect(cronMock.state.stop).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus()).toMatchObject({ isRunning: false, state: 'stopped' });

    cronMock.state.callback?.();
    await flush();
    expect(fetchBestStoryIds).toHaveBeenCalledTimes(1);
  });

  it('refuses an invalid cron expression', () => {
    const { store } = createScheduler();
    const job = new RefreshJob({
      source: new FakeHackerNews([]),
      fetcher: new FakeHackerNews([]),
      store,
      metrics: new MetricsTracker(),
      maxParallelism: 1,
    });

    expect(() => new RefreshScheduler(job, 'every five minutes').start()).toThrow(
      'Invalid cron expression: every five minutes'
    );
  });
});
