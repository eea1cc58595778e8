import os from 'os';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './index';
import { ConfigError } from '../utils/errors';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      nodeEnv: 'development',
      debug: false,
      port: 3001,
      host: '0.0.0.0',
      apiKey: null,
      hackerNews: {
        baseUrl: 'https://hacker-news.firebaseio.com/v0/',
        requestTimeoutMs: 10000,
        maxParallelism: Math.max(1, os.cpus().length),
        resilience: { retryCount: 3, backoffMs: 2000, failureRatio: 0.5, samplingDurationMs: 30000 },
      },
      refresh: { intervalMinutes: 5, cronExpression: '*/5 * * * *' },
      rateLimit: { permitLimit: 100, windowMs: 60000 },
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      API_KEY: 'test-secret',
      HN_BASE_URL: 'https://hn.example.test/v0/',
      REFRESH_INTERVAL_MINUTES: '10',
      MAX_PARALLELISM: '3',
      RATE_LIMIT_PERMIT_LIMIT: '5',
      RATE_LIMIT_WINDOW_SECONDS: '2',
      DEBUG: 'true',
    });

    expect(config.port).toBe(8080);
    expect(config.apiKey).toBe('test-secret');
    expect(config.hackerNews.baseUrl).toBe('https://hn.example.test/v0/');
    expect(config.hackerNews.maxParallelism).toBe(3);
    expect(config.refresh.cronExpression).toBe('*/10 * * * *');
    expect(config.rateLimit).toEqual({ permitLimit: 5, windowMs: 2000 });
    expect(config.debug).toBe(true);
  });

  it('reads upstream resilience settings', () => {
    const config = loadConfig({
      HN_RETRY_COUNT: '0',
      HN_BACKOFF_SECONDS: '1',
      HN_CIRCUIT_BREAKER_THRESHOLD: '0.25',
      HN_SAMPLING_DURATION_SECONDS: '60',
    });

    expect(config.hackerNews.resilience).toEqual({
      retryCount: 0,
      backoffMs: 1000,
      failureRatio: 0.25,
      samplingDurationMs: 60000,
    });
  });

  it('rejects a circuit breaker threshold outside (0, 1]', () => {
    expect(() => loadConfig({ HN_CIRCUIT_BREAKER_THRESHOLD: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ HN_CIRCUIT_BREAKER_THRESHOLD: '1.5' })).toThrow(ConfigError);
  });

  it('prefers an explicit cron expression', () => {
    expect(loadConfig({ REFRESH_CRON: '0 * * * *' }).refresh.cronExpression).toBe('0 * * * *');
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ API_KEY: '', PORT: '  ' })).toMatchObject({ apiKey: null, port: 3001 });
  });

  it('lists every invalid variable', () => {
    let error: unknown;
    try {
      loadConfig({ PORT: 'abc', REFRESH_INTERVAL_MINUTES: '90', HN_BASE_URL: 'not a url' });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues.some((issue) => issue.startsWith('PORT:'))).toBe(true);
    expect(issues.some((issue) => issue.startsWith('REFRESH_INTERVAL_MINUTES:'))).toBe(true);
    expect(issues.some((issue) => issue.startsWith('HN_BASE_URL:'))).toBe(true);
  });
});
