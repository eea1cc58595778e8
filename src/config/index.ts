import os from 'os';
import { z } from 'zod';
import { DEFAULT_HN_BASE_URL } from '../hackernews/client';
import { DEFAULT_RESILIENCE_OPTIONS } from '../hackernews/resilience';
import { cronExpressionForInterval } from '../jobs/scheduler';
import { ConfigError } from '../utils/errors';

const optionalInt = (min: number, max?: number) => {
  const base = z.coerce.number().int().min(min);
  return (max === undefined ? base : base.max(max)).optional();
};

/**
 * Environment variables understood by the service. Everything is optional.
 */
const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  DEBUG: z.string().optional(),
  PORT: optionalInt(1, 65535),
  HOST: z.string().min(1).optional(),
  API_KEY: z.string().min(1).optional(),
  HN_BASE_URL: z.string().url().optional(),
  REFRESH_INTERVAL_MINUTES: optionalInt(1, 59),
  REFRESH_CRON: z.string().min(1).optional(),
  MAX_PARALLELISM: optionalInt(1, 256),
  REQUEST_TIMEOUT_MS: optionalInt(1),
  HN_RETRY_COUNT: optionalInt(0, 10),
  HN_BACKOFF_SECONDS: optionalInt(0),
  HN_CIRCUIT_BREAKER_THRESHOLD: z.coerce.number().gt(0).max(1).optional(),
  HN_SAMPLING_DURATION_SECONDS: optionalInt(1),
  RATE_LIMIT_PERMIT_LIMIT: optionalInt(1),
  RATE_LIMIT_WINDOW_SECONDS: optionalInt(1),
});

export interface AppConfig {
  nodeEnv: string;
  debug: boolean;
  port: number;
  host: string;
  apiKey: string | null;
  hackerNews: {
    baseUrl: string;
    requestTimeoutMs: number;
    maxParallelism: number;
    resilience: {
      retryCount: number;
      backoffMs: number;
      failureRatio: number;
      samplingDurationMs: number;
    };
  };
  refresh: {
    intervalMinutes: number;
    cronExpression: string;
  };
  rateLimit: {
    permitLimit: number;
    windowMs: number;
  };
}

export const DEFAULT_REFRESH_INTERVAL_MINUTES = 5;

/**
 * Build the config from an environment map (process.env by default).
 * Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  const intervalMinutes = vars.REFRESH_INTERVAL_MINUTES ?? DEFAULT_REFRESH_INTERVAL_MINUTES;

  return {
    nodeEnv: vars.NODE_ENV ?? 'development',
    debug: vars.DEBUG === 'true' || vars.DEBUG === '1',
    port: vars.PORT ?? 3001,
    host: vars.HOST ?? '0.0.0.0',
    apiKey: vars.API_KEY ?? null,
    hackerNews: {
      baseUrl: vars.HN_BASE_URL ?? DEFAULT_HN_BASE_URL,
      requestTimeoutMs: vars.REQUEST_TIMEOUT_MS ?? 10000,
      maxParallelism: vars.MAX_PARALLELISM ?? Math.max(1, os.cpus().length),
      resilience: {
        retryCount: vars.HN_RETRY_COUNT ?? DEFAULT_RESILIENCE_OPTIONS.retryCount,
        backoffMs:
          vars.HN_BACKOFF_SECONDS === undefined ? DEFAULT_RESILIENCE_OPTIONS.backoffMs : vars.HN_BACKOFF_SECONDS * 1000,
        failureRatio: vars.HN_CIRCUIT_BREAKER_THRESHOLD ?? DEFAULT_RESILIENCE_OPTIONS.failureRatio,
        samplingDurationMs:
          vars.HN_SAMPLING_DURATION_SECONDS === undefined
            ? DEFAULT_RESILIENCE_OPTIONS.samplingDurationMs
            : vars.HN_SAMPLING_DURATION_SECONDS * 1000,
      },
    },
    refresh: {
      intervalMinutes,
      cronExpression: vars.REFRESH_CRON ?? cronExpressionForInterval(intervalMinutes),
    },
    rateLimit: {
      permitLimit: vars.RATE_LIMIT_PERMIT_LIMIT ?? 100,
      windowMs: (vars.RATE_LIMIT_WINDOW_SECONDS ?? 60) * 1000,
    },
  };
}
