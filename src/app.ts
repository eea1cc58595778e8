import express from 'express';
import type { Express } from 'express';
import {
  corsMiddleware,
  createApiKeyAuth,
  createErrorHandler,
  createRateLimiter,
  requestLogger,
  securityHeaders,
} from './api/middleware';
import { createBestStoriesRouter } from './api/best-stories';
import { createHealthCheck } from './api/health';
import { createJobStatusRouter } from './api/job-status';
import type { InboundRateLimitOptions } from './api/middleware';
import type { SchedulerStatusSource } from './api/job-status';
import type { MetricsTracker } from './jobs/metrics-tracker';
import type { SnapshotStore } from './refresh/snapshot-store';
import type { BestStoriesService } from './services/best-stories';

export interface AppDependencies {
  store: SnapshotStore;
  service: BestStoriesService;
  scheduler: SchedulerStatusSource;
  metrics: MetricsTracker;
  apiKey: string | null;
  rateLimit: InboundRateLimitOptions;
  isProduction: boolean;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Trust only the first proxy (the direct one) so rate limiting sees real client IPs
  if (deps.isProduction) {
    app.set('trust proxy', 1);
  }

  app.disable('x-powered-by');
  app.use(securityHeaders);
  app.use(corsMiddleware);
  app.use(requestLogger);
  app.use(createApiKeyAuth({ apiKey: deps.apiKey, publicPaths: ['/health'] }));

  app.get('/health', createHealthCheck(deps.store));
  app.use('/api/best', createRateLimiter(deps.rateLimit), createBestStoriesRouter(deps.service));
  app.use('/api/job-status', createJobStatusRouter(deps.scheduler, deps.metrics));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(createErrorHandler(!deps.isProduction));

  return app;
}
