import path from 'path';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { HackerNewsClient } from './hackernews/client';
import { MetricsTracker } from './jobs/metrics-tracker';
import { RefreshJob } from './jobs/refresh-job';
import { RefreshScheduler } from './jobs/scheduler';
import { SnapshotStore } from './refresh/snapshot-store';
import { BestStoriesService } from './services/best-stories';
import { debugLogger } from './utils/debug-logger';

// Load .env from the working directory first, then override with the project root .env
dotenv.config();
dotenv.config({ path: path.resolve(__dirname, '../.env'), override: true });

const config = loadConfig();
debugLogger.setEnabled(config.debug);

const store = new SnapshotStore();
const metrics = new MetricsTracker();
const client = new HackerNewsClient({
  baseUrl: config.hackerNews.baseUrl,
  timeoutMs: config.hackerNews.requestTimeoutMs,
  resilience: config.hackerNews.resilience,
});
const job = new RefreshJob({
  source: client,
  fetcher: client,
  store,
  metrics,
  maxParallelism: config.hackerNews.maxParallelism,
});
const scheduler = new RefreshScheduler(job, config.refresh.cronExpression);

const app = createApp({
  store,
  service: new BestStoriesService(store),
  scheduler,
  metrics,
  apiKey: config.apiKey,
  rateLimit: config.rateLimit,
  isProduction: config.nodeEnv === 'production',
});

const server = app.listen(config.port, config.host, () => {
  console.log(`🚀 Server running on ${config.host}:${config.port}`);
  console.log(`📊 Health check: http://localhost:${config.port}/health`);
  console.log(`📰 Best stories: http://localhost:${config.port}/api/best?n=10`);

  // Start background refresh (first cycle runs immediately)
  scheduler.start();
});

// A cycle-fatal error ends freshness for good; let the host restart the process
scheduler.whenStopped().catch((error) => {
  console.error('🚨 Background refresh terminated:', error);
  server.close(() => process.exit(1));
});

async function shutdown(): Promise<void> {
  console.log('Shutting down gracefully...');
  await scheduler.stop();
  debugLogger.logActiveSteps();
  store.clear();
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => {
  shutdown().catch((error) => {
    console.error('Error during shutdown:', error);
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  shutdown().catch((error) => {
    console.error('Error during shutdown:', error);
    process.exit(1);
  });
});
