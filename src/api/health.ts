import type { Request, Response, RequestHandler } from 'express';
import type { SnapshotStore } from '../refresh/snapshot-store';

/**
 * Liveness plus snapshot freshness. Reports 'warming-up' until the first refresh publishes.
 */
export function createHealthCheck(store: SnapshotStore): RequestHandler {
  return (_req: Request, res: Response): void => {
    const lastRefreshAt = store.publishedAt();

    res.json({
      status: lastRefreshAt ? 'healthy' : 'warming-up',
      stories: store.current().length,
      snapshotVersion: store.version(),
      lastRefreshAt: lastRefreshAt?.toISOString() ?? null,
      timestamp: new Date().toISOString(),
    });
  };
}
