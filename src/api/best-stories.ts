import { Router } from 'express';
import type { Request, Response } from 'express';
import { BestStoriesQuerySchema, INTEGER_PATTERN, MAX_BEST_STORIES } from '../schemas';
import type { BestStoriesService } from '../services/best-stories';
import { debugLogger } from '../utils/debug-logger';

/**
 * GET /api/best?n=<1-200>
 * Top `n` stories of the current snapshot by descending score.
 * An empty array (not an error) is returned until the first refresh has completed.
 */
export function createBestStoriesRouter(service: BestStoriesService): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    const rawN = req.query.n;

    if (rawN === undefined || rawN === '') {
      debugLogger.warn('API', 'Validation failed for n=NULL');
      res.status(400).json({ error: "Parameter 'n' is required." });
      return;
    }

    const parsed = BestStoriesQuerySchema.safeParse({ n: rawN });
    if (!parsed.success) {
      // Integers out of range are echoed as numbers, anything else as sent
      const receivedValue = typeof rawN === 'string' && INTEGER_PATTERN.test(rawN) ? Number(rawN) : rawN;
      debugLogger.warn('API', 'Validation failed for n', { receivedValue });
      res.status(400).json({
        error: "Invalid range for 'n'.",
        detail: `The number of stories (n) must be between 1 and ${MAX_BEST_STORIES}.`,
        receivedValue,
      });
      return;
    }

    res.json(service.getBestStories(parsed.data.n));
  });

  return router;
}
