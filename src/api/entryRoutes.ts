import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { RefreshScheduler } from '../scheduler/RefreshScheduler.js';
import { mapEntryToResponse } from './entryMapper.js';

/**
 * Entry route handler
 * GET serves the latest entry, resolving on demand when none exists yet
 */
export function createEntryRouter(scheduler: RefreshScheduler): Router {
  const router = Router();

  /**
   * GET /api/entry
   */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const entry = scheduler.latestEntry() ?? (await scheduler.refresh());
      res.json({ entry: mapEntryToResponse(entry) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/entry/refresh
   */
  router.post('/refresh', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const entry = await scheduler.refresh();
      res.json({ entry: mapEntryToResponse(entry) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
