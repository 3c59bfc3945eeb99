import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { LayeredCacheStore } from '../infra/cache/LayeredCacheStore.js';
import type { ProjectionNotificationService } from '../services/ProjectionNotificationService.js';
import type { WeekdayAverageService } from '../services/WeekdayAverageService.js';
import { mapInspectionToResponse } from './entryMapper.js';

/**
 * Cache inspection and maintenance routes
 */
export function createCacheRouter(deps: {
  cache: LayeredCacheStore;
  averages: WeekdayAverageService;
  notifications: ProjectionNotificationService;
}): Router {
  const router = Router();

  /**
   * GET /api/cache
   */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const inspection = await deps.cache.inspect(new Date());
      res.json(mapInspectionToResponse(inspection));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/cache/projection
   */
  router.delete('/projection', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const cleared = await deps.notifications.clearForNewDay();
      if (!cleared.ok) {
        throw cleared.error;
      }
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/cache/weekdays/populate
   */
  router.post('/weekdays/populate', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await deps.averages.populateAll(new Date());
      res.status(summary.failed.length > 0 ? 207 : 200).json(summary);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
