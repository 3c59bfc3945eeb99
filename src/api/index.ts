import { Router } from 'express';
import { createEntryRouter } from './entryRoutes.js';
import { createCacheRouter } from './cacheRoutes.js';
import type { LayeredCacheStore } from '../infra/cache/LayeredCacheStore.js';
import type { RefreshScheduler } from '../scheduler/RefreshScheduler.js';
import type { ProjectionNotificationService } from '../services/ProjectionNotificationService.js';
import type { WeekdayAverageService } from '../services/WeekdayAverageService.js';

/**
 * Main API router - dependencies injected from server.ts
 */
export function createApiRouter(deps: {
  scheduler: RefreshScheduler;
  cache: LayeredCacheStore;
  averages: WeekdayAverageService;
  notifications: ProjectionNotificationService;
}): Router {
  const router = Router();

  router.use('/entry', createEntryRouter(deps.scheduler));
  router.use('/cache', createCacheRouter(deps));

  return router;
}
