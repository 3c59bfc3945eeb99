import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { FileContainer } from './infra/container/FileContainer.js';
import { LayeredCacheStore } from './infra/cache/LayeredCacheStore.js';
import { HttpHealthDataProvider } from './infra/HttpHealthDataProvider.js';
import { LogNotificationScheduler } from './infra/notifications/LogNotificationScheduler.js';
import type { NotificationScheduler } from './infra/notifications/NotificationScheduler.js';
import { WebhookNotificationScheduler } from './infra/notifications/WebhookNotificationScheduler.js';
import { EntryResolver } from './services/EntryResolver.js';
import { ProjectionNotificationService } from './services/ProjectionNotificationService.js';
import { WeekdayAverageService } from './services/WeekdayAverageService.js';
import { RefreshScheduler } from './scheduler/RefreshScheduler.js';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import type { Request, Response, NextFunction } from 'express';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

// Initialize infrastructure adapters
const container = await FileContainer.open(env.CACHE_DIR);
const cache = new LayeredCacheStore(container, {
  maxAgeDays: env.AVERAGE_MAX_AGE_DAYS,
  refreshWindowStartHour: env.REFRESH_WINDOW_START_HOUR,
});
const provider = new HttpHealthDataProvider(env);
const notifier: NotificationScheduler = env.NOTIFY_WEBHOOK_URL
  ? new WebhookNotificationScheduler(env.NOTIFY_WEBHOOK_URL, env.HEALTH_QUERY_TIMEOUT_MS)
  : new LogNotificationScheduler();

// Initialize services
const averages = new WeekdayAverageService(provider, cache);
const resolver = new EntryResolver(provider, cache, averages);
const notifications = new ProjectionNotificationService(cache, notifier);
const scheduler = new RefreshScheduler(env, resolver, notifications);

const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// Request logging middleware
app.use((req: Request, _res: Response, next: NextFunction) => {
  loggerInstance.debug('Incoming request', {
    method: req.method,
    path: req.path,
  });
  next();
});

// Health check endpoint
app.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.use('/api', createApiRouter({ scheduler, cache, averages, notifications }));

// 404 handler
app.use(notFoundHandler);

// Global error handler
app.use(createErrorHandler(env));

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    cacheDir: env.CACHE_DIR,
  });

  scheduler.start();
  scheduler.refresh().catch((error: unknown) => {
    loggerInstance.error('Initial refresh failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  });
});

// Graceful shutdown
process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down');
  scheduler.stop();
  server.close(() => {
    loggerInstance.info('Server closed');
    process.exit(0);
  });
});

export { app };
