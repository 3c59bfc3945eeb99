import { isSameDay } from '../domain/calendar.js';
import type { GoalCrossingEvent } from '../domain/entities/GoalCrossingEvent.js';
import type { ResolvedEntry } from '../domain/entities/ResolvedEntry.js';
import { describeError, type CacheWriteError } from '../domain/errors.js';
import { detectCrossing } from '../domain/goalCrossing.js';
import { attempt, type Result } from '../domain/result.js';
import type { LayeredCacheStore } from '../infra/cache/LayeredCacheStore.js';
import { logger } from '../infra/logger.js';
import type { NotificationScheduler } from '../infra/notifications/NotificationScheduler.js';

/**
 * ProjectionNotificationService - compares each new pace projection with the
 * last one acted on and requests a notification when it crosses the goal
 */
export class ProjectionNotificationService {
  constructor(
    private cache: LayeredCacheStore,
    private notifier: NotificationScheduler
  ) {}

  /**
   * Only live and cached entries carry a real projection; the rest are ignored
   */
  async handle(entry: ResolvedEntry, now: Date = new Date()): Promise<GoalCrossingEvent | null> {
    if (!entry.authorized || (entry.source !== 'live' && entry.source !== 'cached')) {
      return null;
    }

    const previous = await this.previousProjection(now);
    const current = entry.paceProjectedTotal;
    const event = detectCrossing(previous, current, entry.goal, now);

    if (event) {
      logger.info('Projection crossed goal', {
        direction: event.direction,
        previous,
        current,
        goal: entry.goal,
      });
      const delivered = await attempt(() => this.notifier.scheduleNotification(event));
      if (!delivered.ok) {
        logger.error('Failed to schedule goal notification', {
          direction: event.direction,
          error: describeError(delivered.error),
        });
      }
    }

    await this.cache.projection.save({ projectedTotal: current, observedAt: now }, now);
    return event;
  }

  async clearForNewDay(): Promise<Result<void, CacheWriteError>> {
    logger.info('Clearing projection state for new day');
    return this.cache.projection.clear();
  }

  private async previousProjection(now: Date): Promise<number | null> {
    const stored = await this.cache.projection.load();
    if (!stored) return null;

    if (!isSameDay(stored.observedAt, now)) {
      await this.cache.projection.clear();
      return null;
    }
    return stored.projectedTotal;
  }
}
