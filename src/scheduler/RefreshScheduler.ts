import cron, { type ScheduledTask } from 'node-cron';
import { startOfDay } from '../domain/calendar.js';
import type { ResolvedEntry } from '../domain/entities/ResolvedEntry.js';
import { describeError } from '../domain/errors.js';
import type { Env } from '../infra/env.js';
import { logger } from '../infra/logger.js';
import type { EntryResolver } from '../services/EntryResolver.js';
import type { ProjectionNotificationService } from '../services/ProjectionNotificationService.js';

/**
 * RefreshScheduler - periodic entry resolution using node-cron
 * Keeps the latest entry for the HTTP layer and publishes the zero-state
 * entry at midnight.
 */
export class RefreshScheduler {
  private refreshTask: ScheduledTask | null = null;
  private midnightTask: ScheduledTask | null = null;
  private inFlight: Promise<ResolvedEntry> | null = null;
  private latest: ResolvedEntry | null = null;
  private pendingMidnight: ResolvedEntry | null = null;

  constructor(
    private env: Pick<Env, 'REFRESH_INTERVAL_MINUTES'>,
    private resolver: EntryResolver,
    private notifications: ProjectionNotificationService
  ) {}

  /**
   * Start the refresh task (every REFRESH_INTERVAL_MINUTES) and the midnight task
   */
  start(): void {
    const cronExpression = `*/${this.env.REFRESH_INTERVAL_MINUTES} * * * *`;

    this.refreshTask = cron.schedule(cronExpression, async () => {
      await this.runScheduledRefresh();
    });
    this.midnightTask = cron.schedule('0 0 * * *', async () => {
      await this.runMidnight();
    });

    logger.info('RefreshScheduler started', {
      intervalMinutes: this.env.REFRESH_INTERVAL_MINUTES,
      cronExpression,
    });
  }

  stop(): void {
    if (this.refreshTask) {
      this.refreshTask.stop();
      this.refreshTask = null;
    }
    if (this.midnightTask) {
      this.midnightTask.stop();
      this.midnightTask = null;
    }
    logger.info('RefreshScheduler stopped');
  }

  latestEntry(): ResolvedEntry | null {
    return this.latest;
  }

  /**
   * Resolve now. Concurrent callers share the run already in progress.
   */
  refresh(now: Date = new Date()): Promise<ResolvedEntry> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.performRefresh(now).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /**
   * Clear the projection state and publish the new day's zero-state entry
   */
  async runMidnight(now: Date = new Date()): Promise<void> {
    await this.notifications.clearForNewDay();

    const dayStart = startOfDay(now);
    let entry = this.pendingMidnight;
    if (!entry && this.latest) {
      entry = await this.resolver.synthesizeMidnightEntry(dayStart, this.latest);
    }
    this.pendingMidnight = null;

    if (entry) {
      this.latest = entry;
      logger.info('Midnight entry published', { asOf: entry.asOf.toISOString() });
    }
  }

  private async performRefresh(now: Date): Promise<ResolvedEntry> {
    const timeline = await this.resolver.resolveTimeline(now, this.env.REFRESH_INTERVAL_MINUTES);
    const [current, midnight] = timeline.entries;

    this.latest = current;
    this.pendingMidnight = midnight ?? null;

    await this.notifications.handle(current, now);

    logger.info('Entry refreshed', {
      source: current.source,
      todayTotal: Math.round(current.todayTotal),
      paceProjectedTotal: Math.round(current.paceProjectedTotal),
      nextRefreshAt: timeline.nextRefreshAt.toISOString(),
    });
    return current;
  }

  private async runScheduledRefresh(): Promise<void> {
    if (this.inFlight) {
      logger.info('Scheduled refresh skipped - previous run still in progress');
      return;
    }

    try {
      await this.refresh();
    } catch (error) {
      logger.error('Scheduled refresh failed', { error: describeError(error) });
    }
  }
}
