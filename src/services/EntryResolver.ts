import { addDays, addMinutes, isSameDay, startOfDay } from '../domain/calendar.js';
import { zeroSeries, type DaySeries } from '../domain/entities/EnergySeries.js';
import { createResolvedEntry, type ResolvedEntry } from '../domain/entities/ResolvedEntry.js';
import { createTodaySnapshot, type WeekdayAverageSnapshot } from '../domain/entities/Snapshots.js';
import { weekdayName, weekdayOf, type Weekday } from '../domain/entities/Weekday.js';
import { describeError, isAppError } from '../domain/errors.js';
import { attempt, type Result } from '../domain/result.js';
import { withAsOfPoint } from '../domain/series/averageWeekday.js';
import { anchorSeriesToDay, interpolate } from '../domain/series/interpolate.js';
import type { LayeredCacheStore } from '../infra/cache/LayeredCacheStore.js';
import type { HealthDataProvider, TodayHourly } from '../infra/HealthDataProvider.js';
import { logger } from '../infra/logger.js';
import type { WeekdayAverageService } from './WeekdayAverageService.js';

export interface ResolveOptions {
  /** Weekday whose average is shown; defaults to the weekday of `now` */
  weekday?: Weekday;
  signal?: AbortSignal;
}

export interface ResolvedTimeline {
  entries: ResolvedEntry[];
  nextRefreshAt: Date;
}

interface AverageView {
  series: DaySeries;
  projectedTotal: number;
  averageAtAsOf: number;
}

const NO_AVERAGE: AverageView = { series: [], projectedTotal: 0, averageAtAsOf: 0 };

/**
 * EntryResolver - decides what to show: live, cached, degraded or empty.
 * Never rejects; every failure lands on one of those branches.
 */
export class EntryResolver {
  constructor(
    private provider: HealthDataProvider,
    private cache: LayeredCacheStore,
    private averages: WeekdayAverageService
  ) {}

  async resolve(now: Date, options: ResolveOptions = {}): Promise<ResolvedEntry> {
    const weekday = options.weekday ?? weekdayOf(now);
    const { signal } = options;

    const [today, goal] = await Promise.all([
      attempt(() => this.provider.fetchTodayHourly(now, signal)),
      attempt(() => this.provider.fetchGoal(now, signal)),
    ]);

    if (today.ok && !signal?.aborted) {
      const entry = await this.resolveLive(now, weekday, today.value, goal, signal);
      if (entry) return entry;
    }

    if (signal?.aborted) {
      logger.info('Resolution cancelled, serving cache');
    } else if (!today.ok) {
      logger.info('Live query failed, serving cache', {
        code: isAppError(today.error) ? today.error.code : undefined,
        error: describeError(today.error),
      });
    }

    return this.resolveFromCache(now, weekday);
  }

  /**
   * Resolve `now` and, when midnight falls before the next refresh, append a
   * zero-state entry for the new day
   */
  async resolveTimeline(
    now: Date,
    refreshIntervalMinutes: number,
    options: ResolveOptions = {}
  ): Promise<ResolvedTimeline> {
    const current = await this.resolve(now, options);
    const nextRefreshAt = addMinutes(now, refreshIntervalMinutes);
    const midnight = addDays(startOfDay(now), 1);

    const entries = [current];
    if (midnight.getTime() > now.getTime() && midnight.getTime() < nextRefreshAt.getTime()) {
      entries.push(await this.synthesizeMidnightEntry(midnight, current));
    }

    return { entries, nextRefreshAt };
  }

  /**
   * Zero-state entry for the day starting at `midnight`. Reads only the cache.
   */
  async synthesizeMidnightEntry(midnight: Date, previous: ResolvedEntry): Promise<ResolvedEntry> {
    const average = await this.averageView(weekdayOf(midnight), midnight, midnight);

    return createResolvedEntry({
      asOf: midnight,
      authorized: previous.authorized,
      source: 'midnight',
      todayTotal: 0,
      averageAtAsOf: average.averageAtAsOf,
      projectedTotal: average.projectedTotal,
      goal: previous.goal,
      todaySeries: zeroSeries(startOfDay(midnight)),
      averageSeries: average.series,
    });
  }

  private async resolveLive(
    now: Date,
    weekday: Weekday,
    live: TodayHourly,
    goalResult: Result<number, unknown>,
    signal?: AbortSignal
  ): Promise<ResolvedEntry | null> {
    const latest = live.latestSampleTimestamp;
    const fresh = latest !== null && isSameDay(latest, now);
    const asOf = fresh && latest.getTime() < now.getTime() ? latest : now;
    const todaySeries = fresh ? live.series : zeroSeries(startOfDay(now));

    const goal = goalResult.ok ? goalResult.value : await this.fallbackGoal(goalResult.error);

    let refreshed: WeekdayAverageSnapshot | null = null;
    if (await this.cache.weekdayAverage(weekday).shouldRefresh(now)) {
      const result = await this.averages.refresh(weekday, now, signal);
      if (result.ok) refreshed = result.value;
    }
    const average = await this.averageView(weekday, now, asOf, refreshed);

    if (signal?.aborted) return null;

    const snapshot = createTodaySnapshot({
      hourlyPattern: todaySeries,
      goal,
      latestSampleTimestamp: latest,
    });
    await this.cache.today.save(snapshot, now);

    return createResolvedEntry({
      asOf,
      authorized: true,
      source: 'live',
      todayTotal: snapshot.total,
      averageAtAsOf: average.averageAtAsOf,
      projectedTotal: average.projectedTotal,
      goal,
      todaySeries,
      averageSeries: average.series,
    });
  }

  private async resolveFromCache(now: Date, weekday: Weekday): Promise<ResolvedEntry> {
    const cachedToday = await this.cache.today.loadValid(now);

    if (cachedToday && cachedToday.latestSampleTimestamp) {
      const latest = cachedToday.latestSampleTimestamp;
      const asOf = latest.getTime() < now.getTime() ? latest : now;
      const average = await this.averageView(weekday, now, asOf);

      return createResolvedEntry({
        asOf,
        authorized: true,
        source: 'cached',
        todayTotal: cachedToday.total,
        averageAtAsOf: average.averageAtAsOf,
        projectedTotal: average.projectedTotal,
        goal: cachedToday.goal,
        todaySeries: cachedToday.hourlyPattern,
        averageSeries: average.series,
      });
    }

    const average = await this.averageView(weekday, now, now);
    if (average !== NO_AVERAGE) {
      const stale = await this.cache.today.load();
      return createResolvedEntry({
        asOf: now,
        authorized: true,
        source: 'degraded',
        todayTotal: 0,
        averageAtAsOf: average.averageAtAsOf,
        projectedTotal: average.projectedTotal,
        goal: stale ? stale.goal : 0,
        todaySeries: zeroSeries(startOfDay(now)),
        averageSeries: average.series,
      });
    }

    logger.warn('No live data and no cache, reporting unauthorized', {
      weekday: weekdayName(weekday),
    });
    return createResolvedEntry({
      asOf: now,
      authorized: false,
      source: 'empty',
      todayTotal: 0,
      averageAtAsOf: 0,
      projectedTotal: 0,
      goal: 0,
      todaySeries: [],
      averageSeries: [],
    });
  }

  /**
   * Valid weekday snapshot moved onto the day of `now`, with its "now" point at `asOf`
   */
  private async averageView(
    weekday: Weekday,
    now: Date,
    asOf: Date,
    refreshed: WeekdayAverageSnapshot | null = null
  ): Promise<AverageView> {
    const snapshot = refreshed ?? (await this.cache.weekdayAverage(weekday).loadValid(now));
    if (!snapshot) return NO_AVERAGE;

    const series = withAsOfPoint(anchorSeriesToDay(snapshot.hourlyPattern, startOfDay(now)), asOf);
    return {
      series,
      projectedTotal: snapshot.projectedTotal,
      averageAtAsOf: interpolate(series, asOf) ?? 0,
    };
  }

  private async fallbackGoal(error: unknown): Promise<number> {
    const cached = await this.cache.today.load();
    logger.warn('Goal query failed, using cached goal', {
      error: describeError(error),
      cachedGoal: cached ? cached.goal : null,
    });
    return cached ? cached.goal : 0;
  }
}
