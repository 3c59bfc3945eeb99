import type { WeekdayAverageSnapshot } from '../domain/entities/Snapshots.js';
import { ALL_WEEKDAYS, weekdayName, type Weekday } from '../domain/entities/Weekday.js';
import { ProviderUnavailableError, describeError } from '../domain/errors.js';
import { attempt, err, ok, type Result } from '../domain/result.js';
import { averageWeekday } from '../domain/series/averageWeekday.js';
import type { LayeredCacheStore } from '../infra/cache/LayeredCacheStore.js';
import type { HealthDataProvider } from '../infra/HealthDataProvider.js';
import { logger } from '../infra/logger.js';

export interface PopulateSummary {
  refreshed: Weekday[];
  failed: Weekday[];
}

/**
 * WeekdayAverageService - recomputes weekday averages from provider history
 */
export class WeekdayAverageService {
  constructor(
    private provider: HealthDataProvider,
    private cache: LayeredCacheStore
  ) {}

  /**
   * Fetch history, average it and save the slot. A failed save still returns
   * the computed snapshot.
   */
  async refresh(
    weekday: Weekday,
    now: Date,
    signal?: AbortSignal
  ): Promise<Result<WeekdayAverageSnapshot, unknown>> {
    const history = await attempt(() =>
      this.provider.fetchHistoricalForWeekday(weekday, now, signal)
    );
    if (!history.ok) {
      logger.warn('Weekday history unavailable', {
        weekday: weekdayName(weekday),
        error: describeError(history.error),
      });
      return history;
    }

    if (signal?.aborted) {
      return err(new ProviderUnavailableError('Weekday refresh cancelled', { weekday }));
    }

    const average = averageWeekday(history.value, weekday, now, now);
    const snapshot: WeekdayAverageSnapshot = {
      weekday,
      hourlyPattern: average.hourlyPattern,
      projectedTotal: average.projectedTotal,
      writtenAt: now,
    };

    const saved = await this.cache.weekdayAverage(weekday).save(snapshot, now);
    logger.info('Weekday average refreshed', {
      weekday: weekdayName(weekday),
      days: average.dayCount,
      projectedTotal: Math.round(average.projectedTotal),
      cached: saved.ok,
    });

    return ok(snapshot);
  }

  /**
   * Refresh every weekday slot, one at a time
   */
  async populateAll(now: Date, signal?: AbortSignal): Promise<PopulateSummary> {
    const summary: PopulateSummary = { refreshed: [], failed: [] };

    for (const weekday of ALL_WEEKDAYS) {
      const result = await this.refresh(weekday, now, signal);
      if (result.ok) {
        summary.refreshed.push(weekday);
      } else {
        summary.failed.push(weekday);
      }
    }

    logger.info('Weekday averages populated', {
      refreshed: summary.refreshed.length,
      failed: summary.failed.map(weekdayName),
    });
    return summary;
  }
}
