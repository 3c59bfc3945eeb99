import type { DaySeries, EnergyObservation } from '../domain/entities/EnergySeries.js';
import type { Weekday } from '../domain/entities/Weekday.js';

export interface TodayHourly {
  series: DaySeries;
  /** Newest sample end seen today, null when there are no samples */
  latestSampleTimestamp: Date | null;
}

/**
 * Source of energy samples and the daily goal.
 * Implementations reject with AuthorizationError when read access is absent and
 * with ProviderUnavailableError for every other failure.
 */
export interface HealthDataProvider {
  fetchTodayHourly(now: Date, signal?: AbortSignal): Promise<TodayHourly>;
  fetchHistoricalForWeekday(
    weekday: Weekday,
    now: Date,
    signal?: AbortSignal
  ): Promise<EnergyObservation[]>;
  fetchGoal(now: Date, signal?: AbortSignal): Promise<number>;
}
