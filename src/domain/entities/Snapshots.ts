import { lastValue, type DaySeries } from './EnergySeries.js';
import type { Weekday } from './Weekday.js';

/**
 * Last successful live fetch of today's data
 * Fallback source while the provider is unavailable
 */
export interface TodaySnapshot {
  total: number;
  hourlyPattern: DaySeries;
  goal: number;
  latestSampleTimestamp: Date | null;
}

/**
 * Averaged cumulative pattern for one weekday, written at most once a day
 */
export interface WeekdayAverageSnapshot {
  weekday: Weekday;
  hourlyPattern: DaySeries;
  projectedTotal: number;
  writtenAt: Date;
}

/**
 * Last projected end-of-day total acted on for goal-crossing notifications
 */
export interface ProjectionSnapshot {
  projectedTotal: number;
  observedAt: Date;
}

/**
 * Build a TodaySnapshot whose total always matches the last point of the pattern
 */
export function createTodaySnapshot(params: {
  hourlyPattern: DaySeries;
  goal: number;
  latestSampleTimestamp: Date | null;
}): TodaySnapshot {
  if (!Number.isFinite(params.goal) || params.goal < 0) {
    throw new RangeError('TodaySnapshot: goal must be a non-negative number');
  }

  return {
    total: lastValue(params.hourlyPattern),
    hourlyPattern: params.hourlyPattern,
    goal: params.goal,
    latestSampleTimestamp: params.latestSampleTimestamp,
  };
}
