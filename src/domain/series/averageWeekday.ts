import { hourBoundary, isOnTheHour, startOfDay, toDateKey } from '../calendar.js';
import { point, type DaySeries, type EnergyObservation, type HourlyPoint } from '../entities/EnergySeries.js';
import { weekdayOf, type Weekday } from '../entities/Weekday.js';
import { HOURS_PER_DAY, cumulativeByHour, hourlyBuckets } from './buildCumulativeSeries.js';
import { interpolate } from './interpolate.js';

export interface WeekdayAverage {
  hourlyPattern: DaySeries;
  projectedTotal: number;
  /** Distinct historical days that contributed */
  dayCount: number;
}

/**
 * Average the cumulative pattern of past occurrences of `weekday`.
 *
 * Each hour is averaged only across days with a non-zero cumulative value at
 * that hour, so a day that had not synced yet does not drag the curve down.
 * The projected total is the plain mean of complete daily totals.
 * The pattern is anchored to `today` and carries one interpolated point at `asOf`.
 */
export function averageWeekday(
  observations: readonly EnergyObservation[],
  weekday: Weekday,
  today: Date,
  asOf: Date
): WeekdayAverage {
  const todayStart = startOfDay(today);
  const days = partitionByDay(observations, weekday, todayStart);

  const dailyCumulative = days.map(({ dayStart, items }) =>
    cumulativeByHour(hourlyBuckets(items, dayStart))
  );

  const hourlyAverages: number[] = [];
  let floor = 0;
  for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
    let total = 0;
    let count = 0;
    for (const cumulative of dailyCumulative) {
      if (cumulative[hour] > 0) {
        total += cumulative[hour];
        count += 1;
      }
    }
    // Hours can average over different subsets of days; keep the curve cumulative.
    floor = Math.max(floor, count > 0 ? total / count : 0);
    hourlyAverages.push(floor);
  }

  const dailyTotals = dailyCumulative.map((cumulative) => cumulative[HOURS_PER_DAY - 1]);
  const projectedTotal =
    dailyTotals.length > 0 ? dailyTotals.reduce((sum, v) => sum + v, 0) / dailyTotals.length : 0;

  const pattern: HourlyPoint[] = [point(todayStart, 0)];
  hourlyAverages.forEach((average, hour) => {
    pattern.push(point(hourBoundary(todayStart, hour + 1), average));
  });

  return {
    hourlyPattern: withAsOfPoint(pattern, asOf),
    projectedTotal,
    dayCount: days.length,
  };
}

/**
 * Add the interpolated "now" point to an hour-aligned pattern
 */
export function withAsOfPoint(pattern: DaySeries, asOf: Date): DaySeries {
  const hourPoints = pattern.filter((p) => isOnTheHour(p.timestamp));
  if (isOnTheHour(asOf)) return hourPoints;

  const value = interpolate(hourPoints, asOf);
  if (value === null) return hourPoints;

  return [...hourPoints, point(asOf, value)].sort(
    (a, b) => a.timestamp.getTime() - b.timestamp.getTime()
  );
}

function partitionByDay(
  observations: readonly EnergyObservation[],
  weekday: Weekday,
  before: Date
): { dayStart: Date; items: EnergyObservation[] }[] {
  const byDay = new Map<string, { dayStart: Date; items: EnergyObservation[] }>();

  for (const observation of observations) {
    if (observation.startTime.getTime() >= before.getTime()) continue;
    if (weekdayOf(observation.startTime) !== weekday) continue;

    const dayStart = startOfDay(observation.startTime);
    const key = toDateKey(dayStart);
    const day = byDay.get(key) ?? { dayStart, items: [] };
    day.items.push(observation);
    byDay.set(key, day);
  }

  return [...byDay.values()].sort((a, b) => a.dayStart.getTime() - b.dayStart.getTime());
}
