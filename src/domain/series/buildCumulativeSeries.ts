import { addDays, hourBoundary, isSameDay } from '../calendar.js';
import { point, type DaySeries, type EnergyObservation, type HourlyPoint } from '../entities/EnergySeries.js';

export const HOURS_PER_DAY = 24;

/**
 * Sum observations into the 24 hours of the day starting at `dayStart`.
 * Observations are bucketed by start time; anything starting outside the day or
 * at/after `until`, or with a negative or non-finite amount, is left out.
 */
export function hourlyBuckets(
  observations: readonly EnergyObservation[],
  dayStart: Date,
  until?: Date
): number[] {
  const buckets = new Array<number>(HOURS_PER_DAY).fill(0);
  const dayEnd = addDays(dayStart, 1).getTime();
  const limit = until ? Math.min(until.getTime(), dayEnd) : dayEnd;

  for (const observation of observations) {
    const start = observation.startTime.getTime();
    if (start < dayStart.getTime() || start >= limit) continue;
    if (!Number.isFinite(observation.amount) || observation.amount < 0) continue;

    buckets[observation.startTime.getHours()] += observation.amount;
  }

  return buckets;
}

/**
 * Running totals for each hour: entry H is the total by the end of hour H
 */
export function cumulativeByHour(buckets: readonly number[]): number[] {
  let runningTotal = 0;
  return buckets.map((amount) => {
    runningTotal += amount;
    return runningTotal;
  });
}

/**
 * Build the cumulative series for one day as of `asOf`.
 *
 * Each completed hour with a contribution becomes a point at the hour's end, so
 * a value reads "total by H:00". The hour containing `asOf`, if it has any
 * contribution, becomes a final point at `asOf` itself.
 */
export function buildCumulativeSeries(
  observations: readonly EnergyObservation[],
  dayStart: Date,
  asOf: Date
): DaySeries {
  const series: HourlyPoint[] = [point(dayStart, 0)];
  if (asOf.getTime() < dayStart.getTime()) return series;

  const buckets = hourlyBuckets(observations, dayStart, asOf);
  const currentHour = isSameDay(asOf, dayStart) ? asOf.getHours() : HOURS_PER_DAY;

  let runningTotal = 0;
  for (let hour = 0; hour < currentHour; hour++) {
    if (buckets[hour] <= 0) continue;
    runningTotal += buckets[hour];
    series.push(point(hourBoundary(dayStart, hour + 1), runningTotal));
  }

  if (currentHour < HOURS_PER_DAY && buckets[currentHour] > 0) {
    series.push(point(asOf, runningTotal + buckets[currentHour]));
  }

  return series;
}
