import { calendarDaysBetween, isOnTheHour, startOfDay } from '../calendar.js';
import { point, type DaySeries } from '../entities/EnergySeries.js';

/**
 * Estimate a cumulative series at `at` by linear interpolation between the two
 * hour-boundary points that bracket it. Off-the-hour points (an earlier "now"
 * marker) are skipped. Clamps to the first/last value outside the series.
 */
export function interpolate(series: DaySeries, at: Date): number | null {
  const hourPoints = series.filter((p) => isOnTheHour(p.timestamp));
  if (hourPoints.length === 0) return null;

  const target = at.getTime();
  let lowerIndex = -1;
  for (let i = 0; i < hourPoints.length; i++) {
    if (hourPoints[i].timestamp.getTime() <= target) {
      lowerIndex = i;
    } else {
      break;
    }
  }

  if (lowerIndex === -1) return hourPoints[0].cumulativeAmount;
  if (lowerIndex === hourPoints.length - 1) return hourPoints[lowerIndex].cumulativeAmount;

  const lower = hourPoints[lowerIndex];
  const upper = hourPoints[lowerIndex + 1];
  const span = upper.timestamp.getTime() - lower.timestamp.getTime();
  const progress = (target - lower.timestamp.getTime()) / span;

  return lower.cumulativeAmount + (upper.cumulativeAmount - lower.cumulativeAmount) * progress;
}

/**
 * Move a stored pattern onto another day, keeping each point's wall-clock time
 * and its day offset from the pattern's own first day
 */
export function anchorSeriesToDay(series: DaySeries, dayStart: Date): DaySeries {
  if (series.length === 0) return series;

  const patternDay = startOfDay(series[0].timestamp);
  if (calendarDaysBetween(patternDay, dayStart) === 0) return series;

  return series.map((p) => {
    const offsetDays = calendarDaysBetween(patternDay, p.timestamp);
    const t = p.timestamp;
    const moved = new Date(
      dayStart.getFullYear(),
      dayStart.getMonth(),
      dayStart.getDate() + offsetDays,
      t.getHours(),
      t.getMinutes(),
      t.getSeconds(),
      t.getMilliseconds()
    );
    return point(moved, p.cumulativeAmount);
  });
}
