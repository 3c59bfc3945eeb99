/**
 * Local-time calendar arithmetic. Day and hour boundaries follow the process
 * time zone, the same way the health data source buckets its samples.
 */

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

export function startOfDay(d: Date): Date {
  const tmp = new Date(d.getTime());
  tmp.setHours(0, 0, 0, 0);
  return tmp;
}

export function addDays(d: Date, days: number): Date {
  const tmp = new Date(d.getTime());
  tmp.setDate(tmp.getDate() + days);
  return tmp;
}

export function addMinutes(d: Date, minutes: number): Date {
  return new Date(d.getTime() + minutes * MS_PER_MINUTE);
}

/**
 * Wall-clock hour boundary on the day starting at `dayStart`.
 * hour 24 is the following midnight.
 */
export function hourBoundary(dayStart: Date, hour: number): Date {
  return new Date(dayStart.getFullYear(), dayStart.getMonth(), dayStart.getDate(), hour);
}

export function isSameDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}

export function isOnTheHour(d: Date): boolean {
  return d.getMinutes() === 0 && d.getSeconds() === 0 && d.getMilliseconds() === 0;
}

/**
 * Whole calendar days from `from` to `to` (DST-safe)
 */
export function calendarDaysBetween(from: Date, to: Date): number {
  const a = Date.UTC(from.getFullYear(), from.getMonth(), from.getDate());
  const b = Date.UTC(to.getFullYear(), to.getMonth(), to.getDate());
  return Math.round((b - a) / MS_PER_DAY);
}

export function toDateKey(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}
