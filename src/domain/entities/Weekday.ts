import { startOfDay } from '../calendar.js';

/**
 * Day of week used to partition history and cache slots (1 = Sunday, 7 = Saturday)
 */
export enum Weekday {
  Sunday = 1,
  Monday = 2,
  Tuesday = 3,
  Wednesday = 4,
  Thursday = 5,
  Friday = 6,
  Saturday = 7,
}

export const ALL_WEEKDAYS: readonly Weekday[] = [
  Weekday.Sunday,
  Weekday.Monday,
  Weekday.Tuesday,
  Weekday.Wednesday,
  Weekday.Thursday,
  Weekday.Friday,
  Weekday.Saturday,
];

const WEEKDAY_NAMES: Record<Weekday, string> = {
  [Weekday.Sunday]: 'Sunday',
  [Weekday.Monday]: 'Monday',
  [Weekday.Tuesday]: 'Tuesday',
  [Weekday.Wednesday]: 'Wednesday',
  [Weekday.Thursday]: 'Thursday',
  [Weekday.Friday]: 'Friday',
  [Weekday.Saturday]: 'Saturday',
};

export function weekdayOf(date: Date): Weekday {
  return toWeekday(startOfDay(date).getDay() + 1);
}

export function isWeekday(value: number): value is Weekday {
  return Number.isInteger(value) && value >= Weekday.Sunday && value <= Weekday.Saturday;
}

export function toWeekday(value: number): Weekday {
  if (!isWeekday(value)) {
    throw new RangeError(`Weekday must be an integer between 1 and 7, got ${value}`);
  }
  return value;
}

export function weekdayName(weekday: Weekday): string {
  return WEEKDAY_NAMES[weekday];
}
