import type { EnergyObservation } from '../../src/domain/entities/EnergySeries.js';

/**
 * Local-time instant; month is 1-based
 */
export function at(year: number, month: number, day: number, hour = 0, minute = 0): Date {
  return new Date(year, month - 1, day, hour, minute);
}

export function sample(start: Date, minutes: number, amount: number): EnergyObservation {
  return {
    startTime: start,
    endTime: new Date(start.getTime() + minutes * 60_000),
    amount,
  };
}

/** Saturday */
export const SATURDAY = at(2026, 10, 17);
