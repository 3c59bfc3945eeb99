import type { DaySeries } from './EnergySeries.js';

/**
 * Which branch of the resolver produced an entry
 * - live: provider answered
 * - cached: provider failed, today's cache is from the same day
 * - degraded: provider failed, only the weekday average is usable
 * - empty: nothing usable; treated as unauthorized
 * - midnight: synthesized zero-state entry at day rollover
 */
export type EntrySource = 'live' | 'cached' | 'degraded' | 'empty' | 'midnight';

export interface ResolvedEntry {
  readonly asOf: Date;
  readonly authorized: boolean;
  readonly source: EntrySource;
  readonly todayTotal: number;
  readonly averageAtAsOf: number;
  readonly projectedTotal: number;
  /** todayTotal plus the typical remainder of the day */
  readonly paceProjectedTotal: number;
  readonly goal: number;
  readonly todaySeries: DaySeries;
  readonly averageSeries: DaySeries;
}

export function createResolvedEntry(
  params: Omit<ResolvedEntry, 'paceProjectedTotal'>
): ResolvedEntry {
  const paceProjectedTotal =
    params.projectedTotal > 0
      ? Math.max(params.todayTotal, params.todayTotal + (params.projectedTotal - params.averageAtAsOf))
      : params.todayTotal;

  return Object.freeze({
    ...params,
    todaySeries: Object.freeze([...params.todaySeries]),
    averageSeries: Object.freeze([...params.averageSeries]),
    paceProjectedTotal,
  });
}
