/**
 * Raw energy sample as returned by the health data provider (kilocalories)
 */
export interface EnergyObservation {
  startTime: Date;
  endTime: Date;
  amount: number;
}

/**
 * Running total of energy as of `timestamp`
 */
export interface HourlyPoint {
  readonly timestamp: Date;
  readonly cumulativeAmount: number;
}

/**
 * Ordered cumulative series for one calendar day. Begins with a zero point at
 * the start of the day; values never decrease.
 */
export type DaySeries = readonly HourlyPoint[];

export function point(timestamp: Date, cumulativeAmount: number): HourlyPoint {
  return { timestamp, cumulativeAmount };
}

export function zeroSeries(dayStart: Date): DaySeries {
  return [point(dayStart, 0)];
}

export function lastValue(series: DaySeries): number {
  return series.length > 0 ? series[series.length - 1].cumulativeAmount : 0;
}

export function isMonotonic(series: DaySeries): boolean {
  for (let i = 1; i < series.length; i++) {
    if (series[i].timestamp.getTime() < series[i - 1].timestamp.getTime()) return false;
    if (series[i].cumulativeAmount < series[i - 1].cumulativeAmount) return false;
  }
  return true;
}
