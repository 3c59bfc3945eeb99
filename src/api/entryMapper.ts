import type { DaySeries } from '../domain/entities/EnergySeries.js';
import type { ResolvedEntry } from '../domain/entities/ResolvedEntry.js';
import { weekdayName } from '../domain/entities/Weekday.js';
import type { CacheInspection, InspectedRecord } from '../infra/cache/LayeredCacheStore.js';

export function mapSeriesToResponse(series: DaySeries) {
  return series.map((p) => ({
    timestamp: p.timestamp.toISOString(),
    cumulativeAmount: p.cumulativeAmount,
  }));
}

export function mapEntryToResponse(entry: ResolvedEntry) {
  return {
    asOf: entry.asOf.toISOString(),
    authorized: entry.authorized,
    source: entry.source,
    todayTotal: entry.todayTotal,
    averageAtAsOf: entry.averageAtAsOf,
    projectedTotal: entry.projectedTotal,
    paceProjectedTotal: entry.paceProjectedTotal,
    goal: entry.goal,
    todaySeries: mapSeriesToResponse(entry.todaySeries),
    averageSeries: mapSeriesToResponse(entry.averageSeries),
  };
}

function mapRecordToResponse<T>(record: InspectedRecord<T>) {
  return {
    fileName: record.fileName,
    writtenAt: record.writtenAt ? record.writtenAt.toISOString() : null,
    valid: record.valid,
    data: record.data,
  };
}

export function mapInspectionToResponse(inspection: CacheInspection) {
  return {
    container: inspection.container,
    today: mapRecordToResponse(inspection.today),
    weekdays: inspection.weekdays.map((record) => ({
      weekday: record.weekday,
      name: weekdayName(record.weekday),
      ...mapRecordToResponse(record),
    })),
    projection: mapRecordToResponse(inspection.projection),
  };
}
