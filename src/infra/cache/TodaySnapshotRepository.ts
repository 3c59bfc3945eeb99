import { isSameDay } from '../../domain/calendar.js';
import type { TodaySnapshot } from '../../domain/entities/Snapshots.js';
import type { KeyValueContainer } from '../container/KeyValueContainer.js';
import { JsonRecordRepository } from './JsonRecordRepository.js';
import { todaySnapshotSchema } from './records.js';

export const TODAY_FILE_NAME = 'today-energy.json';

/**
 * Last successful live fetch. Served only on the day its newest sample belongs to.
 */
export class TodaySnapshotRepository extends JsonRecordRepository<TodaySnapshot> {
  constructor(container: KeyValueContainer) {
    super(container, TODAY_FILE_NAME, todaySnapshotSchema);
  }

  isValid(snapshot: TodaySnapshot, now: Date): boolean {
    if (snapshot.latestSampleTimestamp === null) return false;
    return isSameDay(snapshot.latestSampleTimestamp, now);
  }
}
