import { isSameDay } from '../../domain/calendar.js';
import type { WeekdayAverageSnapshot } from '../../domain/entities/Snapshots.js';
import type { Weekday } from '../../domain/entities/Weekday.js';
import { logger } from '../logger.js';
import type { KeyValueContainer } from '../container/KeyValueContainer.js';
import { JsonRecordRepository } from './JsonRecordRepository.js';
import { weekdayAverageSnapshotSchema } from './records.js';

const MS_PER_DAY = 86_400_000;

export interface WeekdayAverageOptions {
  maxAgeDays: number;
  refreshWindowStartHour: number;
}

export function weekdayAverageFileName(weekday: Weekday): string {
  return `weekday-average-${weekday}.json`;
}

/**
 * One weekday's averaged pattern. Each slot ages independently.
 */
export class WeekdayAverageRepository extends JsonRecordRepository<WeekdayAverageSnapshot> {
  constructor(
    container: KeyValueContainer,
    readonly weekday: Weekday,
    private readonly options: WeekdayAverageOptions
  ) {
    super(container, weekdayAverageFileName(weekday), weekdayAverageSnapshotSchema);
  }

  isValid(snapshot: WeekdayAverageSnapshot, now: Date): boolean {
    if (snapshot.weekday !== this.weekday) {
      logger.warn('Weekday average stored in the wrong slot', {
        fileName: this.fileName,
        stored: snapshot.weekday,
      });
      return false;
    }
    const ageMs = now.getTime() - snapshot.writtenAt.getTime();
    return ageMs <= this.options.maxAgeDays * MS_PER_DAY;
  }

  /**
   * Missing or expired slots always refresh. A valid slot written on an earlier
   * day refreshes once the clock is inside the refresh window.
   */
  async shouldRefresh(now: Date): Promise<boolean> {
    const snapshot = await this.loadValid(now);
    if (snapshot === null) return true;
    if (isSameDay(snapshot.writtenAt, now)) return false;
    return now.getHours() >= this.options.refreshWindowStartHour;
  }
}
