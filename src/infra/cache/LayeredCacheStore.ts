import type {
  ProjectionSnapshot,
  TodaySnapshot,
  WeekdayAverageSnapshot,
} from '../../domain/entities/Snapshots.js';
import { ALL_WEEKDAYS, Weekday } from '../../domain/entities/Weekday.js';
import type { KeyValueContainer } from '../container/KeyValueContainer.js';
import type { JsonRecordRepository } from './JsonRecordRepository.js';
import { ProjectionRepository } from './ProjectionRepository.js';
import { TodaySnapshotRepository } from './TodaySnapshotRepository.js';
import {
  WeekdayAverageRepository,
  type WeekdayAverageOptions,
} from './WeekdayAverageRepository.js';

export interface InspectedRecord<T> {
  fileName: string;
  writtenAt: Date | null;
  valid: boolean;
  data: T | null;
}

export interface CacheInspection {
  container: string;
  today: InspectedRecord<TodaySnapshot>;
  weekdays: (InspectedRecord<WeekdayAverageSnapshot> & { weekday: Weekday })[];
  projection: InspectedRecord<ProjectionSnapshot>;
}

/**
 * Today, weekday-average and projection stores over one shared container
 */
export class LayeredCacheStore {
  readonly today: TodaySnapshotRepository;
  readonly projection: ProjectionRepository;
  private readonly weekdays: Record<Weekday, WeekdayAverageRepository>;

  constructor(
    private readonly container: KeyValueContainer,
    options: WeekdayAverageOptions
  ) {
    this.today = new TodaySnapshotRepository(container);
    this.projection = new ProjectionRepository(container);
    this.weekdays = {
      [Weekday.Sunday]: new WeekdayAverageRepository(container, Weekday.Sunday, options),
      [Weekday.Monday]: new WeekdayAverageRepository(container, Weekday.Monday, options),
      [Weekday.Tuesday]: new WeekdayAverageRepository(container, Weekday.Tuesday, options),
      [Weekday.Wednesday]: new WeekdayAverageRepository(container, Weekday.Wednesday, options),
      [Weekday.Thursday]: new WeekdayAverageRepository(container, Weekday.Thursday, options),
      [Weekday.Friday]: new WeekdayAverageRepository(container, Weekday.Friday, options),
      [Weekday.Saturday]: new WeekdayAverageRepository(container, Weekday.Saturday, options),
    };
  }

  weekdayAverage(weekday: Weekday): WeekdayAverageRepository {
    return this.weekdays[weekday];
  }

  /**
   * Raw view of every slot, for diagnostics
   */
  async inspect(now: Date): Promise<CacheInspection> {
    const [today, projection, weekdays] = await Promise.all([
      inspectRecord(this.today, now),
      inspectRecord(this.projection, now),
      Promise.all(
        ALL_WEEKDAYS.map(async (weekday) => ({
          weekday,
          ...(await inspectRecord(this.weekdays[weekday], now)),
        }))
      ),
    ]);

    return { container: this.container.describe(), today, weekdays, projection };
  }
}

async function inspectRecord<T>(
  repository: JsonRecordRepository<T>,
  now: Date
): Promise<InspectedRecord<T>> {
  const record = await repository.readRecord();
  return {
    fileName: repository.fileName,
    writtenAt: record ? record.writtenAt : null,
    valid: record ? repository.isValid(record.data, now) : false,
    data: record ? record.data : null,
  };
}
