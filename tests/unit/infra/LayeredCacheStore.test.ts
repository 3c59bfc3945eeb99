import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LayeredCacheStore } from '../../../src/infra/cache/LayeredCacheStore.js';
import { TODAY_FILE_NAME } from '../../../src/infra/cache/TodaySnapshotRepository.js';
import { PROJECTION_FILE_NAME } from '../../../src/infra/cache/ProjectionRepository.js';
import { weekdayAverageFileName } from '../../../src/infra/cache/WeekdayAverageRepository.js';
import { Weekday } from '../../../src/domain/entities/Weekday.js';
import { point } from '../../../src/domain/entities/EnergySeries.js';
import type {
  TodaySnapshot,
  WeekdayAverageSnapshot,
} from '../../../src/domain/entities/Snapshots.js';
import { CacheWriteError } from '../../../src/domain/errors.js';
import { logger } from '../../../src/infra/logger.js';
import { MemoryContainer } from '../../helpers/MemoryContainer.js';
import { SATURDAY, at } from '../../helpers/fixtures.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const now = at(2026, 10, 17, 15, 40);

const todaySnapshot: TodaySnapshot = {
  total: 550,
  hourlyPattern: [point(SATURDAY, 0), point(at(2026, 10, 17, 9), 200), point(now, 550)],
  goal: 900,
  latestSampleTimestamp: now,
};

function weekdaySnapshot(writtenAt: Date, weekday = Weekday.Saturday): WeekdayAverageSnapshot {
  return {
    weekday,
    hourlyPattern: [point(SATURDAY, 0), point(at(2026, 10, 17, 12), 400), point(at(2026, 10, 18), 800)],
    projectedTotal: 800,
    writtenAt,
  };
}

describe('LayeredCacheStore', () => {
  let container: MemoryContainer;
  let cache: LayeredCacheStore;

  beforeEach(() => {
    vi.clearAllMocks();
    container = new MemoryContainer();
    cache = new LayeredCacheStore(container, { maxAgeDays: 30, refreshWindowStartHour: 6 });
  });

  describe('today store', () => {
    it('should round-trip a snapshot', async () => {
      const saved = await cache.today.save(todaySnapshot, now);

      expect(saved.ok).toBe(true);
      expect(await cache.today.loadValid(now)).toEqual(todaySnapshot);
    });

    it('should write a versioned record', async () => {
      await cache.today.save(todaySnapshot, now);
      const record = JSON.parse(container.readText(TODAY_FILE_NAME) ?? '{}');

      expect(record.version).toBe(1);
      expect(record.writtenAt).toBe(now.toISOString());
      expect(record.data.total).toBe(550);
    });

    it('should treat a missing sample timestamp as stale', async () => {
      await cache.today.save({ ...todaySnapshot, latestSampleTimestamp: null }, now);

      expect(await cache.today.load()).not.toBeNull();
      expect(await cache.today.loadValid(now)).toBeNull();
      expect(await cache.today.shouldRefresh(now)).toBe(true);
    });

    it('should treat a snapshot from another day as stale', async () => {
      await cache.today.save({ ...todaySnapshot, latestSampleTimestamp: at(2026, 10, 16, 21) }, now);

      expect(await cache.today.loadValid(now)).toBeNull();
    });

    it('should read a missing record as null', async () => {
      expect(await cache.today.load()).toBeNull();
    });

    it('should read malformed JSON as null and warn', async () => {
      container.putText(TODAY_FILE_NAME, '{ not json');

      expect(await cache.today.load()).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith(
        'Ignoring corrupt cache record',
        expect.objectContaining({ fileName: TODAY_FILE_NAME })
      );
    });

    it('should reject a record whose total disagrees with its pattern', async () => {
      container.putText(
        TODAY_FILE_NAME,
        JSON.stringify({
          version: 1,
          writtenAt: now.toISOString(),
          data: { ...todaySnapshot, total: 10 },
        })
      );

      expect(await cache.today.load()).toBeNull();
    });

    it('should reject a record from another version', async () => {
      container.putText(
        TODAY_FILE_NAME,
        JSON.stringify({ version: 2, writtenAt: now.toISOString(), data: todaySnapshot })
      );

      expect(await cache.today.load()).toBeNull();
    });
  });

  describe('container failures', () => {
    it('should read as null and log a critical error when the container is missing', async () => {
      container.unavailable = true;

      expect(await cache.today.load()).toBeNull();
      expect(logger.error).toHaveBeenCalledWith(
        'Cache container unavailable',
        expect.objectContaining({ severity: 'critical', fileName: TODAY_FILE_NAME })
      );
    });

    it('should return a failed result instead of throwing on write', async () => {
      container.failWrites = true;

      const saved = await cache.today.save(todaySnapshot, now);

      expect(saved.ok).toBe(false);
      if (!saved.ok) expect(saved.error).toBeInstanceOf(CacheWriteError);
      expect(container.files.size).toBe(0);
    });

    it('should keep the previous record when a write fails', async () => {
      await cache.today.save(todaySnapshot, now);
      container.failWrites = true;

      await cache.today.save({ ...todaySnapshot, goal: 1200 }, now);

      expect((await cache.today.load())?.goal).toBe(900);
    });
  });

  describe('weekday-average store', () => {
    it('should keep a slot valid for the configured number of days', async () => {
      await cache.weekdayAverage(Weekday.Saturday).save(weekdaySnapshot(at(2026, 9, 17, 15, 40)));

      expect(await cache.weekdayAverage(Weekday.Saturday).loadValid(now)).not.toBeNull();
      expect(
        await cache.weekdayAverage(Weekday.Saturday).loadValid(at(2026, 10, 17, 15, 41))
      ).toBeNull();
    });

    it('should refresh a slot from an earlier day only inside the refresh window', async () => {
      const repo = cache.weekdayAverage(Weekday.Saturday);
      await repo.save(weekdaySnapshot(at(2026, 10, 10, 8)));

      expect(await repo.shouldRefresh(at(2026, 10, 17, 5, 59))).toBe(false);
      expect(await repo.shouldRefresh(at(2026, 10, 17, 6))).toBe(true);
    });

    it('should not refresh a slot written today', async () => {
      const repo = cache.weekdayAverage(Weekday.Saturday);
      await repo.save(weekdaySnapshot(at(2026, 10, 17, 7)));

      expect(await repo.shouldRefresh(now)).toBe(false);
    });

    it('should refresh a missing slot', async () => {
      expect(await cache.weekdayAverage(Weekday.Monday).shouldRefresh(now)).toBe(true);
    });

    it('should keep slots independent', async () => {
      await cache.weekdayAverage(Weekday.Saturday).save(weekdaySnapshot(now));

      expect(container.files.has(weekdayAverageFileName(Weekday.Saturday))).toBe(true);
      expect(await cache.weekdayAverage(Weekday.Sunday).load()).toBeNull();
    });

    it('should not serve a snapshot stored under another weekday', async () => {
      await cache.weekdayAverage(Weekday.Saturday).save(weekdaySnapshot(now, Weekday.Monday));

      expect(await cache.weekdayAverage(Weekday.Saturday).loadValid(now)).toBeNull();
    });
  });

  describe('projection store', () => {
    it('should be valid only on the day it was observed', async () => {
      await cache.projection.save({ projectedTotal: 1053, observedAt: now });

      expect(await cache.projection.loadValid(at(2026, 10, 17, 23, 59))).toEqual({
        projectedTotal: 1053,
        observedAt: now,
      });
      expect(await cache.projection.loadValid(at(2026, 10, 18))).toBeNull();
    });

    it('should clear', async () => {
      await cache.projection.save({ projectedTotal: 1053, observedAt: now });

      const cleared = await cache.projection.clear();

      expect(cleared.ok).toBe(true);
      expect(container.files.has(PROJECTION_FILE_NAME)).toBe(false);
    });
  });

  describe('inspect', () => {
    it('should list every slot with its validity', async () => {
      await cache.today.save(todaySnapshot, now);
      await cache.weekdayAverage(Weekday.Saturday).save(weekdaySnapshot(now), now);

      const inspection = await cache.inspect(now);

      expect(inspection.container).toBe('memory');
      expect(inspection.today).toMatchObject({ fileName: TODAY_FILE_NAME, valid: true, writtenAt: now });
      expect(inspection.weekdays).toHaveLength(7);
      expect(inspection.weekdays[6]).toMatchObject({
        weekday: Weekday.Saturday,
        fileName: 'weekday-average-7.json',
        valid: true,
      });
      expect(inspection.weekdays[0]).toMatchObject({ weekday: Weekday.Sunday, valid: false, data: null });
      expect(inspection.projection).toMatchObject({ valid: false, writtenAt: null });
    });
  });
});
