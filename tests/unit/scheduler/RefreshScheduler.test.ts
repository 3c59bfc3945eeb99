import { describe, it, expect, vi, beforeEach } from 'vitest';
import cron from 'node-cron';
import { RefreshScheduler } from '../../../src/scheduler/RefreshScheduler.js';
import { EntryResolver } from '../../../src/services/EntryResolver.js';
import { WeekdayAverageService } from '../../../src/services/WeekdayAverageService.js';
import { ProjectionNotificationService } from '../../../src/services/ProjectionNotificationService.js';
import { LayeredCacheStore } from '../../../src/infra/cache/LayeredCacheStore.js';
import { zeroSeries } from '../../../src/domain/entities/EnergySeries.js';
import { FakeHealthDataProvider } from '../../helpers/FakeHealthDataProvider.js';
import { MemoryContainer } from '../../helpers/MemoryContainer.js';
import { RecordingNotifier } from '../../helpers/RecordingNotifier.js';
import { SATURDAY, at } from '../../helpers/fixtures.js';

const { stopTask } = vi.hoisted(() => ({ stopTask: vi.fn() }));

vi.mock('node-cron', () => ({
  default: {
    schedule: vi.fn(() => ({ stop: stopTask })),
  },
}));

vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('RefreshScheduler', () => {
  let cache: LayeredCacheStore;
  let provider: FakeHealthDataProvider;
  let scheduler: RefreshScheduler;

  beforeEach(() => {
    vi.clearAllMocks();
    cache = new LayeredCacheStore(new MemoryContainer(), {
      maxAgeDays: 30,
      refreshWindowStartHour: 6,
    });
    provider = new FakeHealthDataProvider();
    provider.today = { value: { series: zeroSeries(SATURDAY), latestSampleTimestamp: null } };
    provider.goal = { value: 700 };
    const resolver = new EntryResolver(provider, cache, new WeekdayAverageService(provider, cache));
    const notifications = new ProjectionNotificationService(cache, new RecordingNotifier());
    scheduler = new RefreshScheduler({ REFRESH_INTERVAL_MINUTES: 15 }, resolver, notifications);
  });

  it('should schedule the refresh and midnight tasks', () => {
    scheduler.start();

    expect(cron.schedule).toHaveBeenCalledTimes(2);
    expect(vi.mocked(cron.schedule).mock.calls[0][0]).toBe('*/15 * * * *');
    expect(vi.mocked(cron.schedule).mock.calls[1][0]).toBe('0 0 * * *');

    scheduler.stop();
    expect(stopTask).toHaveBeenCalledTimes(2);
  });

  it('should keep the latest entry and record its projection', async () => {
    const now = at(2026, 10, 17, 15, 40);

    const entry = await scheduler.refresh(now);

    expect(scheduler.latestEntry()).toBe(entry);
    expect(entry.source).toBe('live');
    expect(await cache.projection.load()).toEqual({ projectedTotal: 0, observedAt: now });
  });

  it('should share a refresh already in progress', async () => {
    const now = at(2026, 10, 17, 15, 40);

    const [first, second] = await Promise.all([scheduler.refresh(now), scheduler.refresh(now)]);

    expect(first).toBe(second);
    expect(provider.calls.today).toBe(1);
  });

  it('should publish the pending zero-state entry at midnight', async () => {
    await scheduler.refresh(at(2026, 10, 17, 23, 50));

    await scheduler.runMidnight(at(2026, 10, 18));

    expect(scheduler.latestEntry()).toMatchObject({
      source: 'midnight',
      asOf: at(2026, 10, 18),
      todayTotal: 0,
      goal: 700,
    });
    expect(await cache.projection.load()).toBeNull();
  });

  it('should synthesize the zero-state entry when none is pending', async () => {
    await scheduler.refresh(at(2026, 10, 17, 20));

    await scheduler.runMidnight(at(2026, 10, 18, 0, 0));

    expect(scheduler.latestEntry()?.source).toBe('midnight');
    expect(provider.calls.today).toBe(1);
  });

  it('should publish nothing at midnight before the first refresh', async () => {
    await scheduler.runMidnight(at(2026, 10, 18));

    expect(scheduler.latestEntry()).toBeNull();
  });
});
