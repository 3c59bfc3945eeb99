import { z } from 'zod';
import { addDays, startOfDay, toDateKey } from '../domain/calendar.js';
import type { EnergyObservation } from '../domain/entities/EnergySeries.js';
import { weekdayOf, type Weekday } from '../domain/entities/Weekday.js';
import {
  AuthorizationError,
  ProviderUnavailableError,
  describeError,
  isAppError,
} from '../domain/errors.js';
import { buildCumulativeSeries } from '../domain/series/buildCumulativeSeries.js';
import type { Env } from './env.js';
import type { HealthDataProvider, TodayHourly } from './HealthDataProvider.js';
import { logger } from './logger.js';

const samplesResponseSchema = z.object({
  samples: z.array(
    z.object({
      start: z.string().datetime({ offset: true }),
      end: z.string().datetime({ offset: true }),
      kilocalories: z.number(),
    })
  ),
});

const goalResponseSchema = z.object({
  goal: z.number().finite().nonnegative(),
});

export type HttpHealthDataProviderConfig = Pick<
  Env,
  'HEALTH_API_URL' | 'HEALTH_API_TOKEN' | 'HEALTH_QUERY_TIMEOUT_MS' | 'HISTORY_WINDOW_DAYS'
>;

/**
 * Health data over a JSON HTTP API
 *   GET /samples?start=<iso>&end=<iso>  -> { samples: [{ start, end, kilocalories }] }
 *   GET /goal?date=<yyyy-mm-dd>          -> { goal }
 */
export class HttpHealthDataProvider implements HealthDataProvider {
  private readonly baseUrl: string;

  constructor(private readonly config: HttpHealthDataProviderConfig) {
    this.baseUrl = config.HEALTH_API_URL.replace(/\/+$/, '');
  }

  async fetchTodayHourly(now: Date, signal?: AbortSignal): Promise<TodayHourly> {
    const dayStart = startOfDay(now);
    const observations = await this.fetchSamples(dayStart, now, signal);

    let latest: number | null = null;
    for (const observation of observations) {
      const end = Math.min(observation.endTime.getTime(), now.getTime());
      if (latest === null || end > latest) latest = end;
    }

    const latestSampleTimestamp = latest === null ? null : new Date(latest);
    return {
      series: buildCumulativeSeries(observations, dayStart, latestSampleTimestamp ?? now),
      latestSampleTimestamp,
    };
  }

  async fetchHistoricalForWeekday(
    weekday: Weekday,
    now: Date,
    signal?: AbortSignal
  ): Promise<EnergyObservation[]> {
    const end = startOfDay(now);
    const start = addDays(end, -this.config.HISTORY_WINDOW_DAYS);
    const observations = await this.fetchSamples(start, end, signal);
    return observations.filter((observation) => weekdayOf(observation.startTime) === weekday);
  }

  async fetchGoal(now: Date, signal?: AbortSignal): Promise<number> {
    const body = await this.getJson('goal', { date: toDateKey(now) }, signal);
    const parsed = goalResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError('Unexpected goal response', { issues: parsed.error.issues });
    }
    return parsed.data.goal;
  }

  private async fetchSamples(
    start: Date,
    end: Date,
    signal?: AbortSignal
  ): Promise<EnergyObservation[]> {
    const body = await this.getJson(
      'samples',
      { start: start.toISOString(), end: end.toISOString() },
      signal
    );
    const parsed = samplesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError('Unexpected samples response', {
        issues: parsed.error.issues,
      });
    }

    return parsed.data.samples.map((sample) => ({
      startTime: new Date(sample.start),
      endTime: new Date(sample.end),
      amount: sample.kilocalories,
    }));
  }

  private async getJson(
    resource: string,
    query: Record<string, string>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${resource}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.HEALTH_QUERY_TIMEOUT_MS);
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const headers: Record<string, string> = { Accept: 'application/json' };
      if (this.config.HEALTH_API_TOKEN) {
        headers.Authorization = `Bearer ${this.config.HEALTH_API_TOKEN}`;
      }

      const res = await fetch(url, { headers, signal: controller.signal });

      if (res.status === 401 || res.status === 403) {
        throw new AuthorizationError('Health data read access denied', { status: res.status });
      }
      if (!res.ok) {
        throw new ProviderUnavailableError(`Health data API returned ${res.status}`, {
          status: res.status,
          resource,
        });
      }

      return await res.json();
    } catch (error) {
      if (isAppError(error)) throw error;

      let reason = describeError(error);
      if (signal?.aborted) reason = 'cancelled';
      else if (controller.signal.aborted) reason = 'timeout';
      logger.debug('Health data request failed', { resource, reason });
      throw new ProviderUnavailableError('Health data API unreachable', { resource, reason });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
