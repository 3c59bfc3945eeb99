import { z } from 'zod';
import { isMonotonic } from '../../domain/entities/EnergySeries.js';
import { Weekday } from '../../domain/entities/Weekday.js';

/**
 * Persisted record layout: { version, writtenAt, data }
 * Bump RECORD_VERSION when `data` changes shape; older records then read as absent.
 */
export const RECORD_VERSION = 1;

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const recordEnvelopeSchema = z.object({
  version: z.literal(RECORD_VERSION),
  writtenAt: isoDate,
  data: z.unknown(),
});

const amount = z.number().finite().nonnegative();

const hourlyPointSchema = z.object({
  timestamp: isoDate,
  cumulativeAmount: amount,
});

const daySeriesSchema = z
  .array(hourlyPointSchema)
  .refine(isMonotonic, { message: 'Series must be ordered and non-decreasing' });

export const todaySnapshotSchema = z
  .object({
    total: amount,
    hourlyPattern: daySeriesSchema,
    goal: amount,
    latestSampleTimestamp: isoDate.nullable(),
  })
  .refine(
    (snapshot) => {
      const last = snapshot.hourlyPattern[snapshot.hourlyPattern.length - 1];
      return snapshot.total === (last ? last.cumulativeAmount : 0);
    },
    { message: 'total must equal the last cumulative amount' }
  );

export const weekdayAverageSnapshotSchema = z.object({
  weekday: z.nativeEnum(Weekday),
  hourlyPattern: daySeriesSchema,
  projectedTotal: amount,
  writtenAt: isoDate,
});

export const projectionSnapshotSchema = z.object({
  projectedTotal: z.number().finite(),
  observedAt: isoDate,
});
