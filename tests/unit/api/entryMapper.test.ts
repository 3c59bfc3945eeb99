import { describe, it, expect } from 'vitest';
import { mapEntryToResponse } from '../../../src/api/entryMapper.js';
import { createResolvedEntry } from '../../../src/domain/entities/ResolvedEntry.js';
import { point } from '../../../src/domain/entities/EnergySeries.js';
import { SATURDAY, at } from '../../helpers/fixtures.js';

describe('mapEntryToResponse', () => {
  it('should serialize dates as ISO strings', () => {
    const entry = createResolvedEntry({
      asOf: at(2026, 10, 17, 15, 40),
      authorized: true,
      source: 'cached',
      todayTotal: 430,
      averageAtAsOf: 500,
      projectedTotal: 800,
      goal: 900,
      todaySeries: [point(SATURDAY, 0), point(at(2026, 10, 17, 15), 430)],
      averageSeries: [point(SATURDAY, 0)],
    });

    expect(mapEntryToResponse(entry)).toEqual({
      asOf: '2026-10-17T15:40:00.000Z',
      authorized: true,
      source: 'cached',
      todayTotal: 430,
      averageAtAsOf: 500,
      projectedTotal: 800,
      paceProjectedTotal: 730,
      goal: 900,
      todaySeries: [
        { timestamp: '2026-10-17T00:00:00.000Z', cumulativeAmount: 0 },
        { timestamp: '2026-10-17T15:00:00.000Z', cumulativeAmount: 430 },
      ],
      averageSeries: [{ timestamp: '2026-10-17T00:00:00.000Z', cumulativeAmount: 0 }],
    });
  });
});
