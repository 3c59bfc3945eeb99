import { describe, it, expect } from 'vitest';
import { anchorSeriesToDay, interpolate } from '../../../src/domain/series/interpolate.js';
import { point } from '../../../src/domain/entities/EnergySeries.js';
import { at } from '../../helpers/fixtures.js';

describe('interpolate', () => {
  const series = [
    point(at(2026, 10, 17), 0),
    point(at(2026, 10, 17, 9), 200),
    point(at(2026, 10, 17, 13), 500),
    point(at(2026, 10, 17, 15, 40), 550),
  ];

  it('should interpolate linearly between bracketing hour points', () => {
    expect(interpolate(series, at(2026, 10, 17, 11))).toBe(350);
  });

  it('should use minutes into the hour for adjacent hours', () => {
    const hourly = [point(at(2026, 10, 17, 10), 100), point(at(2026, 10, 17, 11), 160)];

    expect(interpolate(hourly, at(2026, 10, 17, 10, 15))).toBe(115);
  });

  it('should return the exact value on a point', () => {
    expect(interpolate(series, at(2026, 10, 17, 9))).toBe(200);
  });

  it('should skip off-the-hour points and clamp after the last hour point', () => {
    expect(interpolate(series, at(2026, 10, 17, 15, 40))).toBe(500);
    expect(interpolate(series, at(2026, 10, 17, 22))).toBe(500);
  });

  it('should clamp to the first value before the series', () => {
    const later = [point(at(2026, 10, 17, 6), 40), point(at(2026, 10, 17, 7), 90)];

    expect(interpolate(later, at(2026, 10, 17, 2))).toBe(40);
  });

  it('should return null without hour points', () => {
    expect(interpolate([], at(2026, 10, 17, 2))).toBeNull();
    expect(interpolate([point(at(2026, 10, 17, 2, 30), 10)], at(2026, 10, 17, 3))).toBeNull();
  });
});

describe('anchorSeriesToDay', () => {
  const pattern = [
    point(at(2026, 10, 11), 0),
    point(at(2026, 10, 11, 12), 400),
    point(at(2026, 10, 12), 800),
  ];

  it('should move points onto the target day keeping wall-clock offsets', () => {
    const moved = anchorSeriesToDay(pattern, at(2026, 10, 18));

    expect(moved.map((p) => p.timestamp)).toEqual([
      at(2026, 10, 18),
      at(2026, 10, 18, 12),
      at(2026, 10, 19),
    ]);
    expect(moved.map((p) => p.cumulativeAmount)).toEqual([0, 400, 800]);
  });

  it('should return the same series when already on the target day', () => {
    expect(anchorSeriesToDay(pattern, at(2026, 10, 11))).toBe(pattern);
  });
});
