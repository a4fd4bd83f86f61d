import { describe, it, expect } from 'vitest';
import {
  fixedOffsetParts,
  formatDayMonthYear,
  formatIsoLike,
  getZonedParts,
  isValidTimeZone,
} from '../../../src/utils/zoned-time.js';

describe('zoned time', () => {
  const instant = new Date('2026-12-31T20:30:05Z');

  it('recognizes valid and invalid zones', () => {
    expect(isValidTimeZone('Asia/Ho_Chi_Minh')).toBe(true);
    expect(isValidTimeZone('Nowhere/Unknown')).toBe(false);
  });

  it('rolls the date over with a fixed offset', () => {
    expect(fixedOffsetParts(instant, 420)).toEqual({
      year: '2027',
      month: '01',
      day: '01',
      hour: '03',
      minute: '30',
      second: '05',
    });
  });

  it('handles offsets west of UTC', () => {
    expect(formatIsoLike(fixedOffsetParts(instant, -300))).toBe('2026-12-31 15:30:05');
  });

  it('formats both layouts from the same parts', () => {
    const parts = getZonedParts(instant, 'Asia/Ho_Chi_Minh', 420);
    expect(formatIsoLike(parts)).toBe('2027-01-01 03:30:05');
    expect(formatDayMonthYear(parts)).toBe('01/01/2027 03:30:05');
  });

  it('uses the fallback offset for an unknown zone', () => {
    expect(getZonedParts(instant, 'Nowhere/Unknown', 0)).toEqual(fixedOffsetParts(instant, 0));
  });

  it('renders midnight as 00 rather than 24', () => {
    const midnight = new Date('2026-03-01T17:00:00Z');
    expect(formatIsoLike(getZonedParts(midnight, 'Asia/Ho_Chi_Minh', 420))).toBe('2026-03-02 00:00:00');
  });
});
