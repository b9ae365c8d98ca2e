import { describe, it, expect } from 'vitest';
import {
  billingWindowEndingAt,
  formatCompactDate,
  formatFileTimestamp,
  formatIsoDate,
  hoursBetween,
  toNaiveUtc,
} from '@shared/utils/time';

describe('toNaiveUtc', () => {
  it('should return Date values unchanged', () => {
    const date = new Date('2024-03-01T10:00:00Z');

    expect(toNaiveUtc(date)).toBe(date);
  });

  it('should drop UTC offsets and keep the wall-clock reading', () => {
    expect(toNaiveUtc('2024-03-01T10:00:00+05:00').toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(toNaiveUtc('2024-03-01T10:00:00Z').toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(toNaiveUtc('2024-03-01T10:00:00').toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  it('should read a bare date as midnight', () => {
    expect(toNaiveUtc('2024-03-01').toISOString()).toBe('2024-03-01T00:00:00.000Z');
  });

  it('should throw RangeError for unparseable values', () => {
    expect(() => toNaiveUtc('yesterday')).toThrow(RangeError);
  });
});

describe('hoursBetween', () => {
  it('should return signed hours', () => {
    const a = new Date('2024-03-01T00:00:00Z');
    const b = new Date('2024-03-01T12:30:00Z');

    expect(hoursBetween(a, b)).toBe(12.5);
    expect(hoursBetween(b, a)).toBe(-12.5);
  });
});

describe('billingWindowEndingAt', () => {
  it('should reach back whole days from now', () => {
    const now = new Date('2024-03-31T06:00:00Z');

    expect(billingWindowEndingAt(now, 30)).toEqual({ start: new Date('2024-03-01T06:00:00Z'), end: now });
  });
});

describe('date formatting', () => {
  it('should format the UTC calendar date for Cost Explorer', () => {
    expect(formatIsoDate(new Date('2024-03-01T23:59:59Z'))).toBe('2024-03-01');
  });

  it('should format local dates and timestamps for file and session names', () => {
    const local = new Date(2024, 0, 5, 7, 8, 9);

    expect(formatCompactDate(local)).toBe('20240105');
    expect(formatFileTimestamp(local)).toBe('20240105_070809');
  });
});
