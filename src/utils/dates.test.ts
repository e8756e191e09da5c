import { describe, expect, it } from 'vitest';
import { daysBetween, shiftDate, toCalendarDate } from './dates.js';

describe('toCalendarDate', () => {
  it('truncates ISO timestamps without converting the zone', () => {
    expect(toCalendarDate('2024-03-05T23:30:00Z')).toBe('2024-03-05');
    expect(toCalendarDate('2024-03-05 14:00:00')).toBe('2024-03-05');
  });

  it('reads compact dates', () => {
    expect(toCalendarDate('20240305')).toBe('2024-03-05');
  });

  it('rejects impossible and empty dates', () => {
    expect(toCalendarDate('2024-02-30')).toBeNull();
    expect(toCalendarDate('')).toBeNull();
    expect(toCalendarDate(null)).toBeNull();
    expect(toCalendarDate('not a date')).toBeNull();
  });
});

describe('daysBetween', () => {
  it('counts calendar days across month and leap boundaries', () => {
    expect(daysBetween('2024-03-01', '2024-02-28')).toBe(2);
    expect(daysBetween('2024-02-28', '2024-03-01')).toBe(-2);
    expect(daysBetween('2024-01-10', '2023-06-01')).toBe(223);
  });
});

describe('shiftDate', () => {
  it('moves by whole days', () => {
    expect(shiftDate('2024-03-01', -1)).toBe('2024-02-29');
    expect(shiftDate('2024-12-31', 1)).toBe('2025-01-01');
  });
});
