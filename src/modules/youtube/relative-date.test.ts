import { describe, expect, it } from 'vitest';
import { parseRelativeDate } from './relative-date.js';

const now = new Date(2024, 5, 15, 12, 0, 0);

describe('parseRelativeDate', () => {
  it('subtracts days, weeks, 30-day months and 365-day years', () => {
    expect(parseRelativeDate('3 days ago', now)).toBe('2024-06-12');
    expect(parseRelativeDate('2 weeks ago', now)).toBe('2024-06-01');
    expect(parseRelativeDate('Streamed 3 months ago', now)).toBe('2024-03-17');
    expect(parseRelativeDate('1 year ago', now)).toBe('2023-06-16');
  });

  it('resolves sub-day ages to today', () => {
    expect(parseRelativeDate('Streamed 5 hours ago', now)).toBe('2024-06-15');
  });

  it('returns null for text that is not a relative age', () => {
    expect(parseRelativeDate('Premieres tomorrow', now)).toBeNull();
    expect(parseRelativeDate('', now)).toBeNull();
    expect(parseRelativeDate(undefined, now)).toBeNull();
  });
});
