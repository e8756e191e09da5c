import { describe, expect, it } from 'vitest';
import { matchingCharacters, sequenceRatio } from './similarity.js';

describe('matchingCharacters', () => {
  it('counts characters in recursively matched blocks', () => {
    expect(matchingCharacters('abxcd', 'abcd')).toBe(4);
    expect(matchingCharacters('on xyz', 'xyz oversight')).toBe(3);
  });
});

describe('sequenceRatio', () => {
  it('computes 2M / (|a| + |b|)', () => {
    expect(sequenceRatio('abcd', 'bcde')).toBe(0.75);
    expect(sequenceRatio('markup of h.r. 1234', 'markup')).toBe(0.48);
  });

  it('treats identical strings as 1 and disjoint strings as 0', () => {
    expect(sequenceRatio('privacy', 'privacy')).toBe(1);
    expect(sequenceRatio('abc', 'xyz')).toBe(0);
    expect(sequenceRatio('abc', '')).toBe(0);
  });

  it('treats two empty strings as identical', () => {
    expect(sequenceRatio('', '')).toBe(1);
  });
});
