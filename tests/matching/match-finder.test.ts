import { describe, it, expect } from 'vitest';
import { findBestMatch } from '../../src/matching/match-finder.js';

describe('findBestMatch', () => {
  it('should return null for no candidates', () => {
    expect(findBestMatch([1, 0], [])).toBeNull();
  });

  it('should return null when every candidate is below the threshold', () => {
    expect(findBestMatch([1, 0], [[0, 1], [-1, 0], [1, 1.5]])).toBeNull();
  });

  it('should pick the most similar candidate', () => {
    const result = findBestMatch([1, 0, 0], [[0, 1, 0], [1, 0.1, 0], [1, 0, 0]]);

    expect(result).not.toBeNull();
    expect(result?.index).toBe(2);
    expect(result?.score).toBeCloseTo(1, 12);
  });

  it('should prefer the lowest index on a tie', () => {
    const result = findBestMatch([1, 0], [[0, 1], [1, 0], [2, 0]]);

    expect(result).toEqual({ index: 1, score: 1 });
  });

  it('should match at exactly the threshold', () => {
    const ones = new Array<number>(16).fill(1);
    const nineOnes = ones.map((_, i) => (i < 9 ? 1 : 0));

    expect(findBestMatch(ones, [nineOnes])).toEqual({ index: 0, score: 0.75 });
  });

  it('should skip candidates of a different length', () => {
    const result = findBestMatch([1, 0], [[1, 0, 0], [0.9, 0.1]]);

    expect(result?.index).toBe(1);
  });
});
