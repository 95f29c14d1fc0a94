import { describe, it, expect } from 'vitest';
import { groupEmbeddings } from '../../src/matching/cluster.js';
import { cosineSimilarity } from '../../src/matching/similarity.js';

describe('groupEmbeddings', () => {
  it('should return no groups for no input', () => {
    expect(groupEmbeddings([])).toEqual([]);
  });

  it('should use a lone embedding as its own centroid', () => {
    const e = [0.6, 0.8];
    const groups = groupEmbeddings([e]);

    expect(groups).toHaveLength(1);
    expect(groups[0].members).toEqual([0]);
    expect(groups[0].centroid).toBe(e);
  });

  it('should put similar embeddings together and keep input order', () => {
    const groups = groupEmbeddings([
      [1, 0, 0],
      [0, 0, 1],
      [0.99, 0.1, 0],
      [0, 1, 0],
      [0.05, 0, 1],
    ]);

    expect(groups.map((g) => g.members)).toEqual([[0, 2], [1, 4], [3]]);
  });

  it('should recompute the centroid from all members', () => {
    const groups = groupEmbeddings([[1, 0, 0], [0.99, 0.1, 0]]);

    expect(groups).toHaveLength(1);
    expect(groups[0].centroid).toHaveLength(3);
    expect(cosineSimilarity(groups[0].centroid, [1, 0, 0])).toBeGreaterThan(0.99);
    expect(Math.hypot(...groups[0].centroid)).toBeCloseTo(1, 12);
  });
});
