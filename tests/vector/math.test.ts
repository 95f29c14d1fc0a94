import { describe, it, expect } from 'vitest';
import { dot, norm, normalize, squaredNorm, sum } from '../../src/vector/math.js';
import { EmbeddingShapeError } from '../../src/utils/errors.js';

describe('Vector Math', () => {
  describe('norm', () => {
    it('should compute the euclidean length', () => {
      expect(norm([3, 4])).toBe(5);
      expect(squaredNorm([3, 4])).toBe(25);
    });

    it('should be zero for an empty vector', () => {
      expect(norm([])).toBe(0);
    });
  });

  describe('dot', () => {
    it('should multiply and sum elementwise', () => {
      expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
    });

    it('should throw on length mismatch', () => {
      expect(() => dot([1, 2], [1, 2, 3])).toThrow(EmbeddingShapeError);
    });
  });

  describe('normalize', () => {
    it('should scale to unit length', () => {
      expect(normalize([3, 4])).toEqual([0.6, 0.8]);
    });

    it('should return a zero vector unchanged', () => {
      const zero = [0, 0, 0];
      expect(normalize(zero)).toBe(zero);
    });

    it('should not modify its input', () => {
      const v = [3, 4];
      normalize(v);
      expect(v).toEqual([3, 4]);
    });

    it('should be idempotent', () => {
      const vectors = [[1, 2, 2], [0.3, -1.7, 4.2, 0.01], [-5, 12]];

      for (const v of vectors) {
        const once = normalize(v);
        const twice = normalize(once);
        expect(twice).toHaveLength(once.length);
        twice.forEach((value, i) => expect(value).toBeCloseTo(once[i], 12));
      }
    });
  });

  describe('sum', () => {
    it('should add vectors elementwise', () => {
      expect(sum([[1, 2], [3, 4], [5, 6]])).toEqual([9, 12]);
    });

    it('should return an empty vector for no input', () => {
      expect(sum([])).toEqual([]);
    });

    it('should throw when lengths differ', () => {
      expect(() => sum([[1, 2], [1, 2, 3]])).toThrow(EmbeddingShapeError);
    });
  });
});
