/**
 * Vector math shared by the extractor, the scorer and the aggregator.
 *
 * All functions take plain numeric arrays and return new arrays; inputs are
 * never written to. Accumulation always runs in index order so results are
 * reproducible bit for bit.
 */

import { EmbeddingShapeError } from "../utils/errors.js";

export function assertSameLength(a: readonly number[], b: readonly number[]): void {
  if (a.length !== b.length) {
    throw new EmbeddingShapeError(
      `Vector dimension mismatch: ${a.length} vs ${b.length}`,
      a.length,
      b.length
    );
  }
}

/**
 * Sum of squares, Σ vᵢ².
 */
export function squaredNorm(v: readonly number[]): number {
  let total = 0;
  for (const value of v) {
    total += value * value;
  }
  return total;
}

/**
 * Euclidean (L2) length.
 */
export function norm(v: readonly number[]): number {
  return Math.sqrt(squaredNorm(v));
}

/**
 * @throws EmbeddingShapeError if the vectors differ in length
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  assertSameLength(a, b);

  let total = 0;
  for (let i = 0; i < a.length; i++) {
    total += a[i] * b[i];
  }
  return total;
}

/**
 * Scales a vector to unit length.
 *
 * A zero-norm vector has no direction, so it is returned unchanged rather
 * than divided by zero.
 */
export function normalize(v: readonly number[]): readonly number[] {
  const length = norm(v);

  if (length === 0) return v;

  return v.map((value) => value / length);
}

/**
 * Elementwise sum of equal-length vectors, accumulated in input order.
 *
 * @throws EmbeddingShapeError if any vector differs in length from the first
 */
export function sum(vectors: readonly (readonly number[])[]): number[] {
  if (vectors.length === 0) return [];

  const length = vectors[0].length;
  const total = new Array<number>(length).fill(0);

  for (const vector of vectors) {
    if (vector.length !== length) {
      throw new EmbeddingShapeError(
        `Vector dimension mismatch: expected ${length}, got ${vector.length}`,
        length,
        vector.length
      );
    }
    for (let i = 0; i < length; i++) {
      total[i] += vector[i];
    }
  }

  return total;
}
