import { SIMILARITY_THRESHOLD } from "../utils/types.js";
import { dot, norm } from "../vector/math.js";

/**
 * Computes cosine similarity between two vectors.
 * Returns value between -1 and 1 (1 = identical, 0 = orthogonal, -1 = opposite).
 *
 * Vectors of different lengths, or with a zero norm, score 0 rather than
 * raising.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;

  const magnitude = norm(a) * norm(b);

  if (magnitude === 0) return 0;

  return dot(a, b) / magnitude;
}

export function areSamePerson(a: readonly number[], b: readonly number[]): boolean {
  return cosineSimilarity(a, b) >= SIMILARITY_THRESHOLD;
}
