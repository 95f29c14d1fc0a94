import type { Embedding } from "../utils/types.js";
import { normalize, sum } from "../vector/math.js";

/**
 * Centroid of a set of same-identity embeddings.
 *
 * - Empty input returns an empty embedding.
 * - A single embedding is returned as is, without renormalizing.
 * - Two or more are averaged elementwise and L2-normalized.
 *
 * @throws EmbeddingShapeError if the embeddings differ in length
 */
export function averageEmbedding(embeddings: readonly Embedding[]): Embedding {
  if (embeddings.length === 0) return [];
  if (embeddings.length === 1) return embeddings[0];

  const total = sum(embeddings);
  const average = total.map((value) => value / embeddings.length);

  return normalize(average);
}
