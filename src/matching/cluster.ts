import type { Embedding, EmbeddingGroup } from "../utils/types.js";
import { findBestMatch } from "./match-finder.js";
import { averageEmbedding } from "./aggregate.js";
import { matchingLogger } from "../utils/logger.js";

/**
 * Groups embeddings into identities in a single greedy pass.
 *
 * Each embedding is matched against the current group centroids. On a match
 * it joins that group and the centroid is recomputed from all members;
 * otherwise it starts a new group. Results depend on input order.
 */
export function groupEmbeddings(embeddings: readonly Embedding[]): EmbeddingGroup[] {
  const groups: { members: number[]; embeddings: Embedding[]; centroid: Embedding }[] = [];

  embeddings.forEach((embedding, index) => {
    const match = findBestMatch(
      embedding,
      groups.map((group) => group.centroid)
    );

    if (match) {
      const group = groups[match.index];
      group.members.push(index);
      group.embeddings.push(embedding);
      group.centroid = averageEmbedding(group.embeddings);
    } else {
      groups.push({ members: [index], embeddings: [embedding], centroid: embedding });
    }
  });

  matchingLogger.debug("Grouped embeddings", {
    embeddings: embeddings.length,
    groups: groups.length,
  });

  return groups.map(({ members, centroid }) => ({ members, centroid }));
}
