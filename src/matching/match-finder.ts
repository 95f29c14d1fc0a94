import { SIMILARITY_THRESHOLD, type MatchResult } from "../utils/types.js";
import { cosineSimilarity } from "./similarity.js";

/**
 * Finds the candidate most similar to `target`.
 *
 * Candidates are scanned in order and the best score only moves on a strict
 * improvement, so the lowest index wins a tie. Returns null when nothing
 * reaches SIMILARITY_THRESHOLD, including for an empty candidate list.
 *
 * A linear scan is enough here: candidate sets are the faces of one photo
 * or the persons of one library.
 */
export function findBestMatch(
  target: readonly number[],
  candidates: readonly (readonly number[])[]
): MatchResult | null {
  let bestIndex = -1;
  let bestScore = -Infinity;

  for (let i = 0; i < candidates.length; i++) {
    const score = cosineSimilarity(target, candidates[i]);
    if (score > bestScore) {
      bestScore = score;
      bestIndex = i;
    }
  }

  if (bestIndex >= 0 && bestScore >= SIMILARITY_THRESHOLD) {
    return { index: bestIndex, score: bestScore };
  }

  return null;
}
