#!/usr/bin/env tsx

/**
 * Compare CLI
 *
 * Embeds two face crops and reports their cosine similarity and whether
 * they clear the same-person threshold.
 *
 * Usage: npx tsx src/cli/compare.ts <imageA> <imageB>
 */

import { createFaceEmbeddingService } from "../service.js";
import { SIMILARITY_THRESHOLD } from "../utils/types.js";
import { embedFile } from "./embed-files.js";

async function compare(): Promise<number> {
  const [pathA, pathB] = process.argv.slice(2);

  if (!pathA || !pathB) {
    console.log("Usage: compare <imageA> <imageB>");
    return 1;
  }

  const service = createFaceEmbeddingService();
  await service.init();

  const [a, b] = await Promise.all([embedFile(service, pathA), embedFile(service, pathB)]);

  if (!a.success || !b.success) {
    for (const file of [a, b]) {
      if (!file.success) {
        console.log(`❌ ${file.path}: ${file.error}`);
      }
    }
    await service.dispose();
    return 1;
  }

  const similarity = service.calculateSimilarity(a.embedding, b.embedding);
  const same = service.areSamePerson(a.embedding, b.embedding);

  console.log(`  ${pathA}`);
  console.log(`  ${pathB}`);
  console.log();
  console.log(`  Similarity: ${similarity.toFixed(4)} (threshold ${SIMILARITY_THRESHOLD})`);
  console.log(`  Verdict:    ${same ? "✅ same person" : "➖ different people"}`);

  await service.dispose();
  return 0;
}

compare()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Compare failed:", error);
    process.exitCode = 1;
  });
