#!/usr/bin/env tsx

/**
 * Group CLI
 *
 * Embeds a set of face crops and groups them into identities.
 * Images that yield no embedding are skipped with a warning.
 *
 * Usage: npx tsx src/cli/group.ts <image> [image...]
 */

import { createFaceEmbeddingService } from "../service.js";
import { groupEmbeddings } from "../matching/cluster.js";
import { cosineSimilarity } from "../matching/similarity.js";
import { embedFiles } from "./embed-files.js";

async function group(): Promise<number> {
  const paths = process.argv.slice(2);

  if (paths.length === 0) {
    console.log("Usage: group <image> [image...]");
    return 1;
  }

  const service = createFaceEmbeddingService();
  await service.init();

  const { embedded, skipped } = await embedFiles(service, paths);

  const groups = groupEmbeddings(embedded.map((e) => e.embedding));

  console.log(`${embedded.length} faces, ${groups.length} identities, ${skipped.length} skipped`);
  console.log();

  groups.forEach((g, i) => {
    console.log(`┌─ Identity ${i + 1} (${g.members.length}) ─`);
    for (const member of g.members) {
      const { path, embedding } = embedded[member];
      console.log(`  ${cosineSimilarity(embedding, g.centroid).toFixed(4)}  ${path}`);
    }
    console.log();
  });

  await service.dispose();
  return 0;
}

group()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Group failed:", error);
    process.exitCode = 1;
  });
