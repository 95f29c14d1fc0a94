/**
 * Embeds image files for the CLI scripts.
 *
 * A path that cannot be read or decoded is reported with its reason instead
 * of aborting the run.
 */

import { readFile } from "fs/promises";
import type { FaceEmbeddingService } from "../service.js";
import type { Embedding } from "../utils/types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

export type FileEmbedding =
  | { path: string; success: true; embedding: Embedding }
  | { path: string; success: false; error: string };

export interface EmbeddedFiles {
  embedded: { path: string; embedding: Embedding }[];
  skipped: { path: string; error: string }[];
}

export async function embedFile(service: FaceEmbeddingService, path: string): Promise<FileEmbedding> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    return { path, success: false, error: `cannot read file (${String(error)})` };
  }

  const embedding = await service.getEmbeddingFromBytes(bytes);
  if (!embedding) {
    return { path, success: false, error: "no embedding" };
  }
  return { path, success: true, embedding };
}

/**
 * Embeds files one at a time, in argument order.
 */
export async function embedFiles(service: FaceEmbeddingService, paths: readonly string[]): Promise<EmbeddedFiles> {
  const result: EmbeddedFiles = { embedded: [], skipped: [] };

  for (const path of paths) {
    const file = await embedFile(service, path);
    if (file.success) {
      result.embedded.push({ path, embedding: file.embedding });
    } else {
      logger.warn(`Skipping ${path}: ${file.error}`);
      result.skipped.push({ path, error: file.error });
    }
  }

  return result;
}
