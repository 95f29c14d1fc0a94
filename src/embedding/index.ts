import type { EmbeddingExtractor, EmbeddingExtractorFactory } from "./interface.js";
import type { EmbeddingBackend } from "../utils/types.js";
import { createGridExtractor } from "./grid.js";
import { getEmbeddingConfig, getImageConfig } from "../utils/config.js";
import { embeddingLogger } from "../utils/logger.js";

// Re-export types and classes
export type { EmbeddingExtractor, EmbeddingExtractorFactory } from "./interface.js";
export {
  GridEmbeddingExtractor,
  createGridExtractor,
  generateEmbedding,
  computeGridCells,
  cellsToFeatures,
} from "./grid.js";

const EXTRACTOR_FACTORIES: Record<EmbeddingBackend, EmbeddingExtractorFactory> = {
  grid: createGridExtractor,
};

let cachedExtractor: EmbeddingExtractor | null = null;

/**
 * Gets the configured embedding extractor.
 * Creates and caches on first call.
 */
export function getEmbeddingExtractor(): EmbeddingExtractor {
  if (cachedExtractor) {
    return cachedExtractor;
  }

  const { backend } = getEmbeddingConfig();
  const { resize_kernel } = getImageConfig();

  embeddingLogger.info(`Creating embedding extractor: ${backend}`);

  cachedExtractor = EXTRACTOR_FACTORIES[backend]({ resizeKernel: resize_kernel });
  return cachedExtractor;
}

/**
 * Drops the cached extractor so the next call re-reads config.
 */
export function resetEmbeddingExtractor(): void {
  cachedExtractor = null;
}
