// =============================================================================
// Embedding Extractor Interface
// =============================================================================

import type { ImageSource } from "../image/interface.js";
import type { EmbeddingResult, ResizeKernel } from "../utils/types.js";

export interface EmbeddingExtractor {
  readonly name: string;
  readonly dimensions: number;

  /**
   * Generates an embedding for a face crop.
   * Image access failures are reported as `{ success: false }`, never thrown.
   */
  extract(image: ImageSource): EmbeddingResult;
}

/**
 * Factory function type for creating embedding extractors.
 */
export type EmbeddingExtractorFactory = (config: {
  resizeKernel: ResizeKernel;
}) => EmbeddingExtractor;
