/**
 * Grid Embedding Extractor
 *
 * Stand-in for a learned face embedding: summarizes a face crop with simple
 * luminance statistics over a fixed grid.
 *
 * Algorithm:
 * - Resize to 112x112 and convert to grayscale
 * - Split into an 8x8 grid of 14x14 cells, visited row by row
 * - Per cell emit `(mean / 127.5) - 1` and `sqrt(|variance|) / 127.5`
 * - L2-normalize the resulting 128 values
 *
 * Output is a pure function of the pixel data.
 */

import type { EmbeddingExtractor } from "./interface.js";
import type { ImageSource } from "../image/interface.js";
import {
  EMBEDDING_SIZE,
  GRID_SIZE,
  INPUT_SIZE,
  type Embedding,
  type EmbeddingResult,
  type GridCell,
  type ResizeKernel,
} from "../utils/types.js";
import { normalize } from "../vector/math.js";
import { ImageAccessError } from "../utils/errors.js";
import { embeddingLogger } from "../utils/logger.js";

const CELL_SIZE = INPUT_SIZE / GRID_SIZE;

/**
 * Mean and standard deviation of every grid cell, row-major.
 * The image must already be INPUT_SIZE x INPUT_SIZE grayscale.
 */
export function computeGridCells(grayscale: ImageSource): GridCell[] {
  const cells: GridCell[] = [];

  for (let gy = 0; gy < GRID_SIZE; gy++) {
    for (let gx = 0; gx < GRID_SIZE; gx++) {
      let sum = 0;
      let sumSq = 0;
      let count = 0;

      for (let y = gy * CELL_SIZE; y < (gy + 1) * CELL_SIZE; y++) {
        for (let x = gx * CELL_SIZE; x < (gx + 1) * CELL_SIZE; x++) {
          const luminance = grayscale.getLuminance(x, y);
          sum += luminance;
          sumSq += luminance * luminance;
          count++;
        }
      }

      const mean = sum / count;
      // Accumulated squares can leave a tiny negative variance on flat regions
      const variance = sumSq / count - mean * mean;

      cells.push({ mean, stdDev: Math.sqrt(Math.abs(variance)) });
    }
  }

  return cells;
}

/**
 * Maps cells to the raw (unnormalized) feature vector.
 */
export function cellsToFeatures(cells: readonly GridCell[]): number[] {
  const features: number[] = [];
  for (const cell of cells) {
    features.push(cell.mean / 127.5 - 1.0);
    features.push(cell.stdDev / 127.5);
  }
  return features;
}

/**
 * Generates a normalized 128-value embedding.
 * Any error while reading pixels yields a failure result instead of a vector.
 */
export function generateEmbedding(image: ImageSource, resizeKernel: ResizeKernel = "nearest"): EmbeddingResult {
  try {
    if (image.width <= 0 || image.height <= 0) {
      throw new ImageAccessError(`Cannot embed empty image (${image.width}x${image.height})`);
    }

    const resized = image.resize(INPUT_SIZE, INPUT_SIZE, resizeKernel);
    if (resized.width !== INPUT_SIZE || resized.height !== INPUT_SIZE) {
      throw new ImageAccessError(
        `Resize produced ${resized.width}x${resized.height}, expected ${INPUT_SIZE}x${INPUT_SIZE}`
      );
    }

    const grayscale = resized.grayscale();
    const embedding: Embedding = normalize(cellsToFeatures(computeGridCells(grayscale)));

    return { success: true, embedding };
  } catch (error) {
    embeddingLogger.warn("Grid embedding generation failed", { error: String(error) });
    return { success: false, error: String(error) };
  }
}

export class GridEmbeddingExtractor implements EmbeddingExtractor {
  readonly name = "grid";
  readonly dimensions = EMBEDDING_SIZE;
  private readonly resizeKernel: ResizeKernel;

  constructor(resizeKernel: ResizeKernel = "nearest") {
    this.resizeKernel = resizeKernel;
    embeddingLogger.debug("Initialized grid embedding extractor", {
      dimensions: this.dimensions,
      resizeKernel,
    });
  }

  extract(image: ImageSource): EmbeddingResult {
    return generateEmbedding(image, this.resizeKernel);
  }
}

/**
 * Factory function for creating the grid extractor.
 */
export function createGridExtractor(config: { resizeKernel: ResizeKernel }): EmbeddingExtractor {
  return new GridEmbeddingExtractor(config.resizeKernel);
}
