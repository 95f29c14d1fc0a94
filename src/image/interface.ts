// =============================================================================
// Image Source Interface
// =============================================================================

import type { ResizeKernel } from "../utils/types.js";

/**
 * Pixel access capability required by embedding extractors.
 * How pixels are stored or decoded is up to the implementation.
 */
export interface ImageSource {
  readonly width: number;
  readonly height: number;

  /**
   * Returns a copy resampled to exactly `width` x `height`.
   */
  resize(width: number, height: number, kernel?: ResizeKernel): ImageSource;

  /**
   * Returns a single-channel copy holding luminance.
   */
  grayscale(): ImageSource;

  /**
   * Luminance (0-255) at (x, y). Throws when the coordinate is outside the image.
   */
  getLuminance(x: number, y: number): number;
}
