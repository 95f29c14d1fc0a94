/**
 * In-memory 8-bit raster.
 *
 * Pixels are stored row-major with 1 (gray), 3 (RGB) or 4 (RGBA) interleaved
 * channels. Every operation returns a new raster; the pixel buffer of an
 * existing raster is never written after construction.
 */

import type { ImageSource } from "./interface.js";
import type { ResizeKernel } from "../utils/types.js";
import { ImageAccessError } from "../utils/errors.js";

export type ChannelCount = 1 | 3 | 4;

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ImageAccessError(`Invalid dimensions (w=${width}, h=${height})`);
  }
}

function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

/**
 * Integer approximation of Rec. 601 luma: (77R + 150G + 29B) >> 8.
 * Equal channels map back to the same value.
 */
export function rgbToLuminance(r: number, g: number, b: number): number {
  return (77 * r + 150 * g + 29 * b) >> 8;
}

export class PixelRaster implements ImageSource {
  readonly width: number;
  readonly height: number;
  readonly channels: ChannelCount;
  private readonly data: Uint8Array;

  constructor(width: number, height: number, channels: ChannelCount, data: Uint8Array) {
    assertDimensions(width, height);

    const expected = width * height * channels;
    if (data.length < expected) {
      throw new ImageAccessError(`Pixel buffer length ${data.length} < expected ${expected}`);
    }

    this.width = width;
    this.height = height;
    this.channels = channels;
    this.data = data;
  }

  /**
   * Builds a single-channel raster from a luminance function.
   */
  static fromLuminance(
    width: number,
    height: number,
    luminanceAt: (x: number, y: number) => number
  ): PixelRaster {
    assertDimensions(width, height);

    const data = new Uint8Array(width * height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        data[y * width + x] = clampByte(luminanceAt(x, y));
      }
    }
    return new PixelRaster(width, height, 1, data);
  }

  static filled(width: number, height: number, luminance: number): PixelRaster {
    return PixelRaster.fromLuminance(width, height, () => luminance);
  }

  getLuminance(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new ImageAccessError(`Pixel (${x}, ${y}) outside ${this.width}x${this.height} image`);
    }

    const offset = (y * this.width + x) * this.channels;
    if (this.channels === 1) {
      return this.data[offset];
    }
    return rgbToLuminance(this.data[offset], this.data[offset + 1], this.data[offset + 2]);
  }

  grayscale(): PixelRaster {
    if (this.channels === 1) {
      return new PixelRaster(this.width, this.height, 1, this.data.slice(0, this.width * this.height));
    }

    const n = this.width * this.height;
    const out = new Uint8Array(n);
    for (let i = 0, p = 0; i < n; i++, p += this.channels) {
      // alpha ignored
      out[i] = rgbToLuminance(this.data[p], this.data[p + 1], this.data[p + 2]);
    }
    return new PixelRaster(this.width, this.height, 1, out);
  }

  resize(width: number, height: number, kernel: ResizeKernel = "nearest"): PixelRaster {
    assertDimensions(width, height);

    switch (kernel) {
      case "nearest":
        return this.resizeNearest(width, height);
      case "bilinear":
        return this.resizeBilinear(width, height);
      default:
        throw new ImageAccessError(`Unknown resize kernel: ${String(kernel)}`);
    }
  }

  private resizeNearest(width: number, height: number): PixelRaster {
    const c = this.channels;
    const out = new Uint8Array(width * height * c);

    for (let y = 0; y < height; y++) {
      const sy = Math.min(this.height - 1, Math.floor((y * this.height) / height));
      for (let x = 0; x < width; x++) {
        const sx = Math.min(this.width - 1, Math.floor((x * this.width) / width));
        const src = (sy * this.width + sx) * c;
        const dst = (y * width + x) * c;
        for (let k = 0; k < c; k++) {
          out[dst + k] = this.data[src + k];
        }
      }
    }

    return new PixelRaster(width, height, c, out);
  }

  // Pixel-center aligned; samples past the edge clamp to the border.
  private resizeBilinear(width: number, height: number): PixelRaster {
    const c = this.channels;
    const out = new Uint8Array(width * height * c);
    const xRatio = this.width / width;
    const yRatio = this.height / height;

    for (let y = 0; y < height; y++) {
      const sy = Math.max(0, Math.min(this.height - 1, (y + 0.5) * yRatio - 0.5));
      const y0 = Math.floor(sy);
      const y1 = Math.min(this.height - 1, y0 + 1);
      const fy = sy - y0;

      for (let x = 0; x < width; x++) {
        const sx = Math.max(0, Math.min(this.width - 1, (x + 0.5) * xRatio - 0.5));
        const x0 = Math.floor(sx);
        const x1 = Math.min(this.width - 1, x0 + 1);
        const fx = sx - x0;

        const p00 = (y0 * this.width + x0) * c;
        const p10 = (y0 * this.width + x1) * c;
        const p01 = (y1 * this.width + x0) * c;
        const p11 = (y1 * this.width + x1) * c;
        const dst = (y * width + x) * c;

        for (let k = 0; k < c; k++) {
          const top = this.data[p00 + k] * (1 - fx) + this.data[p10 + k] * fx;
          const bottom = this.data[p01 + k] * (1 - fx) + this.data[p11 + k] * fx;
          out[dst + k] = clampByte(top * (1 - fy) + bottom * fy);
        }
      }
    }

    return new PixelRaster(width, height, c, out);
  }
}
