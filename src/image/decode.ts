/*
  Image decode for face crops.

  Encoded bytes (PNG, JPEG, WebP, ...) are decoded once with sharp into an
  RGB PixelRaster. Resizing and grayscale conversion then happen on the raster
  so every ImageSource behaves the same whether it came from a file or was
  built in memory.
*/

import sharp from "sharp";
import { PixelRaster } from "./raster.js";
import { ImageAccessError } from "../utils/errors.js";
import { getImageConfig } from "../utils/config.js";
import { imageLogger } from "../utils/logger.js";

export interface DecodeOptions {
  /** Reject inputs with more pixels than this. Defaults to the configured limit. */
  limitInputPixels?: number;
}

/**
 * Decode bytes into an RGB raster. Auto-rotates using EXIF orientation.
 *
 * @throws ImageAccessError when the bytes cannot be decoded
 */
export async function decodeImage(bytes: Uint8Array, options: DecodeOptions = {}): Promise<PixelRaster> {
  if (bytes.length === 0) {
    throw new ImageAccessError("Cannot decode empty image buffer");
  }

  const limitInputPixels = options.limitInputPixels ?? getImageConfig().limit_input_pixels;

  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(Buffer.from(bytes), { limitInputPixels })
      .rotate()
      .removeAlpha()
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new ImageAccessError("Failed to decode image bytes via sharp", error);
  }

  const { data, info } = decoded;
  if (info.channels !== 3) {
    throw new ImageAccessError(`Unexpected channel count from sharp: ${info.channels}`);
  }

  imageLogger.debug("Decoded image", { width: info.width, height: info.height });

  return new PixelRaster(
    info.width,
    info.height,
    3,
    new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
  );
}
