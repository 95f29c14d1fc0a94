export class FaceprintError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "FaceprintError";
  }
}

/**
 * Raised when pixels cannot be read: undecodable bytes, zero-sized or
 * malformed rasters, failed resizes and out-of-bounds reads.
 */
export class ImageAccessError extends FaceprintError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ImageAccessError";
  }
}

/**
 * Raised when vectors that must share a length do not.
 */
export class EmbeddingShapeError extends FaceprintError {
  constructor(
    message: string,
    readonly expected: number,
    readonly actual: number
  ) {
    super(message);
    this.name = "EmbeddingShapeError";
  }
}
