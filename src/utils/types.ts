// =============================================================================
// Faceprint Core Types
// =============================================================================

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

/** Side length, in pixels, that every face crop is resized to before feature extraction. */
export const INPUT_SIZE = 112;

/** Number of values in every generated embedding. */
export const EMBEDDING_SIZE = 128;

/** Cosine similarity at or above which two embeddings are the same identity. */
export const SIMILARITY_THRESHOLD = 0.75;

/** Cells per side of the feature grid (8x8 = 64 cells, two values each). */
export const GRID_SIZE = 8;

// -----------------------------------------------------------------------------
// Vectors
// -----------------------------------------------------------------------------

/**
 * Fixed-length fingerprint of a face crop.
 * Produced by an extractor or by averaging; never mutated afterwards.
 */
export type Embedding = readonly number[];

export interface MatchResult {
  /** Position of the winning candidate in the list that was searched */
  index: number;
  /** Cosine similarity, always >= SIMILARITY_THRESHOLD */
  score: number;
}

/**
 * Luminance statistics of one grid region.
 * Only lives for the duration of a generation call.
 */
export interface GridCell {
  mean: number;
  stdDev: number;
}

export type EmbeddingResult =
  | { success: true; embedding: Embedding }
  | { success: false; error: string };

export interface EmbeddingGroup {
  /** Indices into the grouped input, in input order */
  members: number[];
  centroid: Embedding;
}

// -----------------------------------------------------------------------------
// Faces and Persons
// -----------------------------------------------------------------------------

export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface DetectedFace {
  id: string;
  imagePath: string;
  embedding: Embedding;
  personId: string | null;
  detectedAt: string;
  boundingBox?: BoundingBox;
  thumbnailPath?: string;
}

export interface Person {
  id: string;
  name: string;
  averageEmbedding: Embedding;
  faceCount: number;
  createdAt: string;
  updatedAt: string;
  thumbnailPath?: string;
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export type ResizeKernel = "nearest" | "bilinear";

export type EmbeddingBackend = "grid";

export interface FaceprintConfig {
  embedding: {
    backend: EmbeddingBackend;
  };
  image: {
    resize_kernel: ResizeKernel;
    limit_input_pixels: number;
  };
}
