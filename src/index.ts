/**
 * Faceprint - face identity matching without a trained network
 *
 * Face crops become 128-value grid-statistics embeddings, which are compared
 * by cosine similarity, matched against candidates, averaged into identity
 * centroids and grouped.
 */

export {
  INPUT_SIZE,
  EMBEDDING_SIZE,
  SIMILARITY_THRESHOLD,
  GRID_SIZE,
} from "./utils/types.js";
export type {
  Embedding,
  EmbeddingResult,
  EmbeddingGroup,
  MatchResult,
  GridCell,
  DetectedFace,
  Person,
  BoundingBox,
  ResizeKernel,
  FaceprintConfig,
} from "./utils/types.js";

export { FaceprintError, ImageAccessError, EmbeddingShapeError } from "./utils/errors.js";
export { createLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { loadConfig, reloadConfig } from "./utils/config.js";

export { dot, norm, normalize, squaredNorm, sum } from "./vector/math.js";

export type { ImageSource } from "./image/interface.js";
export { PixelRaster, rgbToLuminance } from "./image/raster.js";
export type { ChannelCount } from "./image/raster.js";
export { decodeImage } from "./image/decode.js";
export type { DecodeOptions } from "./image/decode.js";

export {
  GridEmbeddingExtractor,
  createGridExtractor,
  generateEmbedding,
  computeGridCells,
  cellsToFeatures,
  getEmbeddingExtractor,
  resetEmbeddingExtractor,
} from "./embedding/index.js";
export type { EmbeddingExtractor, EmbeddingExtractorFactory } from "./embedding/index.js";

export { cosineSimilarity, areSamePerson } from "./matching/similarity.js";
export { findBestMatch } from "./matching/match-finder.js";
export { averageEmbedding } from "./matching/aggregate.js";
export { groupEmbeddings } from "./matching/cluster.js";

export { PersonRegistry } from "./people/registry.js";

export {
  FaceEmbeddingService,
  createFaceEmbeddingService,
  getFaceEmbeddingService,
} from "./service.js";
export type { FaceEmbeddingServiceOptions } from "./service.js";
