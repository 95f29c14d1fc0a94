/**
 * Face Embedding Service
 *
 * Entry point for callers that work with face crops rather than raw vectors.
 * Wraps an EmbeddingExtractor and the matching functions behind one object:
 *
 * - `init()` runs once; concurrent first callers share the same promise
 * - embedding failures come back as `null` and are logged, never thrown,
 *   so one bad crop does not abort a batch
 * - scoring, matching and averaging delegate to the pure functions in
 *   `matching/`, so they behave the same with any extractor
 *
 * @example
 * ```typescript
 * const service = createFaceEmbeddingService();
 * const a = await service.getEmbeddingFromBytes(cropA);
 * const b = await service.getEmbeddingFromBytes(cropB);
 * if (a && b && service.areSamePerson(a, b)) { ... }
 * ```
 */

import type { EmbeddingExtractor } from "./embedding/interface.js";
import type { ImageSource } from "./image/interface.js";
import type { Embedding, MatchResult } from "./utils/types.js";
import { getEmbeddingExtractor } from "./embedding/index.js";
import { decodeImage, type DecodeOptions } from "./image/decode.js";
import { cosineSimilarity, areSamePerson } from "./matching/similarity.js";
import { findBestMatch } from "./matching/match-finder.js";
import { averageEmbedding } from "./matching/aggregate.js";
import { embeddingLogger } from "./utils/logger.js";

export interface FaceEmbeddingServiceOptions {
  /** Defaults to the configured extractor */
  extractor?: EmbeddingExtractor;
  decodeOptions?: DecodeOptions;
}

export class FaceEmbeddingService {
  private extractor: EmbeddingExtractor | null;
  private readonly decodeOptions: DecodeOptions;
  private initPromise: Promise<void> | null = null;
  private initialized = false;

  constructor(options: FaceEmbeddingServiceOptions = {}) {
    this.extractor = options.extractor ?? null;
    this.decodeOptions = options.decodeOptions ?? {};
  }

  /**
   * Initializes the service. Safe to call any number of times.
   */
  init(): Promise<void> {
    if (this.initPromise) {
      return this.initPromise;
    }

    const pending = Promise.resolve().then(() => {
      const extractor = this.extractor ?? getEmbeddingExtractor();
      this.extractor = extractor;
      this.initialized = true;
      embeddingLogger.info(`FaceEmbeddingService initialized (using ${extractor.name} embeddings)`);
    });
    this.initPromise = pending;

    // A failed init may be retried by the next caller
    void pending.catch(() => {
      if (this.initPromise === pending) {
        this.initPromise = null;
      }
    });

    return pending;
  }

  get isAvailable(): boolean {
    return this.initialized;
  }

  async dispose(): Promise<void> {
    const pending = this.initPromise;
    this.initPromise = null;

    if (pending) {
      try {
        await pending;
      } catch (error) {
        embeddingLogger.debug("Disposing after failed init", { error: String(error) });
      }
    }

    this.initialized = false;
  }

  private async getExtractor(): Promise<EmbeddingExtractor> {
    await this.init();
    if (!this.extractor) {
      throw new Error("Embedding extractor unavailable after init");
    }
    return this.extractor;
  }

  /**
   * Embedding of a face crop, or null when none could be generated.
   */
  async getEmbedding(image: ImageSource): Promise<Embedding | null> {
    const extractor = await this.getExtractor();
    const result = extractor.extract(image);

    if (!result.success) {
      embeddingLogger.warn("Embedding generation error", { error: result.error });
      return null;
    }
    return result.embedding;
  }

  /**
   * Decodes encoded image bytes, then embeds them.
   * Undecodable input yields null.
   */
  async getEmbeddingFromBytes(bytes: Uint8Array): Promise<Embedding | null> {
    let image: ImageSource;
    try {
      image = await decodeImage(bytes, this.decodeOptions);
    } catch (error) {
      embeddingLogger.warn("Image decode error", { error: String(error) });
      return null;
    }
    return this.getEmbedding(image);
  }

  calculateSimilarity(a: Embedding, b: Embedding): number {
    return cosineSimilarity(a, b);
  }

  areSamePerson(a: Embedding, b: Embedding): boolean {
    return areSamePerson(a, b);
  }

  calculateAverageEmbedding(embeddings: readonly Embedding[]): Embedding {
    return averageEmbedding(embeddings);
  }

  findBestMatch(target: Embedding, candidates: readonly Embedding[]): MatchResult | null {
    return findBestMatch(target, candidates);
  }
}

export function createFaceEmbeddingService(options: FaceEmbeddingServiceOptions = {}): FaceEmbeddingService {
  return new FaceEmbeddingService(options);
}

let cachedService: FaceEmbeddingService | null = null;

/**
 * Gets the shared service built from configuration.
 * Prefer passing an explicitly created service where the call site allows it.
 */
export function getFaceEmbeddingService(): FaceEmbeddingService {
  if (!cachedService) {
    cachedService = createFaceEmbeddingService();
  }
  return cachedService;
}
