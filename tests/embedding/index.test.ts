import { describe, it, expect, afterEach } from 'vitest';
import { getEmbeddingExtractor, resetEmbeddingExtractor } from '../../src/embedding/index.js';
import { generateEmbedding } from '../../src/embedding/grid.js';
import { PixelRaster } from '../../src/image/raster.js';
import { reloadConfig } from '../../src/utils/config.js';

describe('Embedding extractor factory', () => {
  afterEach(() => {
    delete process.env.FACEPRINT_RESIZE_KERNEL;
    reloadConfig();
    resetEmbeddingExtractor();
  });

  it('should create the grid extractor by default', () => {
    resetEmbeddingExtractor();
    const extractor = getEmbeddingExtractor();

    expect(extractor.name).toBe('grid');
    expect(extractor.dimensions).toBe(128);
  });

  it('should cache the extractor until reset', () => {
    const first = getEmbeddingExtractor();
    expect(getEmbeddingExtractor()).toBe(first);

    resetEmbeddingExtractor();
    expect(getEmbeddingExtractor()).not.toBe(first);
  });

  it('should use the configured resize kernel', () => {
    process.env.FACEPRINT_RESIZE_KERNEL = 'bilinear';
    reloadConfig();
    resetEmbeddingExtractor();

    const image = PixelRaster.fromLuminance(75, 75, (x, y) => (x * 11 + y * 5) % 256);
    const result = getEmbeddingExtractor().extract(image);

    expect(result).toEqual(generateEmbedding(image, 'bilinear'));
    expect(result).not.toEqual(generateEmbedding(image, 'nearest'));
  });

  it('should resize with nearest neighbour by default', () => {
    const image = PixelRaster.fromLuminance(75, 75, (x, y) => (x * 11 + y * 5) % 256);
    expect(getEmbeddingExtractor().extract(image)).toEqual(generateEmbedding(image, 'nearest'));
  });
});
