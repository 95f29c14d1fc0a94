import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { embedFile, embedFiles } from '../../src/cli/embed-files.js';
import { createFaceEmbeddingService } from '../../src/service.js';
import { generateEmbedding } from '../../src/embedding/grid.js';
import { PixelRaster } from '../../src/image/raster.js';

describe('CLI file embedding', () => {
  let dir: string;
  let facePath: string;
  let garbagePath: string;
  let missingPath: string;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'faceprint-cli-'));

    facePath = join(dir, 'face.png');
    const png = await sharp({
      create: { width: 112, height: 112, channels: 3, background: { r: 127, g: 127, b: 127 } },
    })
      .png()
      .toBuffer();
    writeFileSync(facePath, png);

    garbagePath = join(dir, 'notes.txt');
    writeFileSync(garbagePath, 'not an image');

    missingPath = join(dir, 'missing.png');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('embedFile', () => {
    it('should embed a readable image', async () => {
      const file = await embedFile(createFaceEmbeddingService(), facePath);

      expect(generateEmbedding(PixelRaster.filled(112, 112, 127))).toEqual({
        success: true,
        embedding: file.success ? file.embedding : [],
      });
      expect(file.path).toBe(facePath);
    });

    it('should report a missing file instead of throwing', async () => {
      const file = await embedFile(createFaceEmbeddingService(), missingPath);

      expect(file.success).toBe(false);
      expect(file.success ? '' : file.error).toMatch(/^cannot read file \(.*ENOENT/);
    });

    it('should report bytes that do not decode', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const file = await embedFile(createFaceEmbeddingService(), garbagePath);

      expect(file).toEqual({ path: garbagePath, success: false, error: 'no embedding' });
    });
  });

  describe('embedFiles', () => {
    it('should skip failures and keep going in argument order', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const service = createFaceEmbeddingService();

      const { embedded, skipped } = await embedFiles(service, [missingPath, facePath, garbagePath, facePath]);

      expect(embedded.map((e) => e.path)).toEqual([facePath, facePath]);
      expect(embedded[0].embedding).toHaveLength(128);
      expect(skipped.map((s) => s.path)).toEqual([missingPath, garbagePath]);
      expect(skipped[1].error).toBe('no embedding');
      expect(warn).toHaveBeenCalledWith(expect.stringContaining(`Skipping ${missingPath}: cannot read file`));
      expect(warn).toHaveBeenCalledWith(expect.stringContaining(`Skipping ${garbagePath}: no embedding`));
    });

    it('should return empty lists for no paths', async () => {
      expect(await embedFiles(createFaceEmbeddingService(), [])).toEqual({ embedded: [], skipped: [] });
    });
  });
});
