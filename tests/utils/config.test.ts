import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, reloadConfig } from '../../src/utils/config.js';

describe('Config', () => {
  let dir: string;

  function writeConfig(content: string): string {
    const path = join(dir, 'faceprint.config.json');
    writeFileSync(path, content);
    return path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'faceprint-config-'));
  });

  afterEach(() => {
    delete process.env.FACEPRINT_CONFIG_PATH;
    delete process.env.FACEPRINT_RESIZE_KERNEL;
    reloadConfig();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a config file', () => {
    expect(reloadConfig()).toEqual({
      embedding: { backend: 'grid' },
      image: { resize_kernel: 'nearest', limit_input_pixels: 50_000_000 },
    });
  });

  it('should merge file values over defaults', () => {
    process.env.FACEPRINT_CONFIG_PATH = writeConfig(JSON.stringify({ image: { resize_kernel: 'bilinear' } }));

    const config = reloadConfig();
    expect(config.image).toEqual({ resize_kernel: 'bilinear', limit_input_pixels: 50_000_000 });
    expect(config.embedding.backend).toBe('grid');
  });

  it('should cache until reloaded', () => {
    const first = reloadConfig();
    expect(loadConfig()).toBe(first);
  });

  it('should let the environment override the resize kernel', () => {
    process.env.FACEPRINT_RESIZE_KERNEL = 'bilinear';
    expect(reloadConfig().image.resize_kernel).toBe('bilinear');
  });

  it('should reject an unknown resize kernel in the environment', () => {
    process.env.FACEPRINT_RESIZE_KERNEL = 'lanczos';
    expect(() => reloadConfig()).toThrow('Invalid FACEPRINT_RESIZE_KERNEL: lanczos');
  });

  it('should reject invalid values in the file', () => {
    process.env.FACEPRINT_CONFIG_PATH = writeConfig(JSON.stringify({ image: { limit_input_pixels: -1 } }));
    expect(() => reloadConfig()).toThrow(/Invalid configuration/);
  });

  it('should reject malformed JSON', () => {
    process.env.FACEPRINT_CONFIG_PATH = writeConfig('{ not json');
    expect(() => reloadConfig()).toThrow(/Failed to parse configuration/);
  });

  it('should reject an explicit path that does not exist', () => {
    process.env.FACEPRINT_CONFIG_PATH = join(dir, 'missing.json');
    expect(() => reloadConfig()).toThrow(/Configuration file not found/);
  });
});
