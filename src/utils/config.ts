import { readFileSync, existsSync } from "fs";
import { z } from "zod";
import { FaceprintConfig } from "./types.js";

const DEFAULT_CONFIG_PATH = "./faceprint.config.json";

const DEFAULT_CONFIG: FaceprintConfig = {
  embedding: {
    backend: "grid",
  },
  image: {
    resize_kernel: "nearest",
    limit_input_pixels: 50_000_000,
  },
};

const ResizeKernelSchema = z.enum(["nearest", "bilinear"]);

const ConfigFileSchema = z.object({
  embedding: z
    .object({
      backend: z.literal("grid").optional(),
    })
    .optional(),
  image: z
    .object({
      resize_kernel: ResizeKernelSchema.optional(),
      limit_input_pixels: z.number().int().positive().optional(),
    })
    .optional(),
});

let cachedConfig: FaceprintConfig | null = null;

/**
 * Loads the Faceprint configuration.
 * The file is optional; missing sections fall back to defaults.
 * Environment variables override file values. Cached after first load.
 */
export function loadConfig(): FaceprintConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = process.env.FACEPRINT_CONFIG_PATH || DEFAULT_CONFIG_PATH;

  let fileConfig: z.infer<typeof ConfigFileSchema> = {};

  if (existsSync(configPath)) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new Error(`Failed to parse configuration: ${error}`);
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid configuration in ${configPath}: ${parsed.error.message}`);
    }
    fileConfig = parsed.data;
  } else if (process.env.FACEPRINT_CONFIG_PATH) {
    throw new Error(`Configuration file not found: ${configPath}`);
  }

  const config: FaceprintConfig = {
    embedding: { ...DEFAULT_CONFIG.embedding, ...fileConfig.embedding },
    image: { ...DEFAULT_CONFIG.image, ...fileConfig.image },
  };

  // Allow overriding the resize kernel (useful for testing)
  if (process.env.FACEPRINT_RESIZE_KERNEL) {
    const kernel = ResizeKernelSchema.safeParse(process.env.FACEPRINT_RESIZE_KERNEL);
    if (!kernel.success) {
      throw new Error(`Invalid FACEPRINT_RESIZE_KERNEL: ${process.env.FACEPRINT_RESIZE_KERNEL}`);
    }
    config.image.resize_kernel = kernel.data;
  }

  cachedConfig = config;
  return cachedConfig;
}

/**
 * Reloads config from disk (useful for testing or hot reload)
 */
export function reloadConfig(): FaceprintConfig {
  cachedConfig = null;
  return loadConfig();
}

export function getEmbeddingConfig() {
  return loadConfig().embedding;
}

export function getImageConfig() {
  return loadConfig().image;
}
