import { CompressionConfigSchema } from "./schemas/index.js";
import type { CompressionConfig } from "./types.js";

export const CONFIG_ENV_VARS = {
  imageMaxLongEdge: "IMAGE_MAX_LONG_EDGE",
  imageMaxPixelsSingle: "IMAGE_MAX_PIXELS_SINGLE",
  imageMaxPixelsMulti: "IMAGE_MAX_PIXELS_MULTI",
  imageMultiThreshold: "IMAGE_MULTI_THRESHOLD",
} as const satisfies Record<keyof CompressionConfig, string>;

/**
 * Builds the compression limits from environment variables, falling back to
 * the published single-image defaults. Empty variables count as unset.
 */
export function loadCompressionConfig(
  env: NodeJS.ProcessEnv = process.env
): CompressionConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const parsed = CompressionConfigSchema.safeParse({
    imageMaxLongEdge: read(CONFIG_ENV_VARS.imageMaxLongEdge),
    imageMaxPixelsSingle: read(CONFIG_ENV_VARS.imageMaxPixelsSingle),
    imageMaxPixelsMulti: read(CONFIG_ENV_VARS.imageMaxPixelsMulti),
    imageMultiThreshold: read(CONFIG_ENV_VARS.imageMultiThreshold),
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new Error(`Invalid compression configuration: ${details}`);
  }

  return parsed.data;
}
