import { LOG_PREFIX, OUTPUT_FORMATS } from "../constants.js";
import type { OutputFormat } from "../constants.js";
import { UnsupportedFormatError } from "../errors.js";
import type { CompressionConfig, ProcessResult } from "../types.js";
import { applyScalingRules } from "./scaling-rules.js";
import { calculateTokens } from "./tokens.js";
import { decodeBase64, encodeBase64 } from "./transport.js";
import { probeDimensions, decodePixels, resizeAndEncode } from "./image-codec.js";

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

/**
 * Pixel cap for a request carrying `imageCount` images. Requests at or above
 * the multi-image threshold get the stricter cap.
 */
export function selectPixelCap(config: CompressionConfig, imageCount: number): number {
  return imageCount >= config.imageMultiThreshold
    ? config.imageMaxPixelsMulti
    : config.imageMaxPixelsSingle;
}

/**
 * Fits a base64 image within the configured limits and reports its token cost.
 *
 * Only the container header is read unless the image actually has to shrink;
 * an image already within limits is returned as the very same base64 string.
 *
 * @param format - encoding used when the image is resized
 * @param imageCount - number of images in the enclosing request
 */
export async function processImage(
  base64Data: string,
  format: string,
  config: CompressionConfig,
  imageCount: number
): Promise<ProcessResult> {
  if (!isOutputFormat(format)) {
    throw new UnsupportedFormatError(
      `Unsupported image format '${format}'. Supported formats: ${OUTPUT_FORMATS.join(", ")}`
    );
  }

  const bytes = decodeBase64(base64Data);
  const originalSize = await probeDimensions(bytes);

  const target = applyScalingRules(
    originalSize.width,
    originalSize.height,
    config.imageMaxLongEdge,
    selectPixelCap(config, imageCount)
  );

  const needsResize = target.width !== originalSize.width || target.height !== originalSize.height;

  if (!needsResize) {
    return {
      data: base64Data,
      originalSize,
      finalSize: originalSize,
      tokens: calculateTokens(originalSize.width, originalSize.height),
      wasResized: false,
    };
  }

  const pixels = await decodePixels(bytes);
  const encoded = await resizeAndEncode(pixels, target, format);
  const finalSize = { width: encoded.width, height: encoded.height };

  if (finalSize.width !== target.width || finalSize.height !== target.height) {
    // finalSize follows the encoder output
    console.warn(
      `${LOG_PREFIX} Resized image is ${finalSize.width}×${finalSize.height}, expected ${target.width}×${target.height}`
    );
  }

  return {
    data: encodeBase64(encoded.data),
    originalSize,
    finalSize,
    tokens: calculateTokens(finalSize.width, finalSize.height),
    wasResized: true,
  };
}
