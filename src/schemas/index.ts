import { z } from "zod";
import {
  OUTPUT_FORMATS,
  MAX_BASE64_LENGTH,
  MAX_DATA_URL_LENGTH,
  MAX_IMAGE_COUNT,
  DEFAULT_MAX_LONG_EDGE,
  DEFAULT_MAX_PIXELS_SINGLE,
  DEFAULT_MAX_PIXELS_MULTI,
  DEFAULT_MULTI_THRESHOLD,
} from "../constants.js";

// Image source fields shared by process-image and estimate-tokens
export const imageSourceFields = {
  filePath: z
    .string()
    .min(1, "File path cannot be empty")
    .optional()
    .describe("Absolute or relative path to the image file"),
  sourceUrl: z
    .string()
    .url("Must be a valid URL")
    .optional()
    .describe("HTTPS URL to download the image from (max 50MB, 30s timeout)"),
  dataUrl: z
    .string()
    .max(MAX_DATA_URL_LENGTH, `Data URL must not exceed ${MAX_DATA_URL_LENGTH} characters`)
    .optional()
    .describe('Data URL with base64-encoded image (e.g. "data:image/png;base64,...")'),
  imageBase64: z
    .string()
    .max(MAX_BASE64_LENGTH, `Base64 string must not exceed ${MAX_BASE64_LENGTH} characters`)
    .optional()
    .describe("Raw base64-encoded image data (no data URL prefix)"),
};

export const ProcessImageInputSchema = {
  ...imageSourceFields,
  format: z
    .enum(OUTPUT_FORMATS)
    .optional()
    .describe(
      `Encoding used when the image has to be resized: ${OUTPUT_FORMATS.join(", ")}. Defaults to the format detected from the source`
    ),
  imageCount: z
    .number()
    .int()
    .min(1, "imageCount must be at least 1")
    .max(MAX_IMAGE_COUNT, `imageCount must not exceed ${MAX_IMAGE_COUNT}`)
    .default(1)
    .describe(
      "Number of images in the request this image belongs to. At or above the multi-image threshold the stricter pixel cap applies"
    ),
};

export const EstimateTokensInputSchema = {
  ...imageSourceFields,
};

const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be a positive integer`);

export const CompressionConfigSchema = z.object({
  imageMaxLongEdge: positiveInt("imageMaxLongEdge").default(DEFAULT_MAX_LONG_EDGE),
  imageMaxPixelsSingle: positiveInt("imageMaxPixelsSingle").default(DEFAULT_MAX_PIXELS_SINGLE),
  imageMaxPixelsMulti: positiveInt("imageMaxPixelsMulti").default(DEFAULT_MAX_PIXELS_MULTI),
  imageMultiThreshold: positiveInt("imageMultiThreshold").default(DEFAULT_MULTI_THRESHOLD),
});
