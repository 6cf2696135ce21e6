import sharp from "sharp";
import type { Metadata, Sharp } from "sharp";
import {
  JPEG_QUALITY,
  PNG_COMPRESSION_LEVEL,
  WEBP_QUALITY,
} from "../constants.js";
import type { OutputFormat } from "../constants.js";
import {
  DimensionReadError,
  EncodeError,
  FullDecodeError,
  HeaderProbeError,
} from "../errors.js";
import type { DecodedImage, Dimensions, EncodedImage } from "../types.js";

sharp.cache({ items: 10, memory: 200 });
sharp.concurrency(2);

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Reads the image dimensions from the container header. sharp's metadata()
 * parses the header only; no pixel data is decoded.
 */
export async function probeDimensions(bytes: Buffer): Promise<Dimensions> {
  let metadata: Metadata;
  try {
    metadata = await sharp(bytes).metadata();
  } catch (err: unknown) {
    throw new HeaderProbeError(`Unable to recognise image format: ${reason(err)}`, { cause: err });
  }

  if (!metadata.width || !metadata.height) {
    throw new DimensionReadError(
      `Unable to read image dimensions from ${metadata.format ?? "unknown"} header.`
    );
  }

  return { width: metadata.width, height: metadata.height };
}

export async function decodePixels(bytes: Buffer): Promise<DecodedImage> {
  try {
    const { data, info } = await sharp(bytes).raw().toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: info.channels };
  } catch (err: unknown) {
    throw new FullDecodeError(`Failed to decode image pixels: ${reason(err)}`, { cause: err });
  }
}

function applyEncoder(pipeline: Sharp, format: OutputFormat): Sharp {
  switch (format) {
    case "jpeg":
    case "jpg":
      return pipeline.jpeg({ quality: JPEG_QUALITY });
    case "png":
      return pipeline.png({ compressionLevel: PNG_COMPRESSION_LEVEL });
    case "gif":
      return pipeline.gif();
    case "webp":
      return pipeline.webp({ quality: WEBP_QUALITY });
  }
}

/**
 * Resizes decoded pixels to exactly `target` with the Lanczos-3 kernel and
 * encodes the result. The returned dimensions are the ones the encoder
 * reports, not the requested ones.
 */
export async function resizeAndEncode(
  image: DecodedImage,
  target: Dimensions,
  format: OutputFormat
): Promise<EncodedImage> {
  try {
    const pipeline = sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: image.channels },
    }).resize(target.width, target.height, { kernel: sharp.kernel.lanczos3, fit: "fill" });

    const { data, info } = await applyEncoder(pipeline, format).toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height };
  } catch (err: unknown) {
    throw new EncodeError(`Failed to encode resized image as ${format}: ${reason(err)}`, { cause: err });
  }
}
