import type { OutputFormat } from "./constants.js";

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Limits applied by processImage. Supplied by the caller as plain data;
 * all values are positive integers and imageMultiThreshold is at least 1.
 */
export interface CompressionConfig {
  imageMaxLongEdge: number;
  imageMaxPixelsSingle: number;
  imageMaxPixelsMulti: number;
  imageMultiThreshold: number;
}

export interface ProcessResult {
  readonly data: string; // base64, same transport encoding as the input
  readonly originalSize: Readonly<Dimensions>;
  readonly finalSize: Readonly<Dimensions>;
  readonly tokens: number;
  readonly wasResized: boolean;
}

export interface TokenEstimate {
  tokens: number;
  // original, unscaled dimensions
  width: number;
  height: number;
}

// Pixels decoded by the codec, ready to be resized
export interface DecodedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
}

export interface EncodedImage {
  data: Buffer;
  width: number;
  height: number;
}

// Image source resolution
export type ImageSourceType = "file" | "url" | "data_url" | "base64";

export interface ResolvedImageSource {
  base64: string;
  format?: OutputFormat; // detected container format, when recognised
  sourceType: ImageSourceType;
  originalSource: string;
}
