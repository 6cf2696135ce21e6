// Vision token pricing: tokens = (width × height) / 750, rounded half up
export const PIXELS_PER_TOKEN = 750;

// Single-image limits published for the vision API
export const DEFAULT_MAX_LONG_EDGE = 1568;
export const DEFAULT_MAX_PIXELS_SINGLE = 1_150_000;
// Stricter pixel cap once a request bundles many images
export const DEFAULT_MAX_PIXELS_MULTI = 500_000;
export const DEFAULT_MULTI_THRESHOLD = 20;

// Output encodings accepted by processImage. jpg is an alias of jpeg.
export const OUTPUT_FORMATS = ["jpeg", "jpg", "png", "gif", "webp"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const OUTPUT_MIME_TYPES: Record<OutputFormat, string> = {
  jpeg: "image/jpeg",
  jpg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  webp: "image/webp",
};

// Fixed encoder settings; quality is not tunable per call
export const JPEG_QUALITY = 85;
export const WEBP_QUALITY = 80;
export const PNG_COMPRESSION_LEVEL = 6;

// Image source resolution
export const MAX_DOWNLOAD_SIZE_BYTES = 50 * 1024 * 1024; // 50 MB
export const DOWNLOAD_TIMEOUT_MS = 30_000; // 30 seconds
export const ALLOWED_URL_PROTOCOLS = ["https:"] as const;
export const MAX_BASE64_LENGTH = 67_108_864; // ~50MB decoded (base64 is ~4/3x)
export const MAX_DATA_URL_LENGTH = MAX_BASE64_LENGTH + 256; // base64 payload + data URL prefix overhead

// Largest request image count accepted by the tools
export const MAX_IMAGE_COUNT = 1000;

export const LOG_PREFIX = "[image-budget]";
