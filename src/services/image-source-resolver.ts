import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  MAX_DOWNLOAD_SIZE_BYTES,
  DOWNLOAD_TIMEOUT_MS,
  ALLOWED_URL_PROTOCOLS,
} from "../constants.js";
import type { OutputFormat } from "../constants.js";
import type { ResolvedImageSource } from "../types.js";

async function resolveFile(filePath: string): Promise<ResolvedImageSource> {
  const resolvedPath = path.resolve(filePath);

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(resolvedPath);
  } catch {
    throw new Error(
      `File not found: ${resolvedPath}. Verify the file path is correct and the file exists.`
    );
  }

  return {
    base64: buffer.toString("base64"),
    format: formatFromExtension(path.extname(resolvedPath)) ?? formatFromMagicBytes(buffer),
    sourceType: "file",
    originalSource: filePath,
  };
}

async function resolveUrl(url: string): Promise<ResolvedImageSource> {
  const parsed = new URL(url);
  if (!ALLOWED_URL_PROTOCOLS.some((p) => p === parsed.protocol)) {
    throw new Error(
      `Unsupported URL protocol "${parsed.protocol}". Only ${ALLOWED_URL_PROTOCOLS.join(", ")} allowed.`
    );
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), DOWNLOAD_TIMEOUT_MS);

  let response: Response;
  try {
    response = await fetch(url, {
      signal: controller.signal,
      redirect: "follow",
    });
  } catch (err: unknown) {
    if (err instanceof Error && err.name === "AbortError") {
      throw new Error(`Download timed out after ${DOWNLOAD_TIMEOUT_MS / 1000}s: ${url}`);
    }
    throw new Error(`Failed to fetch image: ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} fetching ${url}`);
  }

  const contentType = response.headers.get("content-type");
  if (contentType && !isImageContentType(contentType)) {
    throw new Error(`URL returned non-image Content-Type "${contentType}": ${url}`);
  }

  const contentLength = response.headers.get("content-length");
  if (contentLength && parseInt(contentLength, 10) > MAX_DOWNLOAD_SIZE_BYTES) {
    throw new Error(
      `Image at ${url} is ${parseInt(contentLength, 10)} bytes, exceeding the ${MAX_DOWNLOAD_SIZE_BYTES} byte limit.`
    );
  }

  const buffer = Buffer.from(await response.arrayBuffer());
  if (buffer.length > MAX_DOWNLOAD_SIZE_BYTES) {
    throw new Error(
      `Downloaded image is ${buffer.length} bytes, exceeding the ${MAX_DOWNLOAD_SIZE_BYTES} byte limit.`
    );
  }

  return {
    base64: buffer.toString("base64"),
    format: formatFromContentType(contentType) ?? formatFromMagicBytes(buffer),
    sourceType: "url",
    originalSource: url,
  };
}

function resolveDataUrl(dataUrl: string): ResolvedImageSource {
  const match = dataUrl.match(/^data:image\/([a-zA-Z0-9.+-]+);base64,(.+)$/s);
  if (!match) {
    throw new Error(
      'Invalid data URL format. Expected "data:image/<format>;base64,<data>".'
    );
  }

  const mimeSubtype = match[1];
  const base64Data = match[2];

  // payload kept verbatim
  return {
    base64: base64Data,
    format: formatFromExtension(mimeSubtype),
    sourceType: "data_url",
    originalSource: `data:image/${mimeSubtype};base64,[${base64Data.length} chars]`,
  };
}

function resolveBase64(base64: string): ResolvedImageSource {
  // 16 base64 chars = 12 bytes, enough for every signature we check.
  // Malformed data is left for decodeBase64 to reject.
  const head = Buffer.from(base64.slice(0, 16), "base64");

  return {
    base64,
    format: formatFromMagicBytes(head),
    sourceType: "base64",
    originalSource: `[base64, ${base64.length} chars]`,
  };
}

function isImageContentType(ct: string): boolean {
  const lower = ct.toLowerCase();
  return lower.startsWith("image/") || lower.startsWith("application/octet-stream");
}

export function formatFromExtension(ext: string): OutputFormat | undefined {
  const lower = ext.toLowerCase().replace(".", "");
  if (lower === "jpeg" || lower === "jpg") return "jpeg";
  if (lower === "png") return "png";
  if (lower === "webp") return "webp";
  if (lower === "gif") return "gif";
  return undefined;
}

export function formatFromContentType(ct: string | null): OutputFormat | undefined {
  if (!ct) return undefined;
  const lower = ct.toLowerCase();
  if (lower.includes("png")) return "png";
  if (lower.includes("jpeg") || lower.includes("jpg")) return "jpeg";
  if (lower.includes("webp")) return "webp";
  if (lower.includes("gif")) return "gif";
  return undefined;
}

export function formatFromMagicBytes(buf: Buffer): OutputFormat | undefined {
  if (buf.length < 4) return undefined;
  if (buf[0] === 0x89 && buf[1] === 0x50 && buf[2] === 0x4e && buf[3] === 0x47) return "png";
  if (buf[0] === 0xff && buf[1] === 0xd8 && buf[2] === 0xff) return "jpeg";
  if (
    buf.length >= 12 &&
    buf.toString("ascii", 0, 4) === "RIFF" &&
    buf.toString("ascii", 8, 12) === "WEBP"
  ) {
    return "webp";
  }
  if (buf[0] === 0x47 && buf[1] === 0x49 && buf[2] === 0x46) return "gif";
  return undefined;
}

export interface ImageSourceParams {
  filePath?: string;
  sourceUrl?: string;
  dataUrl?: string;
  imageBase64?: string;
}

/**
 * Resolves an image from one of four possible sources to base64 data.
 * Precedence: filePath > sourceUrl > dataUrl > imageBase64
 *
 * Base64 coming from dataUrl or imageBase64 is returned as given; it is
 * validated later, when the image is processed.
 */
export async function resolveImageSource(
  params: ImageSourceParams
): Promise<ResolvedImageSource> {
  if (params.filePath) {
    return resolveFile(params.filePath);
  }

  if (params.sourceUrl) {
    return resolveUrl(params.sourceUrl);
  }

  if (params.dataUrl) {
    return resolveDataUrl(params.dataUrl);
  }

  if (params.imageBase64) {
    return resolveBase64(params.imageBase64);
  }

  throw new Error(
    "No image source provided. Supply one of: filePath, sourceUrl, dataUrl, or imageBase64."
  );
}
