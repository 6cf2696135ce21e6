import { TransportDecodeError } from "../errors.js";

// Standard alphabet, padded. Buffer.from(str, "base64") alone silently skips
// characters outside the alphabet, so the shape is checked first. The
// pattern has no nested quantifier and stays linear on multi-megabyte input.
const BASE64_CHARS = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeBase64(data: string): Buffer {
  if (data.length % 4 !== 0) {
    throw new TransportDecodeError(
      `Invalid base64 image data: length ${data.length} is not a multiple of 4.`
    );
  }
  if (!BASE64_CHARS.test(data)) {
    throw new TransportDecodeError(
      "Invalid base64 image data: contains characters outside the base64 alphabet or misplaced padding."
    );
  }
  return Buffer.from(data, "base64");
}

export function encodeBase64(bytes: Buffer): string {
  return bytes.toString("base64");
}
