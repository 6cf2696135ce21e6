import { DEFAULT_MAX_LONG_EDGE, DEFAULT_MAX_PIXELS_SINGLE } from "../constants.js";
import type { TokenEstimate } from "../types.js";
import { applyScalingRules } from "./scaling-rules.js";
import { calculateTokens } from "./tokens.js";
import { decodeBase64 } from "./transport.js";
import { probeDimensions } from "./image-codec.js";

/**
 * Best-effort token cost of a base64 image under the single-image limits.
 * Reads the header only. Returns null instead of throwing when the data
 * cannot be decoded or probed.
 */
export async function estimateImageTokens(base64Data: string): Promise<TokenEstimate | null> {
  try {
    const { width, height } = await probeDimensions(decodeBase64(base64Data));
    const scaled = applyScalingRules(width, height, DEFAULT_MAX_LONG_EDGE, DEFAULT_MAX_PIXELS_SINGLE);
    return { tokens: calculateTokens(scaled.width, scaled.height), width, height };
  } catch {
    return null;
  }
}
