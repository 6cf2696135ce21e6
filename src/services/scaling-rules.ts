import type { Dimensions } from "../types.js";

/**
 * Computes the dimensions an image is downscaled to before upload.
 *
 * Two uniform scale-downs are applied in order, the second one to the output
 * of the first:
 *   1. the long edge is capped at `maxLongEdge`
 *   2. the pixel count is capped at `maxPixels`
 *
 * Scaling runs in floating point; each side is floored only at the end and
 * never drops below 1px. Dimensions already within both limits come back
 * unchanged.
 */
export function applyScalingRules(
  width: number,
  height: number,
  maxLongEdge: number,
  maxPixels: number
): Dimensions {
  let w = width;
  let h = height;

  const longEdge = Math.max(w, h);
  if (longEdge > maxLongEdge) {
    const scale = maxLongEdge / longEdge;
    w *= scale;
    h *= scale;
  }

  const pixels = w * h;
  if (pixels > maxPixels) {
    const scale = Math.sqrt(maxPixels / pixels);
    w *= scale;
    h *= scale;
  }

  return {
    width: Math.max(1, Math.floor(w)),
    height: Math.max(1, Math.floor(h)),
  };
}
