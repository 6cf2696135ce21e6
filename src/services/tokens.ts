import { PIXELS_PER_TOKEN } from "../constants.js";

const HALF_DIVISOR = PIXELS_PER_TOKEN / 2;

/**
 * Token cost of an image of the given final size: pixel count / 750,
 * rounded half up. Exact for sides up to 65535, whose product stays far
 * below Number.MAX_SAFE_INTEGER.
 */
export function calculateTokens(width: number, height: number): number {
  return Math.floor((width * height + HALF_DIVISOR) / PIXELS_PER_TOKEN);
}
