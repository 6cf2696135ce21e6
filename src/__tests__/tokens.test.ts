import { describe, it, expect } from "vitest";
import { calculateTokens } from "../services/tokens.js";

describe("calculateTokens", () => {
  it("1092×1092 costs 1590 tokens", () => {
    expect(calculateTokens(1092, 1092)).toBe(1590);
  });

  it("200×200 costs 53 tokens", () => {
    expect(calculateTokens(200, 200)).toBe(53);
  });

  it("1568×784 costs 1639 tokens", () => {
    expect(calculateTokens(1568, 784)).toBe(1639);
  });

  it("a single pixel rounds down to 0", () => {
    expect(calculateTokens(1, 1)).toBe(0);
  });

  describe("round half up", () => {
    it("75×75 = 5625 px = 7.5 × 750 rounds up to 8", () => {
      expect(calculateTokens(75, 75)).toBe(8);
    });

    it("one pixel below the half rounds down (5624 px → 7)", () => {
      expect(calculateTokens(1, 5624)).toBe(7);
    });

    it("374 px rounds down to 0, 375 px rounds up to 1", () => {
      expect(calculateTokens(1, 374)).toBe(0);
      expect(calculateTokens(1, 375)).toBe(1);
    });

    it("exact multiples of 750 are not rounded", () => {
      expect(calculateTokens(750, 1)).toBe(1);
      expect(calculateTokens(750, 4)).toBe(4);
    });
  });

  it("is exact for the largest 16-bit sides", () => {
    expect(calculateTokens(65535, 65535)).toBe(5_726_448);
  });

  it("is symmetric in width and height", () => {
    expect(calculateTokens(1238, 928)).toBe(calculateTokens(928, 1238));
  });

  it("is monotonic non-decreasing in pixel count", () => {
    let previous = 0;
    for (let pixels = 1; pixels <= 10_000; pixels++) {
      const tokens = calculateTokens(pixels, 1);
      expect(tokens).toBeGreaterThanOrEqual(previous);
      previous = tokens;
    }
  });
});
