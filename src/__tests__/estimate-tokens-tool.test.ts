import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../services/token-estimate.js", () => ({
  estimateImageTokens: vi.fn(),
}));

vi.mock("../services/image-source-resolver.js", () => ({
  resolveImageSource: vi.fn(),
}));

import { estimateImageTokens } from "../services/token-estimate.js";
import { resolveImageSource } from "../services/image-source-resolver.js";
import { registerEstimateTokensTool } from "../tools/estimate-tokens.js";
import { createMockServer } from "./helpers/mock-server.js";

const mockedEstimate = vi.mocked(estimateImageTokens);
const mockedResolveSource = vi.mocked(resolveImageSource);

describe("registerEstimateTokensTool", () => {
  let mock: ReturnType<typeof createMockServer>;

  beforeEach(() => {
    vi.clearAllMocks();
    mock = createMockServer();
    registerEstimateTokensTool(mock.server as any);

    mockedResolveSource.mockResolvedValue({
      base64: "AAAA",
      format: "png",
      sourceType: "file",
      originalSource: "/images/photo.png",
    });
  });

  it("registers the tool as read-only", () => {
    const tool = mock.getTool("budget_estimate_tokens")!;
    expect(tool.config.annotations).toMatchObject({ readOnlyHint: true, destructiveHint: false });
  });

  it("returns error when no source provided", async () => {
    const tool = mock.getTool("budget_estimate_tokens")!;
    const res = (await tool.handler({}, {} as any)) as any;

    expect(res.isError).toBe(true);
    expect(res.content[0].text).toContain("No image source provided");
  });

  it("returns the estimate as JSON", async () => {
    mockedEstimate.mockResolvedValue({ tokens: 1532, width: 4000, height: 3000 });
    const tool = mock.getTool("budget_estimate_tokens")!;
    const res = (await tool.handler({ filePath: "/images/photo.png" }, {} as any)) as any;

    expect(mockedEstimate).toHaveBeenCalledWith("AAAA");
    expect(res.isError).toBeUndefined();
    expect(JSON.parse(res.content[0].text)).toEqual({
      estimated: true,
      tokens: 1532,
      width: 4000,
      height: 3000,
    });
  });

  it("reports an unreadable image without flagging an error", async () => {
    mockedEstimate.mockResolvedValue(null);
    const tool = mock.getTool("budget_estimate_tokens")!;
    const res = (await tool.handler({ filePath: "/images/photo.png" }, {} as any)) as any;

    expect(res.isError).toBeUndefined();
    expect(JSON.parse(res.content[0].text)).toEqual({
      estimated: false,
      note: "Could not read image dimensions from /images/photo.png",
    });
  });

  it("reports undecodable base64 as not estimated", async () => {
    const resolver = await vi.importActual<typeof import("../services/image-source-resolver.js")>(
      "../services/image-source-resolver.js"
    );
    const estimator = await vi.importActual<typeof import("../services/token-estimate.js")>(
      "../services/token-estimate.js"
    );
    mockedResolveSource.mockImplementation(resolver.resolveImageSource);
    mockedEstimate.mockImplementation(estimator.estimateImageTokens);

    const tool = mock.getTool("budget_estimate_tokens")!;
    const res = (await tool.handler({ imageBase64: "@@@@" }, {} as any)) as any;

    expect(res.isError).toBeUndefined();
    expect(JSON.parse(res.content[0].text)).toEqual({
      estimated: false,
      note: "Could not read image dimensions from [base64, 4 chars]",
    });
  });

  it("returns source resolution errors", async () => {
    mockedResolveSource.mockRejectedValue(new Error("File not found: /images/missing.png."));
    const tool = mock.getTool("budget_estimate_tokens")!;
    const res = (await tool.handler({ filePath: "/images/missing.png" }, {} as any)) as any;

    expect(res.isError).toBe(true);
    expect(res.content[0].text).toBe("Error estimating tokens: File not found: /images/missing.png.");
  });
});
