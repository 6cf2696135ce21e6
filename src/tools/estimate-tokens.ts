import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { EstimateTokensInputSchema } from "../schemas/index.js";
import { resolveImageSource } from "../services/image-source-resolver.js";
import { estimateImageTokens } from "../services/token-estimate.js";
import { DEFAULT_MAX_LONG_EDGE, DEFAULT_MAX_PIXELS_SINGLE } from "../constants.js";
import { describeError } from "../utils.js";

const ESTIMATE_DESCRIPTION = `Cheap token cost estimate for an image, without resizing or re-encoding it.

Reads only the image header and applies the single-image limits (long edge ${DEFAULT_MAX_LONG_EDGE}px, ${DEFAULT_MAX_PIXELS_SINGLE.toLocaleString("en-US")} pixels) to compute the tokens the image will cost once uploaded. Use it as a budget pre-check before budget_process_image.

Accepts image from: filePath, sourceUrl, dataUrl, or imageBase64 (at least one required).

Returns JSON with:
  - estimated: false when the image could not be read (this is not an error)
  - tokens: estimated token cost
  - width, height: original image dimensions`;

export function registerEstimateTokensTool(server: McpServer): void {
  server.registerTool(
    "budget_estimate_tokens",
    {
      title: "Estimate Image Tokens",
      description: ESTIMATE_DESCRIPTION,
      inputSchema: EstimateTokensInputSchema,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ filePath, sourceUrl, dataUrl, imageBase64 }) => {
      if (!filePath && !sourceUrl && !dataUrl && !imageBase64) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: "Error: No image source provided. Supply one of: filePath, sourceUrl, dataUrl, or imageBase64.",
            },
          ],
        };
      }

      try {
        const source = await resolveImageSource({ filePath, sourceUrl, dataUrl, imageBase64 });
        const estimate = await estimateImageTokens(source.base64);

        const output = estimate
          ? { estimated: true, ...estimate }
          : {
              estimated: false,
              note: `Could not read image dimensions from ${source.originalSource}`,
            };

        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(output, null, 2),
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: `Error estimating tokens: ${describeError(error)}`,
            },
          ],
        };
      }
    }
  );
}
