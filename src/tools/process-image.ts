import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ProcessImageInputSchema } from "../schemas/index.js";
import { resolveImageSource } from "../services/image-source-resolver.js";
import { processImage, selectPixelCap } from "../services/image-processor.js";
import { OUTPUT_FORMATS, OUTPUT_MIME_TYPES } from "../constants.js";
import type { CompressionConfig } from "../types.js";
import { describeError, formatDimensions } from "../utils.js";

function buildDescription(config: CompressionConfig): string {
  return `Fits an image within the vision token budget and returns it ready to upload.

The image is downscaled (aspect ratio preserved, Lanczos-3) only when it exceeds the limits:
  - long edge at most ${config.imageMaxLongEdge}px
  - at most ${config.imageMaxPixelsSingle.toLocaleString("en-US")} pixels, or ${config.imageMaxPixelsMulti.toLocaleString("en-US")} pixels when the request carries ${config.imageMultiThreshold} or more images
An image already within limits is returned byte-for-byte unchanged.

Accepts image from: filePath, sourceUrl, dataUrl, or imageBase64 (at least one required).

Args:
  - format (string, optional): Output encoding when resizing: ${OUTPUT_FORMATS.join(", ")}. Defaults to the source format
  - imageCount (number, optional): Number of images in the request (default: 1)

Returns:
  1. Text summary
  2. JSON with originalSize, finalSize, tokens, wasResized, pixelCap
  3. The processed image as a base64 content block (omitted when an unresized image's format is not recognised)`;
}

export function registerProcessImageTool(server: McpServer, config: CompressionConfig): void {
  server.registerTool(
    "budget_process_image",
    {
      title: "Process Image for Token Budget",
      description: buildDescription(config),
      inputSchema: ProcessImageInputSchema,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ filePath, sourceUrl, dataUrl, imageBase64, format, imageCount }) => {
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

        const outputFormat = format ?? source.format;
        if (!outputFormat) {
          return {
            isError: true,
            content: [
              {
                type: "text" as const,
                text: `Error: Unable to detect the image format of ${source.originalSource}. Pass format explicitly (${OUTPUT_FORMATS.join(", ")}).`,
              },
            ],
          };
        }

        const result = await processImage(source.base64, outputFormat, config, imageCount);
        const pixelCap = selectPixelCap(config, imageCount);
        const multiImageMode = imageCount >= config.imageMultiThreshold;

        const summaryLines: string[] = [];
        if (result.wasResized) {
          summaryLines.push(
            `Downscaled ${formatDimensions(result.originalSize)} → ${formatDimensions(result.finalSize)} and re-encoded as ${outputFormat}`
          );
        } else {
          summaryLines.push(
            `Image ${formatDimensions(result.originalSize)} is within limits — passed through unchanged`
          );
        }
        summaryLines.push(
          `→ Estimated tokens: ~${result.tokens.toLocaleString("en-US")}`,
          `→ Pixel cap: ${pixelCap.toLocaleString("en-US")} (${multiImageMode ? "multi-image" : "single-image"} mode, ${imageCount} image${imageCount === 1 ? "" : "s"} in request)`
        );

        const structuredOutput = {
          format: outputFormat,
          originalSize: result.originalSize,
          finalSize: result.finalSize,
          tokens: result.tokens,
          wasResized: result.wasResized,
          pixelCap,
          multiImageMode,
        };

        // Passed-through bytes keep their container, so only a detected format labels them
        const imageFormat = result.wasResized ? outputFormat : source.format;
        if (!imageFormat) {
          summaryLines.push(
            `→ Image block omitted: the container format of ${source.originalSource} was not recognised`
          );
        }

        const content: Array<
          | { type: "text"; text: string }
          | { type: "image"; data: string; mimeType: string }
        > = [
          { type: "text", text: summaryLines.join("\n") },
          { type: "text", text: JSON.stringify(structuredOutput, null, 2) },
        ];
        if (imageFormat) {
          content.push({ type: "image", data: result.data, mimeType: OUTPUT_MIME_TYPES[imageFormat] });
        }

        return { content };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: `Error processing image: ${describeError(error)}`,
            },
          ],
        };
      }
    }
  );
}
