#!/usr/bin/env node

import { createRequire } from "node:module";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { registerProcessImageTool } from "./tools/process-image.js";
import { registerEstimateTokensTool } from "./tools/estimate-tokens.js";
import { loadCompressionConfig, CONFIG_ENV_VARS } from "./config.js";
import { LOG_PREFIX } from "./constants.js";
import type { CompressionConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

const args = process.argv.slice(2);

if (args.includes("--version") || args.includes("-v")) {
  console.log(version);
  process.exit(0);
}

if (args.includes("--help") || args.includes("-h")) {
  console.log(`image-budget-mcp-server v${version}

MCP server that fits images within a vision token budget by downscaling them.
Runs on stdio transport — designed to be launched by an MCP client.

Usage:
  image-budget-mcp-server            Start the MCP server (stdio)
  image-budget-mcp-server --version  Print version and exit
  image-budget-mcp-server --help     Print this help and exit

Environment:
  ${CONFIG_ENV_VARS.imageMaxLongEdge}      Max long edge in px (default 1568)
  ${CONFIG_ENV_VARS.imageMaxPixelsSingle}  Pixel cap for single-image requests (default 1150000)
  ${CONFIG_ENV_VARS.imageMaxPixelsMulti}   Pixel cap for multi-image requests (default 500000)
  ${CONFIG_ENV_VARS.imageMultiThreshold}    Image count that switches to the multi-image cap (default 20)`);
  process.exit(0);
}

let config: CompressionConfig;
try {
  config = loadCompressionConfig();
} catch (error: unknown) {
  console.error(`${LOG_PREFIX} ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

const server = new McpServer({
  name: "image-budget-mcp-server",
  version,
});

registerProcessImageTool(server, config);
registerEstimateTokensTool(server);

async function runStdio(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `${LOG_PREFIX} running on stdio (long edge ${config.imageMaxLongEdge}px, ` +
    `pixels ${config.imageMaxPixelsSingle}/${config.imageMaxPixelsMulti}, multi-image at ${config.imageMultiThreshold})`
  );
}

async function shutdown(): Promise<void> {
  await server.close();
  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

runStdio().catch((error: unknown) => {
  console.error(`${LOG_PREFIX} Server error:`, error);
  process.exit(1);
});
