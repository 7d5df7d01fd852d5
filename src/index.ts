#!/usr/bin/env node

/**
 * sta-triage - Model Context Protocol server for static timing report triage
 *
 * Exposes the Vivado timing report parser and violation classifier as MCP
 * tools over stdio.
 */

// Load environment variables from .env file
import dotenv from "dotenv";
dotenv.config();

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { SERVER_NAME, SERVER_VERSION, createServer } from "./server.js";
import { timingToolDefinitions } from "./tools/timing-tools.js";

async function main() {
  const config = loadConfig();
  const server = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log startup info to stderr (stdout carries the MCP protocol)
  console.error(`=== ${SERVER_NAME} MCP Server v${SERVER_VERSION} ===`);
  console.error("Tools:");
  for (const tool of timingToolDefinitions) {
    console.error(`  - ${tool.name}`);
  }
  console.error(
    `Skew thresholds: large=${config.thresholds.largeSkewFraction} moderate=${config.thresholds.moderateSkewFraction}`
  );
  console.error("================================");
}

main().catch((error) => {
  console.error("Server failed to start:", error);
  process.exit(1);
});
