/**
 * MCP server wiring for the timing triage tools
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import { ReportInputError } from "./files/report-files.js";
import {
  isTimingToolName,
  timingToolDefinitions,
  timingToolHandlers,
} from "./tools/timing-tools.js";

export const SERVER_NAME = "sta-triage";
export const SERVER_VERSION = "1.0.0";

function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Build a server exposing the timing tools (transport not connected)
 */
export function createServer(config: AppConfig): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: timingToolDefinitions,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    if (!isTimingToolName(name)) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool not found: ${name}`);
    }

    try {
      const result = await timingToolHandlers[name](args ?? {}, config);
      const text = typeof result === "string" ? result : JSON.stringify(result, null, 2);
      return {
        content: [{ type: "text", text }],
      };
    } catch (error) {
      if (error instanceof McpError) throw error;
      if (error instanceof z.ZodError) {
        throw new McpError(
          ErrorCode.InvalidParams,
          `Invalid arguments for tool '${name}': ${describeZodError(error)}`
        );
      }
      if (error instanceof ReportInputError) {
        throw new McpError(ErrorCode.InvalidParams, error.message);
      }
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`[${name}] failed:`, error);
      throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage}`);
    }
  });

  return server;
}
