/**
 * Binds the tool registry to an MCP server.
 *
 * Every registered tool is listed with its zod shape as the input schema.
 * Calls bypass the SDK's own argument check: the CallTool handler hands the
 * raw arguments to ToolRegistry.dispatch, so unknown names, invalid arguments
 * and upstream failures all come back as the same JSON error and are all
 * written to the invocation log.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { ServiceError, ToolExecutionError } from "./errors.js";
import type { ToolRegistry } from "./registry/ToolRegistry.js";

export const SERVER_NAME = "fmp-mcp-server";
export const SERVER_VERSION = "1.0.0";

export const SERVER_INSTRUCTIONS = `Financial Modeling Prep market data.
Tools return JSON from the FMP API: quotes and price history, company profiles,
financial statements, options chains, analyst ratings and price targets,
corporate calendars, crypto data and reference lists. Failures are returned as
JSON with an error code (INVALID_ARGUMENT, UPSTREAM_ERROR, TRANSPORT_ERROR, ...).`;

export type ToolResponse = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

export function toToolResponse(result: unknown): ToolResponse {
  const text = typeof result === "string" ? result : JSON.stringify(result ?? null);
  return { content: [{ type: "text", text }] };
}

export function toErrorResponse(toolName: string, error: unknown): ToolResponse {
  const failure = error instanceof ServiceError ? error : new ToolExecutionError(toolName, error);
  return {
    content: [{ type: "text", text: JSON.stringify({ error: failure.toJSON() }) }],
    isError: true,
  };
}

export function createServer(registry: ToolRegistry): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: SERVER_INSTRUCTIONS }
  );

  const callTool = async (name: string, args: unknown, signal: AbortSignal): Promise<ToolResponse> => {
    try {
      return toToolResponse(await registry.dispatch(name, args, { signal }));
    } catch (e) {
      return toErrorResponse(name, e);
    }
  };

  for (const tool of registry.list()) {
    server.tool(tool.name, tool.description, tool.parameters, (args, extra) =>
      callTool(tool.name, args, extra.signal)
    );
  }

  // Replaces the handler McpServer installed with the first tool above.
  if (registry.size > 0) {
    server.server.setRequestHandler(CallToolRequestSchema, (request, extra) =>
      callTool(request.params.name, request.params.arguments, extra.signal)
    );
  }

  return server;
}
