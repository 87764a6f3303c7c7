#!/usr/bin/env node
/**
 * FMP MCP Server
 *
 * Exposes the Financial Modeling Prep REST API as MCP tools:
 * - tools/: tool definitions and handlers, one module per data family
 * - schemas/: shared zod parameter schemas
 * - registry/: registration, argument validation and dispatch
 * - upstream/: the HTTP client for FMP
 *
 * For STDIO: log to stderr only; stdout is used for JSON-RPC.
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { ServiceError } from "./errors.js";
import { createJsonlInvocationLogger } from "./logging/invocationLog.js";
import { ToolRegistry } from "./registry/ToolRegistry.js";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
import { allTools } from "./tools/index.js";
import { FmpClient } from "./upstream/client.js";

async function main(): Promise<void> {
  const config = loadConfig();

  const registry = new ToolRegistry({
    client: new FmpClient(config),
    logInvocation: config.invocationLogPath
      ? createJsonlInvocationLogger(config.invocationLogPath)
      : undefined,
  });
  registry.registerAll(allTools);

  const server = createServer(registry);
  const transport = new StdioServerTransport();

  const shutdown = (signal: string) => {
    console.error(`${SERVER_NAME} received ${signal}, shutting down`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await server.connect(transport);
  // STDIO: only stderr for logs
  console.error(
    `${SERVER_NAME} v${SERVER_VERSION} running on stdio (${registry.size} tools, invocation log: ${
      config.invocationLogPath ?? "off"
    })`
  );
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof ServiceError ? err.message : err);
  process.exit(1);
});
