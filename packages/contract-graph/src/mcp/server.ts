/**
 * Faultline MCP Server
 *
 * Serves the contract tools over stdio. stdout belongs to the transport, so
 * everything else is logged to stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Effect } from "effect";
import type { FaultlineConfig } from "../config.js";
import { createCliRuntime } from "../cli/runtime.js";
import { createToolHandlers, registerTools } from "./tools.js";

export const SERVER_NAME = "faultline";
export const SERVER_VERSION = "0.1.0";

export function createServer(handlers: ReturnType<typeof createToolHandlers>): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerTools(server, handlers);
  return server;
}

/**
 * Start the server on stdio. Resolves once the transport closes.
 */
export async function startServer(config: FaultlineConfig): Promise<void> {
  const runtime = createCliRuntime(config);
  const handlers = createToolHandlers((effect) => runtime.runPromiseExit(effect), config);
  const server = createServer(handlers);
  const transport = new StdioServerTransport();

  const closed = new Promise<void>((resolve) => {
    server.server.onclose = () => resolve();
  });

  await server.connect(transport);
  await runtime.runPromise(Effect.logInfo(`[MCP] Serving ${config.projectPath} over stdio`));

  try {
    await closed;
  } finally {
    await runtime.dispose();
  }
}
