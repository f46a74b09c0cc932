/**
 * Serve command - run the MCP server on stdio
 */

import type { Command } from "commander";
import { startServer } from "../../mcp/server.js";
import { configFor } from "../runtime.js";

export function serveCommand(program: Command): void {
  program
    .command("serve")
    .description("Serve the contract tools to an MCP client over stdio")
    .action(async () => {
      await startServer(configFor(program));
    });
}
