#!/usr/bin/env node

/**
 * Faultline CLI
 * Command-line interface for contract versioning and consumer impact
 */

import { Command, CommanderError } from "commander";
import pc from "picocolors";
import { auditCommand } from "./commands/audit.js";
import { consumersCommand, graphCommand } from "./commands/consumers.js";
import { contractsCommand } from "./commands/contracts.js";
import { diffCommand, historyCommand } from "./commands/history.js";
import { breakingCommand, impactCommand, reportsCommand } from "./commands/impact.js";
import { initCommand } from "./commands/init.js";
import { registerCommand, reposCommand, unregisterCommand } from "./commands/repos.js";
import { scanCommand } from "./commands/scan.js";
import { serveCommand } from "./commands/serve.js";

const program = new Command();

program
  .name("faultline")
  .description("Track API contracts across repositories and find the consumers a change breaks")
  .version("0.1.0")
  .option("-C, --project <path>", "Project directory holding .faultline/");

// Register commands
initCommand(program);
registerCommand(program);
unregisterCommand(program);
reposCommand(program);
scanCommand(program);
historyCommand(program);
diffCommand(program);
contractsCommand(program);
breakingCommand(program);
impactCommand(program);
reportsCommand(program);
consumersCommand(program);
graphCommand(program);
auditCommand(program);
serveCommand(program);

// Global error handling
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (err) {
  if (err instanceof CommanderError) {
    // Help, version and usage errors have already been printed
    process.exit(err.exitCode);
  }
  console.error(pc.red("Error:"), err instanceof Error ? err.message : String(err));
  process.exit(1);
}
