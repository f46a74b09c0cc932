/**
 * Scan command - extract a repository's contract and store it as a version
 */

import type { Command } from "commander";
import pc from "picocolors";
import { scanOptionsOf } from "../../config.js";
import { shortHash } from "../../generators/markdown.js";
import { scanRepository } from "../../pipeline/assess.js";
import { configFor, printJson, runCli } from "../runtime.js";

export function scanCommand(program: Command): void {
  program
    .command("scan <name>")
    .description("Scan a registered repository and store its contract")
    .option("--json", "Output as JSON")
    .action(async (name: string, options: { json?: boolean }) => {
      const config = configFor(program);
      const outcome = await runCli(config, scanRepository(name, scanOptionsOf(config)));

      if (options.json) {
        printJson({
          repo: outcome.repo,
          created: outcome.created,
          sequence: outcome.version.sequence,
          contentHash: outcome.version.contentHash,
          endpointCount: outcome.endpointCount,
          warnings: outcome.warnings,
        });
        return;
      }

      const hash = shortHash(outcome.version.contentHash);
      if (outcome.created) {
        console.log(
          pc.green(
            `Stored ${pc.bold(name)} v${outcome.version.sequence} ${hash} (${outcome.endpointCount} endpoints)`,
          ),
        );
      } else {
        console.log(pc.gray(`${name} unchanged at v${outcome.version.sequence} ${hash}`));
      }
      if (outcome.warnings.length > 0) {
        console.log(pc.yellow(`${outcome.warnings.length} warning(s); see log output`));
      }
    });
}
