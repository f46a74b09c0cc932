/**
 * Contracts command - search the endpoints of the latest stored versions
 */

import type { Command } from "commander";
import { Effect } from "effect";
import { formatEndpointMatches } from "../../generators/markdown.js";
import { ContractStore } from "../../services/contract-store.js";
import { configFor, parsePositiveInt, printJson, runCli } from "../runtime.js";

export function contractsCommand(program: Command): void {
  program
    .command("contracts [name]")
    .description("List endpoints of the latest stored contracts, optionally filtered by text")
    .option("-q, --query <text>", "Terms that must all appear in the method, path or summary")
    .option("-n, --limit <n>", "Maximum number of endpoints")
    .option("--json", "Output as JSON")
    .action(
      async (name: string | undefined, options: { query?: string; limit?: string; json?: boolean }) => {
        const config = configFor(program);
        const limit = parsePositiveInt(options.limit, config.server.defaultQueryLimit);
        const matches = await runCli(
          config,
          Effect.flatMap(ContractStore, (store) =>
            store.searchEndpoints({
              ...(name !== undefined && { repo: name }),
              ...(options.query !== undefined && { text: options.query }),
              limit,
            }),
          ),
        );

        if (options.json) {
          printJson(matches);
          return;
        }
        console.log(formatEndpointMatches(matches));
      },
    );
}
