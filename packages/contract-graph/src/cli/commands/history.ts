/**
 * History and diff commands - inspect stored versions
 */

import type { Command } from "commander";
import { Effect } from "effect";
import { formatDelta, formatHistory } from "../../generators/markdown.js";
import { ContractStore } from "../../services/contract-store.js";
import { configFor, printJson, runCli } from "../runtime.js";

export function historyCommand(program: Command): void {
  program
    .command("history <name>")
    .description("List stored contract versions, oldest first")
    .option("--json", "Output as JSON")
    .action(async (name: string, options: { json?: boolean }) => {
      const versions = await runCli(
        configFor(program),
        Effect.flatMap(ContractStore, (store) => store.history(name)),
      );

      if (options.json) {
        printJson(
          versions.map(({ sequence, contentHash, capturedAt, endpoints }) => ({
            sequence,
            contentHash,
            capturedAt,
            endpointCount: endpoints.length,
          })),
        );
        return;
      }
      console.log(formatHistory(name, versions));
    });
}

export function diffCommand(program: Command): void {
  program
    .command("diff <name> [from] [to]")
    .description("Structural diff between two versions (hash, prefix, latest or previous)")
    .option("--json", "Output as JSON")
    .action(
      async (
        name: string,
        from: string | undefined,
        to: string | undefined,
        options: { json?: boolean },
      ) => {
        const delta = await runCli(
          configFor(program),
          Effect.flatMap(ContractStore, (store) =>
            store.diff(name, from ?? "previous", to ?? "latest"),
          ),
        );

        if (options.json) {
          printJson(delta);
          return;
        }
        console.log(formatDelta(delta));
      },
    );
}
