/**
 * Audit command - read back the mutation trail
 */

import type { Command } from "commander";
import { Effect } from "effect";
import { formatAudit } from "../../generators/markdown.js";
import { StorageTag } from "../../storage/storage.js";
import type { AuditOperation } from "../../types.js";
import { configFor, parsePositiveInt, printJson, runCli } from "../runtime.js";

const OPERATIONS: readonly AuditOperation[] = ["put", "addEdge", "removeEdge", "tool"];

function parseOperation(value: string | undefined): AuditOperation | undefined {
  if (value === undefined) return undefined;
  const operation = OPERATIONS.find((op) => op === value);
  if (!operation) {
    throw new Error(`Unknown operation '${value}' (expected ${OPERATIONS.join(", ")})`);
  }
  return operation;
}

interface AuditOptions {
  repo?: string;
  operation?: string;
  since?: string;
  limit?: string;
  json?: boolean;
}

export function auditCommand(program: Command): void {
  program
    .command("audit")
    .description("Show recent audit records, newest first")
    .option("--repo <name>", "Only records for this repository")
    .option("--operation <op>", "Only records of this operation")
    .option("--since <minutes>", "Only records from the last N minutes")
    .option("-n, --limit <n>", "Maximum number of records")
    .option("--json", "Output as JSON")
    .action(async (options: AuditOptions) => {
      const config = configFor(program);
      const operation = parseOperation(options.operation);
      const limit = parsePositiveInt(options.limit, config.server.defaultQueryLimit);
      const since =
        options.since !== undefined
          ? new Date(Date.now() - parsePositiveInt(options.since, 1, "--since") * 60_000).toISOString()
          : undefined;

      const records = await runCli(
        config,
        Effect.flatMap(StorageTag, (storage) =>
          storage.queryAudit({
            ...(options.repo !== undefined && { repo: options.repo }),
            ...(operation !== undefined && { operation }),
            ...(since !== undefined && { since }),
            limit,
          }),
        ),
      );

      if (options.json) {
        printJson(records);
        return;
      }
      console.log(formatAudit(records));
    });
}
