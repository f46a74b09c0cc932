/**
 * Repository commands - register, unregister and list repositories
 */

import type { Command } from "commander";
import pc from "picocolors";
import { Effect } from "effect";
import { RepositoryRegistry } from "../../services/registry.js";
import type { ContractType } from "../../types.js";
import { configFor, printJson, runCli } from "../runtime.js";

function parseContractType(value: string | undefined): ContractType | undefined {
  if (value === undefined || value === "auto") return undefined;
  if (value === "openapi" || value === "models") return value;
  throw new Error(`Unknown contract type '${value}' (expected openapi, models or auto)`);
}

export function registerCommand(program: Command): void {
  program
    .command("register <name> <path>")
    .description("Register a repository under a unique name")
    .option("-t, --type <type>", "Contract source: openapi, models or auto", "auto")
    .option("--json", "Output as JSON")
    .action(async (name: string, repoPath: string, options: { type?: string; json?: boolean }) => {
      const contractType = parseContractType(options.type);
      const repo = await runCli(
        configFor(program),
        Effect.flatMap(RepositoryRegistry, (registry) =>
          registry.register(name, repoPath, contractType),
        ),
      );

      if (options.json) {
        printJson(repo);
        return;
      }
      console.log(pc.green(`Registered ${pc.bold(repo.name)} at ${repo.path}`));
    });
}

export function unregisterCommand(program: Command): void {
  program
    .command("unregister <name>")
    .description("Remove a repository with its version history and consumer edges")
    .action(async (name: string) => {
      await runCli(
        configFor(program),
        Effect.flatMap(RepositoryRegistry, (registry) => registry.unregister(name)),
      );
      console.log(pc.green(`Unregistered ${pc.bold(name)}`));
    });
}

export function reposCommand(program: Command): void {
  program
    .command("repos")
    .description("List registered repositories")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      const repos = await runCli(
        configFor(program),
        Effect.flatMap(RepositoryRegistry, (registry) => registry.list()),
      );

      if (options.json) {
        printJson(repos);
        return;
      }
      if (repos.length === 0) {
        console.log(pc.yellow("No repositories registered."));
        return;
      }
      for (const repo of repos) {
        const type = repo.contractType ? pc.blue(` [${repo.contractType}]`) : "";
        console.log(`${pc.bold(repo.name)}${type} ${pc.gray(repo.path)}`);
      }
    });
}
