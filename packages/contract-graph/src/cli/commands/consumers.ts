/**
 * Consumer commands - maintain and inspect consumer → producer edges
 */

import type { Command } from "commander";
import pc from "picocolors";
import { Effect } from "effect";
import { describeEdge } from "../../graph/consumer-edge.js";
import { formatDependencyMap, formatEdges } from "../../generators/markdown.js";
import { ImpactGraph } from "../../services/impact-graph.js";
import { configFor, printJson, runCli } from "../runtime.js";

export function consumersCommand(program: Command): void {
  const consumers = program
    .command("consumers")
    .description("Manage the endpoints each repository consumes");

  consumers
    .command("add <consumer> <producer> <method> <path>")
    .description("Record that <consumer> calls <method> <path> on <producer>")
    .action(async (consumer: string, producer: string, method: string, path: string) => {
      const { edge, created } = await runCli(
        configFor(program),
        Effect.flatMap(ImpactGraph, (graph) => graph.addEdge({ consumer, producer, method, path })),
      );
      console.log(
        created ? pc.green(`Added ${describeEdge(edge)}`) : pc.gray(`Already registered: ${describeEdge(edge)}`),
      );
    });

  consumers
    .command("remove <consumer> <producer> <method> <path>")
    .description("Remove a consumer edge")
    .action(async (consumer: string, producer: string, method: string, path: string) => {
      const removed = await runCli(
        configFor(program),
        Effect.flatMap(ImpactGraph, (graph) => graph.removeEdge({ consumer, producer, method, path })),
      );
      console.log(removed ? pc.green("Removed") : pc.yellow("No such edge"));
    });

  consumers
    .command("list")
    .description("List consumer edges")
    .option("--producer <name>", "Only edges onto this producer")
    .option("--consumer <name>", "Only edges from this consumer")
    .option("--json", "Output as JSON")
    .action(async (options: { producer?: string; consumer?: string; json?: boolean }) => {
      const edges = await runCli(
        configFor(program),
        Effect.flatMap(ImpactGraph, (graph) =>
          graph.edges({
            ...(options.producer !== undefined && { producer: options.producer }),
            ...(options.consumer !== undefined && { consumer: options.consumer }),
          }),
        ),
      );

      if (options.json) {
        printJson(edges);
        return;
      }
      console.log(formatEdges(edges));
    });
}

export function graphCommand(program: Command): void {
  program
    .command("graph")
    .description("Show which repositories depend on which")
    .option("--dangling <producer>", "List edges onto endpoints the producer no longer declares")
    .option("--json", "Output as JSON")
    .action(async (options: { dangling?: string; json?: boolean }) => {
      const config = configFor(program);

      if (options.dangling !== undefined) {
        const producer = options.dangling;
        const edges = await runCli(
          config,
          Effect.flatMap(ImpactGraph, (graph) => graph.danglingEdges(producer)),
        );
        if (options.json) {
          printJson(edges);
          return;
        }
        console.log(formatEdges(edges));
        return;
      }

      const map = await runCli(
        config,
        Effect.flatMap(ImpactGraph, (graph) => graph.dependencyMap()),
      );
      if (options.json) {
        printJson(map);
        return;
      }
      console.log(formatDependencyMap(map));
    });
}
