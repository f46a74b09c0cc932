/**
 * Breaking and impact commands - classify a repository's changes and map
 * them onto registered consumers
 */

import type { Command } from "commander";
import pc from "picocolors";
import { scanOptionsOf } from "../../config.js";
import { Effect } from "effect";
import { formatImpactReport, formatReports } from "../../generators/markdown.js";
import { type Assessment, assessImpact, checkBreaking } from "../../pipeline/assess.js";
import { ImpactReports } from "../../services/impact-reports.js";
import { configFor, parsePositiveInt, printJson, runCli } from "../runtime.js";

interface AssessOptions {
  json?: boolean;
  failOnBreaking?: boolean;
}

function report(assessment: Assessment, options: AssessOptions): void {
  if (options.json) {
    printJson({
      repo: assessment.repo,
      from: assessment.delta.from,
      to: assessment.delta.to,
      changes: assessment.records,
      byConsumer: assessment.impact.byConsumer,
      severities: assessment.impact.severities,
      ...(assessment.reportId !== undefined && { reportId: assessment.reportId }),
      warnings: assessment.warnings,
    });
  } else {
    console.log(formatImpactReport(assessment.impact));
    if (assessment.reportId !== undefined) {
      console.log(pc.dim(`\nReport ${assessment.reportId.slice(0, 8)} saved`));
    }
  }

  if (options.failOnBreaking && assessment.impact.hasBreaking) {
    console.error(pc.red(`Breaking changes detected in ${assessment.repo}`));
    process.exitCode = 1;
  }
}

export function breakingCommand(program: Command): void {
  program
    .command("breaking <name>")
    .description("Compare the working tree against the latest stored version without saving")
    .option("--fail-on-breaking", "Exit with code 1 when a breaking change is found")
    .option("--json", "Output as JSON")
    .action(async (name: string, options: AssessOptions) => {
      const config = configFor(program);
      report(await runCli(config, checkBreaking(name, scanOptionsOf(config))), options);
    });
}

export function impactCommand(program: Command): void {
  program
    .command("impact <name>")
    .description("Scan and store a repository, then report which consumers its changes affect")
    .option("--fail-on-breaking", "Exit with code 1 when a breaking change is found")
    .option("--json", "Output as JSON")
    .action(async (name: string, options: AssessOptions) => {
      const config = configFor(program);
      report(await runCli(config, assessImpact(name, scanOptionsOf(config))), options);
    });
}

export function reportsCommand(program: Command): void {
  program
    .command("reports <name>")
    .description("List saved impact reports, newest first")
    .option("-n, --limit <n>", "Maximum number of reports")
    .option("--json", "Output as JSON")
    .action(async (name: string, options: { limit?: string; json?: boolean }) => {
      const config = configFor(program);
      const limit = parsePositiveInt(options.limit, config.server.defaultQueryLimit);
      const reports = await runCli(
        config,
        Effect.flatMap(ImpactReports, (service) => service.list(name, limit)),
      );

      if (options.json) {
        printJson(reports);
        return;
      }
      console.log(formatReports(name, reports));
    });
}
