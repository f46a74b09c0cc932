/**
 * Markdown Generator - reports for change sets, impact, history and the
 * dependency map. Output is plain markdown so it reads the same in a
 * terminal, a pull request comment or a tool result.
 */

import type { AnalysisWarning } from "../errors.js";
import { type Contract, endpointKey } from "../graph/contract.js";
import type { ConsumerEdge } from "../graph/consumer-edge.js";
import type { RepoDependencies } from "../graph/graph.js";
import type { ContractDelta } from "../diff/schema-diff.js";
import type { ImpactReport, SavedReport } from "../query/impact-analyzer.js";
import type { EndpointMatch } from "../services/contract-store.js";
import type { AuditRecord } from "../types.js";
import type { ChangeRecord, Severity } from "../validators/breaking-changes.js";

const SEVERITY_ICONS: Record<Severity, string> = {
  breaking: "🔴",
  warning: "🟡",
  info: "🔵",
};

export function shortHash(hash: string): string {
  return hash.slice(0, 12);
}

/**
 * One line per change record
 */
export function formatChangeRecord(record: ChangeRecord): string {
  return `- ${SEVERITY_ICONS[record.severity]} **${record.severity}** \`${endpointKey(record.endpoint)}\` ${record.description} _(${record.rule})_`;
}

export function formatChangeRecords(records: readonly ChangeRecord[]): string {
  if (records.length === 0) {
    return "No changes.";
  }
  return records.map(formatChangeRecord).join("\n");
}

/**
 * Impact report grouped by consumer, followed by unconsumed changes
 */
export function formatImpactReport(report: ImpactReport): string {
  const lines: string[] = [];
  const { breaking, warning, info } = report.severities;

  lines.push(`# Impact of changes to ${report.producer}`);
  lines.push("");
  lines.push(`- **Breaking**: ${breaking}`);
  lines.push(`- **Warnings**: ${warning}`);
  lines.push(`- **Info**: ${info}`);
  lines.push(`- **Affected consumers**: ${report.consumerCount}`);
  lines.push("");

  if (report.changes.length === 0) {
    lines.push("No changes.");
    return lines.join("\n");
  }

  for (const [consumer, records] of Object.entries(report.byConsumer)) {
    lines.push(`## ${consumer}`);
    lines.push("");
    for (const record of records) {
      lines.push(formatChangeRecord(record));
    }
    lines.push("");
  }

  const unconsumed = report.changes.filter((change) => !change.actionable);
  if (unconsumed.length > 0) {
    lines.push("## No registered consumers");
    lines.push("");
    for (const change of unconsumed) {
      lines.push(formatChangeRecord(change.record));
    }
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

/**
 * Version history, oldest first
 */
export function formatHistory(repo: string, versions: readonly Contract[]): string {
  if (versions.length === 0) {
    return `No versions stored for ${repo}.`;
  }

  const lines: string[] = [];
  lines.push(`# ${repo} history`);
  lines.push("");
  lines.push("| # | Hash | Captured | Endpoints |");
  lines.push("|---|------|----------|-----------|");
  for (const version of versions) {
    lines.push(
      `| ${version.sequence} | \`${shortHash(version.contentHash)}\` | ${version.capturedAt} | ${version.endpoints.length} |`,
    );
  }
  return lines.join("\n");
}

/**
 * Structural delta, one section per endpoint
 */
export function formatDelta(delta: ContractDelta): string {
  const lines: string[] = [];
  const from = delta.from ? shortHash(delta.from) : "(empty)";
  lines.push(`# ${delta.repo}: ${from} → ${shortHash(delta.to)}`);
  lines.push("");

  if (delta.endpoints.length === 0) {
    lines.push("No structural differences.");
    return lines.join("\n");
  }

  for (const entry of delta.endpoints) {
    const key = endpointKey(entry.identity);
    if (entry.change !== "modified") {
      lines.push(`- \`${key}\` ${entry.change}`);
      continue;
    }
    lines.push(`- \`${key}\` modified`);
    for (const change of entry.changes) {
      const where =
        change.location === "response" ? `response ${change.statusClass ?? ""}`.trimEnd() : change.location;
      const field = change.fieldPath || "(body)";
      lines.push(`  - ${change.kind} ${where} \`${field}\``);
    }
  }
  return lines.join("\n");
}

/**
 * Repository dependency map
 */
export function formatDependencyMap(map: Readonly<Record<string, RepoDependencies>>): string {
  const repos = Object.keys(map).sort();
  if (repos.length === 0) {
    return "No consumer edges registered.";
  }

  const lines: string[] = [];
  lines.push("# Dependency map");
  lines.push("");
  for (const repo of repos) {
    const deps = map[repo];
    if (!deps) continue;
    lines.push(`## ${repo}`);
    lines.push(`- **Depends on**: ${deps.dependsOn.length > 0 ? deps.dependsOn.join(", ") : "-"}`);
    lines.push(`- **Depended on by**: ${deps.dependedBy.length > 0 ? deps.dependedBy.join(", ") : "-"}`);
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

export function formatEdges(edges: readonly ConsumerEdge[]): string {
  if (edges.length === 0) {
    return "No consumer edges registered.";
  }
  return edges
    .map((edge) => `- ${edge.consumer} → ${edge.producer} \`${edge.method} ${edge.path}\``)
    .join("\n");
}

export function formatWarnings(warnings: readonly AnalysisWarning[]): string {
  return warnings
    .map((warning) => `- ${warning.kind}${warning.file ? ` (${warning.file})` : ""}: ${warning.message}`)
    .join("\n");
}

export function formatAudit(records: readonly AuditRecord[]): string {
  if (records.length === 0) {
    return "No audit records.";
  }
  return records
    .map((record) => `- ${record.timestamp} ${record.operation} ${record.repo}: ${record.detail}`)
    .join("\n");
}

/**
 * Endpoint search results, one line each
 */
export function formatEndpointMatches(matches: readonly EndpointMatch[]): string {
  if (matches.length === 0) {
    return "No matching endpoints.";
  }
  return matches
    .map(({ repo, endpoint }) => {
      const summary = endpoint.summary ? ` ${endpoint.summary}` : "";
      return `- ${repo} \`${endpointKey(endpoint)}\`${summary}`;
    })
    .join("\n");
}

/**
 * Saved impact reports, newest first
 */
export function formatReports(repo: string, reports: readonly SavedReport[]): string {
  if (reports.length === 0) {
    return `No impact reports saved for ${repo}.`;
  }

  const lines: string[] = [];
  lines.push(`# ${repo} impact reports`);
  lines.push("");
  lines.push("| Report | Version | Created | Breaking | Consumers |");
  lines.push("|--------|---------|---------|----------|-----------|");
  for (const saved of reports) {
    lines.push(
      `| \`${saved.id.slice(0, 8)}\` | \`${shortHash(saved.versionHash)}\` | ${saved.createdAt} | ${saved.report.severities.breaking} | ${saved.report.consumerCount} |`,
    );
  }
  return lines.join("\n");
}
