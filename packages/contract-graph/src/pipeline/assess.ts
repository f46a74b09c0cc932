/**
 * Assessment pipeline - raw artifacts → canonical schema → version diff →
 * classified change set → consumer impact.
 */

import { Effect } from "effect";
import type { AnalysisWarning } from "../errors.js";
import type { Contract } from "../graph/contract.js";
import type { ContractDelta } from "../diff/schema-diff.js";
import type { ImpactReport } from "../query/impact-analyzer.js";
import type { ScanOptions } from "../scanner/loader.js";
import { ContractStore, diffContracts } from "../services/contract-store.js";
import { ImpactGraph } from "../services/impact-graph.js";
import { ImpactReports } from "../services/impact-reports.js";
import { RepositoryRegistry } from "../services/registry.js";
import { Scanner } from "../services/scanner.js";
import { type ChangeRecord, classifyChanges } from "../validators/breaking-changes.js";

export interface ScanOutcome {
  repo: string;
  version: Contract;
  created: boolean;
  endpointCount: number;
  warnings: AnalysisWarning[];
}

export interface Assessment {
  repo: string;
  delta: ContractDelta;
  records: ChangeRecord[];
  impact: ImpactReport;
  /** Version stored by the assessment; absent for a dry-run check */
  version?: Contract;
  /** Id of the saved impact report; absent for a dry-run check */
  reportId?: string;
  warnings: AnalysisWarning[];
}

/**
 * Scan a repository and store the result as a new version when it changed
 */
export const scanRepository = (name: string, options: ScanOptions = {}) =>
  Effect.gen(function* () {
    const registry = yield* RepositoryRegistry;
    const scanner = yield* Scanner;
    const store = yield* ContractStore;

    const repo = yield* registry.requireRepo(name);
    const scanned = yield* scanner.scan(repo, options);
    const { version, created } = yield* store.put(name, { endpoints: scanned.endpoints });

    return {
      repo: name,
      version,
      created,
      endpointCount: version.endpoints.length,
      warnings: scanned.warnings,
    } satisfies ScanOutcome;
  });

/**
 * Scan and compare against the latest stored version without persisting
 */
export const checkBreaking = (name: string, options: ScanOptions = {}) =>
  Effect.gen(function* () {
    const registry = yield* RepositoryRegistry;
    const scanner = yield* Scanner;
    const store = yield* ContractStore;
    const graph = yield* ImpactGraph;

    const repo = yield* registry.requireRepo(name);
    const scanned = yield* scanner.scan(repo, options);
    const delta = yield* store.preview(name, scanned.endpoints);
    const records = classifyChanges(delta.endpoints);
    const impact = yield* graph.impact(name, records);

    const assessment: Assessment = { repo: name, delta, records, impact, warnings: scanned.warnings };
    return assessment;
  });

/**
 * Scan, store, diff the previous version against the new one and map the
 * classified changes onto consumers
 */
export const assessImpact = (name: string, options: ScanOptions = {}) =>
  Effect.gen(function* () {
    const registry = yield* RepositoryRegistry;
    const scanner = yield* Scanner;
    const store = yield* ContractStore;
    const graph = yield* ImpactGraph;
    const reports = yield* ImpactReports;

    const repo = yield* registry.requireRepo(name);
    const scanned = yield* scanner.scan(repo, options);
    const previous = yield* store.latest(name);
    const { version, created } = yield* store.put(name, { endpoints: scanned.endpoints });

    const delta = created
      ? yield* store.deltaOf(name, version)
      : diffContracts(name, previous, version);
    const records = classifyChanges(delta.endpoints);
    const impact = yield* graph.impact(name, records);
    const saved = yield* reports.save(impact, version.contentHash);

    yield* Effect.logInfo(
      `[Assess] ${name}: ${records.length} changes, ${impact.consumerCount} consumers affected`,
    );
    return {
      repo: name,
      delta,
      records,
      impact,
      version,
      reportId: saved.id,
      warnings: scanned.warnings,
    } satisfies Assessment;
  });
