/**
 * Impact Reports - every stored assessment keeps its impact report so a
 * past release can be reviewed without re-running the diff.
 */

import { randomUUID } from "node:crypto";
import { Effect } from "effect";
import type { ImpactReport, SavedReport } from "../query/impact-analyzer.js";
import { StorageTag } from "../storage/storage.js";
import { RepositoryRegistry } from "./registry.js";

export class ImpactReports extends Effect.Service<ImpactReports>()("ImpactReports", {
  effect: Effect.gen(function* () {
    const storage = yield* StorageTag;
    const registry = yield* RepositoryRegistry;

    const save = (report: ImpactReport, versionHash: string) =>
      Effect.gen(function* () {
        const saved: SavedReport = {
          id: randomUUID(),
          repo: report.producer,
          versionHash,
          createdAt: new Date().toISOString(),
          report,
        };
        yield* storage.saveReport(saved);
        yield* Effect.logDebug(`[ImpactReports] Saved ${saved.id} for ${saved.repo}`);
        return saved;
      });

    /**
     * Saved reports of a repository, newest first
     */
    const list = (repo: string, limit?: number) =>
      registry.requireRepo(repo).pipe(Effect.zipRight(storage.listReports(repo, limit)));

    return { save, list } as const;
  }),
}) {}

export const ImpactReportsLive = ImpactReports.Default;
