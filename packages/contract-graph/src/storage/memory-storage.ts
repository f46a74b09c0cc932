/**
 * In-memory Storage layer for tests and ephemeral runs.
 * Each history is an immutable array swapped on append, so a reader sees
 * either the old or the new list.
 */

import { Effect, Layer } from "effect";
import { VersionConflictError } from "../errors.js";
import type { Contract } from "../graph/contract.js";
import { type ConsumerEdge, edgeKey } from "../graph/consumer-edge.js";
import type { SavedReport } from "../query/impact-analyzer.js";
import type { AuditRecord, RepoInfo } from "../types.js";
import { matchesEdgeFilter, type Storage, StorageTag } from "./storage.js";

export function makeMemoryStorage(): Storage {
  const repos = new Map<string, RepoInfo>();
  const versions = new Map<string, readonly Contract[]>();
  const edges = new Map<string, ConsumerEdge>();
  const audit: AuditRecord[] = [];
  let reports: SavedReport[] = [];

  return {
    upsertRepo: (repo) =>
      Effect.sync(() => {
        repos.set(repo.name, repo);
      }),

    deleteRepo: (name) =>
      Effect.sync(() => {
        const existed = repos.delete(name);
        versions.delete(name);
        reports = reports.filter((report) => report.repo !== name);
        for (const [key, edge] of edges) {
          if (edge.consumer === name || edge.producer === name) edges.delete(key);
        }
        return existed;
      }),

    getRepo: (name) => Effect.sync(() => repos.get(name)),

    listRepos: () =>
      Effect.sync(() => [...repos.values()].sort((a, b) => a.name.localeCompare(b.name))),

    listVersions: (repo) => Effect.sync(() => [...(versions.get(repo) ?? [])]),

    latestVersion: (repo) => Effect.sync(() => versions.get(repo)?.at(-1)),

    appendVersion: (version, expectedLatest) =>
      Effect.suspend(() => {
        const history = versions.get(version.repo) ?? [];
        const latest = history.at(-1);
        if (latest?.contentHash !== expectedLatest) {
          return Effect.fail(
            new VersionConflictError({
              message: `Latest version of ${version.repo} changed during append`,
              repo: version.repo,
              ...(expectedLatest !== undefined && { expected: expectedLatest }),
              ...(latest !== undefined && { actual: latest.contentHash }),
            }),
          );
        }
        const stored: Contract = { ...version, sequence: history.length + 1 };
        versions.set(version.repo, [...history, stored]);
        return Effect.succeed(stored);
      }),

    insertEdge: (edge) =>
      Effect.sync(() => {
        const key = edgeKey(edge);
        if (edges.has(key)) return false;
        edges.set(key, edge);
        return true;
      }),

    deleteEdge: (edge) => Effect.sync(() => edges.delete(edgeKey(edge))),

    listEdges: (filter) =>
      Effect.sync(() =>
        [...edges.values()]
          .filter((edge) => matchesEdgeFilter(edge, filter))
          .sort(
            (a, b) =>
              a.producer.localeCompare(b.producer) ||
              a.method.localeCompare(b.method) ||
              a.path.localeCompare(b.path) ||
              a.consumer.localeCompare(b.consumer),
          ),
      ),

    saveReport: (report) =>
      Effect.sync(() => {
        reports = [...reports, report];
      }),

    listReports: (repo, limit) =>
      Effect.sync(() => {
        const matching = reports.filter((report) => report.repo === repo).reverse();
        return limit === undefined ? matching : matching.slice(0, limit);
      }),

    appendAudit: (record) =>
      Effect.sync(() => {
        audit.push(record);
      }),

    queryAudit: (query = {}) =>
      Effect.sync(() => {
        const matching = audit
          .filter(
            (record) =>
              (query.repo === undefined || record.repo === query.repo) &&
              (query.operation === undefined || record.operation === query.operation) &&
              (query.since === undefined || record.timestamp >= query.since),
          )
          .reverse();
        return query.limit === undefined ? matching : matching.slice(0, query.limit);
      }),
  };
}

export const MemoryStorageLive = Layer.sync(StorageTag, makeMemoryStorage);
