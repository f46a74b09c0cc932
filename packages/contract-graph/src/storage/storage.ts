/**
 * Storage seam - persistence for repositories, contract versions, consumer
 * edges, impact reports and the audit trail. Implemented in memory and on
 * SQLite.
 */

import { Context, type Effect } from "effect";
import type { StorageError, VersionConflictError } from "../errors.js";
import type { Contract } from "../graph/contract.js";
import type { ConsumerEdge } from "../graph/consumer-edge.js";
import type { SavedReport } from "../query/impact-analyzer.js";
import type { AuditQuery, AuditRecord, RepoInfo } from "../types.js";

/**
 * A version about to be appended; storage assigns the sequence number
 */
export type NewVersion = Omit<Contract, "sequence">;

export interface EdgeFilter {
  consumer?: string;
  producer?: string;
  method?: string;
  path?: string;
}

export interface Storage {
  readonly upsertRepo: (repo: RepoInfo) => Effect.Effect<void, StorageError>;
  /** Removes the repository, its history, its reports and every edge naming it */
  readonly deleteRepo: (name: string) => Effect.Effect<boolean, StorageError>;
  readonly getRepo: (name: string) => Effect.Effect<RepoInfo | undefined, StorageError>;
  readonly listRepos: () => Effect.Effect<RepoInfo[], StorageError>;

  /** Ordered version history, most recent last */
  readonly listVersions: (repo: string) => Effect.Effect<Contract[], StorageError>;
  readonly latestVersion: (repo: string) => Effect.Effect<Contract | undefined, StorageError>;
  /**
   * Compare-and-append: fails with VersionConflictError when the latest
   * stored hash is not `expectedLatest` (undefined for an empty history)
   */
  readonly appendVersion: (
    version: NewVersion,
    expectedLatest: string | undefined,
  ) => Effect.Effect<Contract, VersionConflictError | StorageError>;

  /** Returns false when the edge already exists */
  readonly insertEdge: (edge: ConsumerEdge) => Effect.Effect<boolean, StorageError>;
  /** Returns false when the edge did not exist */
  readonly deleteEdge: (edge: ConsumerEdge) => Effect.Effect<boolean, StorageError>;
  readonly listEdges: (filter?: EdgeFilter) => Effect.Effect<ConsumerEdge[], StorageError>;

  readonly saveReport: (report: SavedReport) => Effect.Effect<void, StorageError>;
  /** Newest first */
  readonly listReports: (repo: string, limit?: number) => Effect.Effect<SavedReport[], StorageError>;

  readonly appendAudit: (record: AuditRecord) => Effect.Effect<void, StorageError>;
  /** Newest first */
  readonly queryAudit: (query?: AuditQuery) => Effect.Effect<AuditRecord[], StorageError>;
}

export class StorageTag extends Context.Tag("Storage")<StorageTag, Storage>() {}

export function matchesEdgeFilter(edge: ConsumerEdge, filter: EdgeFilter = {}): boolean {
  return (
    (filter.consumer === undefined || edge.consumer === filter.consumer) &&
    (filter.producer === undefined || edge.producer === filter.producer) &&
    (filter.method === undefined || edge.method === filter.method.toUpperCase()) &&
    (filter.path === undefined || edge.path === filter.path)
  );
}
