/**
 * Layer composition
 */

import { Layer } from "effect";
import { type AuditSinkTag, StorageAuditSinkLive } from "./services/audit.js";
import { type ContractStore, ContractStoreLive } from "./services/contract-store.js";
import { type ImpactGraph, ImpactGraphLive } from "./services/impact-graph.js";
import { type ImpactReports, ImpactReportsLive } from "./services/impact-reports.js";
import { type RepositoryRegistry, RepositoryRegistryLive } from "./services/registry.js";
import { type RepositoryLocks, RepositoryLocksLive } from "./services/repository-locks.js";
import { type Scanner, ScannerLive } from "./services/scanner.js";
import { MemoryStorageLive } from "./storage/memory-storage.js";
import type { StorageTag } from "./storage/storage.js";

export type FaultlineServices =
  | ContractStore
  | ImpactGraph
  | ImpactReports
  | RepositoryRegistry
  | RepositoryLocks
  | Scanner
  | AuditSinkTag
  | StorageTag;

/**
 * Every service over the given storage layer. The storage layer is built
 * once and shared by the registry, the store, the graph and the audit sink.
 */
export const createFaultlineLayer = <E, R>(
  storage: Layer.Layer<StorageTag, E, R>,
): Layer.Layer<FaultlineServices, E, R> => {
  const foundation = Layer.mergeAll(RepositoryLocksLive, ScannerLive).pipe(
    Layer.provideMerge(Layer.merge(RepositoryRegistryLive, StorageAuditSinkLive)),
    Layer.provideMerge(storage),
  );

  return Layer.mergeAll(ContractStoreLive, ImpactGraphLive, ImpactReportsLive).pipe(
    Layer.provideMerge(foundation),
  );
};

/**
 * Ephemeral layer over in-memory storage
 */
export const createMemoryLayer = () => createFaultlineLayer(MemoryStorageLive);
