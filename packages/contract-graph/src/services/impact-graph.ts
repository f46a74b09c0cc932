/**
 * Impact Graph - registered consumer edges and the one-hop impact query.
 *
 * Edges belong to the consumer repository that registers them, so edge
 * writes take the consumer's repository lock.
 */

import { Effect } from "effect";
import type { EndpointIdentity } from "../graph/contract.js";
import { createEdge, describeEdge } from "../graph/consumer-edge.js";
import { DependencyGraph } from "../graph/graph.js";
import { ImpactAnalyzer } from "../query/impact-analyzer.js";
import { type EdgeFilter, StorageTag } from "../storage/storage.js";
import type { ChangeRecord } from "../validators/breaking-changes.js";
import { auditEntry, AuditSinkTag } from "./audit.js";
import { RepositoryLocks } from "./repository-locks.js";
import { RepositoryRegistry } from "./registry.js";

export interface EdgeInput {
  consumer: string;
  producer: string;
  method: string;
  path: string;
}

export class ImpactGraph extends Effect.Service<ImpactGraph>()("ImpactGraph", {
  effect: Effect.gen(function* () {
    const storage = yield* StorageTag;
    const registry = yield* RepositoryRegistry;
    const locks = yield* RepositoryLocks;
    const audit = yield* AuditSinkTag;

    const snapshot = (filter?: EdgeFilter) =>
      storage.listEdges(filter).pipe(Effect.map((edges) => DependencyGraph.fromEdges(edges)));

    /**
     * Register "consumer calls producer's endpoint". Both repositories must
     * be registered; the endpoint need not exist yet.
     */
    const addEdge = (input: EdgeInput) =>
      Effect.gen(function* () {
        yield* registry.requireRepo(input.consumer);
        yield* registry.requireRepo(input.producer);
        const edge = createEdge(
          input.consumer,
          input.producer,
          input.method,
          input.path,
          new Date().toISOString(),
        );
        const created = yield* storage.insertEdge(edge).pipe(locks.withLock(input.consumer));
        if (created) {
          yield* audit.record(auditEntry("addEdge", input.consumer, describeEdge(edge)));
          yield* Effect.logDebug(`[ImpactGraph] Added ${describeEdge(edge)}`);
        }
        return { edge, created };
      });

    /**
     * Remove an edge; false when it was not registered
     */
    const removeEdge = (input: EdgeInput) =>
      Effect.gen(function* () {
        const edge = createEdge(input.consumer, input.producer, input.method, input.path);
        const removed = yield* storage.deleteEdge(edge).pipe(locks.withLock(input.consumer));
        if (removed) {
          yield* audit.record(auditEntry("removeEdge", input.consumer, describeEdge(edge)));
          yield* Effect.logDebug(`[ImpactGraph] Removed ${describeEdge(edge)}`);
        }
        return removed;
      });

    const consumersOf = (producer: string, identity: EndpointIdentity) =>
      snapshot({ producer }).pipe(Effect.map((graph) => graph.consumersOf(producer, identity)));

    const edges = (filter?: EdgeFilter) => storage.listEdges(filter);

    /**
     * Consumers affected by a producer's classified changes
     */
    const impact = (producer: string, records: readonly ChangeRecord[]) =>
      Effect.gen(function* () {
        yield* registry.requireRepo(producer);
        const graph = yield* snapshot({ producer });
        return new ImpactAnalyzer(graph).analyze(producer, records);
      });

    /**
     * Edges naming endpoints missing from the producer's latest version
     */
    const danglingEdges = (producer: string) =>
      Effect.gen(function* () {
        yield* registry.requireRepo(producer);
        const latest = yield* storage.latestVersion(producer);
        const graph = yield* snapshot({ producer });
        return new ImpactAnalyzer(graph).danglingEdges(producer, latest?.endpoints ?? []);
      });

    const dependencyMap = () => snapshot().pipe(Effect.map((graph) => graph.dependencyMap()));

    return {
      addEdge,
      removeEdge,
      consumersOf,
      edges,
      impact,
      danglingEdges,
      dependencyMap,
    } as const;
  }),
}) {}

export const ImpactGraphLive = ImpactGraph.Default;
