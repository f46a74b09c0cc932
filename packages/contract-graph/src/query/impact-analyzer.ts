/**
 * Impact Analyzer - maps a producer's classified changes onto the consumers
 * registered on the changed endpoints. One hop only: consumers of consumers
 * are not followed.
 */

import { endpointKey, type Endpoint } from "../graph/contract.js";
import type { ConsumerEdge } from "../graph/consumer-edge.js";
import type { DependencyGraph } from "../graph/graph.js";
import {
  type ChangeRecord,
  hasBreakingChanges,
  summarizeSeverities,
  type Severity,
} from "../validators/breaking-changes.js";

/**
 * One change with the consumers it reaches
 */
export interface ImpactedChange {
  record: ChangeRecord;
  affectedConsumers: string[];
  /** False when nobody consumes the endpoint */
  actionable: boolean;
}

export interface ImpactReport {
  producer: string;
  /** Every change, including those on unconsumed endpoints */
  changes: ImpactedChange[];
  /** Consumer → the changes to endpoints it consumes */
  byConsumer: Record<string, ChangeRecord[]>;
  consumerCount: number;
  severities: Record<Severity, number>;
  hasBreaking: boolean;
}

/**
 * An impact report kept for later review
 */
export interface SavedReport {
  id: string;
  repo: string;
  /** Content hash of the version the report assessed */
  versionHash: string;
  /** ISO 8601 */
  createdAt: string;
  report: ImpactReport;
}

/**
 * Impact Analyzer over a dependency graph snapshot
 */
export class ImpactAnalyzer {
  constructor(private readonly graph: DependencyGraph) {}

  /**
   * Attach affected consumers to each change of a producer
   */
  analyze(producer: string, records: readonly ChangeRecord[]): ImpactReport {
    const changes: ImpactedChange[] = [];
    const byConsumer = new Map<string, ChangeRecord[]>();

    for (const record of records) {
      const affectedConsumers = this.graph.consumersOf(producer, record.endpoint);
      changes.push({ record, affectedConsumers, actionable: affectedConsumers.length > 0 });

      for (const consumer of affectedConsumers) {
        const list = byConsumer.get(consumer) ?? [];
        list.push(record);
        byConsumer.set(consumer, list);
      }
    }

    const consumers = [...byConsumer.keys()].sort();
    return {
      producer,
      changes,
      byConsumer: Object.fromEntries(consumers.map((consumer) => [consumer, byConsumer.get(consumer) ?? []])),
      consumerCount: consumers.length,
      severities: summarizeSeverities(records),
      hasBreaking: hasBreakingChanges(records),
    };
  }

  /**
   * Edges on a producer whose endpoint is absent from the given endpoint set
   */
  danglingEdges(producer: string, endpoints: readonly Endpoint[]): ConsumerEdge[] {
    const present = new Set(endpoints.map(endpointKey));
    return this.graph
      .edgesTo(producer)
      .filter((edge) => !present.has(endpointKey(edge)))
      .sort((a, b) => endpointKey(a).localeCompare(endpointKey(b)) || a.consumer.localeCompare(b.consumer));
  }
}

/**
 * Keep only the actionable part of a report
 */
export function actionableChanges(report: ImpactReport): ImpactedChange[] {
  return report.changes.filter((change) => change.actionable);
}
