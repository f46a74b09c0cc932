/**
 * In-memory directed graph of consumer → producer endpoint edges.
 * Holds exactly one hop: who calls which endpoint of which producer.
 */

import { endpointKey, type EndpointIdentity } from "./contract.js";
import { type ConsumerEdge, edgeKey } from "./consumer-edge.js";

/**
 * Per-repository view of the dependency map
 */
export interface RepoDependencies {
  /** Producers this repository calls */
  dependsOn: string[];
  /** Consumers that call this repository */
  dependedBy: string[];
}

/**
 * The Dependency Graph - stores consumer edges indexed by producer endpoint
 */
export class DependencyGraph {
  private edges: Map<string, ConsumerEdge> = new Map();
  /** producer → endpoint key → edge keys */
  private incoming: Map<string, Map<string, Set<string>>> = new Map();

  static fromEdges(edges: Iterable<ConsumerEdge>): DependencyGraph {
    const graph = new DependencyGraph();
    for (const edge of edges) {
      graph.addEdge(edge);
    }
    return graph;
  }

  /**
   * Add an edge. Returns false when an identical edge already exists.
   */
  addEdge(edge: ConsumerEdge): boolean {
    const key = edgeKey(edge);
    if (this.edges.has(key)) {
      return false;
    }
    this.edges.set(key, edge);

    const byEndpoint = this.incoming.get(edge.producer) ?? new Map<string, Set<string>>();
    const endpoint = endpointKey(edge);
    const keys = byEndpoint.get(endpoint) ?? new Set<string>();
    keys.add(key);
    byEndpoint.set(endpoint, keys);
    this.incoming.set(edge.producer, byEndpoint);
    return true;
  }

  /**
   * Consumers registered on one endpoint of a producer, sorted
   */
  consumersOf(producer: string, identity: EndpointIdentity): string[] {
    const keys = this.incoming.get(producer)?.get(endpointKey(identity)) ?? new Set<string>();
    const consumers = new Set<string>();
    for (const key of keys) {
      const edge = this.edges.get(key);
      if (edge) consumers.add(edge.consumer);
    }
    return [...consumers].sort();
  }

  /**
   * Edges pointing at a producer
   */
  edgesTo(producer: string): ConsumerEdge[] {
    const result: ConsumerEdge[] = [];
    for (const keys of this.incoming.get(producer)?.values() ?? []) {
      for (const key of keys) {
        const edge = this.edges.get(key);
        if (edge) result.push(edge);
      }
    }
    return result;
  }

  /**
   * Repository → { dependsOn, dependedBy } over every edge
   */
  dependencyMap(): Record<string, RepoDependencies> {
    const dependsOn = new Map<string, Set<string>>();
    const dependedBy = new Map<string, Set<string>>();
    const add = (index: Map<string, Set<string>>, key: string, value: string) => {
      const set = index.get(key) ?? new Set<string>();
      set.add(value);
      index.set(key, set);
    };

    for (const edge of this.edges.values()) {
      add(dependsOn, edge.consumer, edge.producer);
      add(dependedBy, edge.producer, edge.consumer);
    }

    const repos = [...new Set([...dependsOn.keys(), ...dependedBy.keys()])].sort();
    const result: Record<string, RepoDependencies> = {};
    for (const repo of repos) {
      result[repo] = {
        dependsOn: [...(dependsOn.get(repo) ?? [])].sort(),
        dependedBy: [...(dependedBy.get(repo) ?? [])].sort(),
      };
    }
    return result;
  }
}
