/**
 * Consumer edges - "consumer calls this producer endpoint".
 * Edges reference endpoint identities by value; an edge may outlive the
 * endpoint it names.
 */

import { endpointKey } from "./contract.js";

export interface ConsumerEdge {
  /** Repository that calls the endpoint */
  consumer: string;
  /** Repository that serves the endpoint */
  producer: string;
  method: string;
  /** Path template, e.g. `/users/{id}` */
  path: string;
  /** ISO 8601 registration time */
  registeredAt?: string;
}

/**
 * Create an edge, normalizing the method to upper case
 */
export function createEdge(
  consumer: string,
  producer: string,
  method: string,
  path: string,
  registeredAt?: string,
): ConsumerEdge {
  return {
    consumer,
    producer,
    method: method.toUpperCase(),
    path,
    ...(registeredAt !== undefined && { registeredAt }),
  };
}

/**
 * Unique key of an edge: (consumer, producer, method, path)
 */
export function edgeKey(edge: ConsumerEdge): string {
  return [edge.consumer, edge.producer, edge.method, edge.path].join("\u0000");
}

/**
 * Human-readable description of an edge
 */
export function describeEdge(edge: ConsumerEdge): string {
  return `${edge.consumer} → ${edge.producer} ${endpointKey(edge)}`;
}
