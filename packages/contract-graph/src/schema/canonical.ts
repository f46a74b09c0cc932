/**
 * Canonical serialization and content hashing of endpoint sets.
 *
 * Two logically equal contracts (same endpoints, same shapes) canonicalize to
 * the same byte form whatever the input ordering of endpoints, properties,
 * required names, union branches or enum values.
 */

import { createHash } from "node:crypto";
import {
  compareIdentity,
  type Endpoint,
} from "../graph/contract.js";
import type { EnumValue, SchemaNode } from "./schema-node.js";

/**
 * JSON.stringify with object keys sorted at every level
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const child: unknown = Reflect.get(value, key);
      if (child !== undefined) {
        sorted[key] = sortKeys(child);
      }
    }
    return sorted;
  }
  return value;
}

function compareEnumValues(a: EnumValue, b: EnumValue): number {
  const left = JSON.stringify(a);
  const right = JSON.stringify(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function dedupe<T>(values: readonly T[], key: (value: T) => string): T[] {
  const seen = new Map<string, T>();
  for (const value of values) {
    const k = key(value);
    if (!seen.has(k)) seen.set(k, value);
  }
  return [...seen.values()];
}

export function canonicalizeNode(node: SchemaNode): SchemaNode {
  switch (node.kind) {
    case "primitive": {
      if (node.enum === undefined) return node;
      const values = dedupe(node.enum, (v) => JSON.stringify(v)).sort(compareEnumValues);
      return { ...node, enum: values };
    }
    case "object": {
      const properties: Record<string, SchemaNode> = {};
      for (const name of Object.keys(node.properties).sort()) {
        properties[name] = canonicalizeNode(node.properties[name]);
      }
      const required = [...new Set(node.required)].sort();
      return { ...node, properties, required };
    }
    case "array":
      return { ...node, items: canonicalizeNode(node.items) };
    case "union": {
      const branches = dedupe(node.branches.map(canonicalizeNode), canonicalJson).sort(
        (a, b) => {
          const left = canonicalJson(a);
          const right = canonicalJson(b);
          return left < right ? -1 : left > right ? 1 : 0;
        },
      );
      return { ...node, branches };
    }
    case "cycle":
      return node;
  }
}

export function canonicalizeEndpoint(endpoint: Endpoint): Endpoint {
  const responses: Record<string, SchemaNode> = {};
  for (const key of Object.keys(endpoint.responses).sort()) {
    responses[key] = canonicalizeNode(endpoint.responses[key]);
  }
  return {
    method: endpoint.method,
    path: endpoint.path,
    ...(endpoint.summary !== undefined && { summary: endpoint.summary }),
    ...(endpoint.request !== undefined && { request: canonicalizeNode(endpoint.request) }),
    responses,
  };
}

/**
 * Canonicalize an endpoint set: each endpoint canonical, sorted by identity
 */
export function canonicalizeEndpoints(endpoints: readonly Endpoint[]): Endpoint[] {
  return endpoints.map(canonicalizeEndpoint).sort(compareIdentity);
}

/**
 * SHA-256 (hex) over the canonical serialization of an endpoint set
 */
export function hashEndpoints(endpoints: readonly Endpoint[]): string {
  return createHash("sha256")
    .update(canonicalJson(canonicalizeEndpoints(endpoints)))
    .digest("hex");
}
