/**
 * Core contract type definitions.
 * An endpoint is identified by method + path template within one repository;
 * a contract is the full endpoint set of a repository at one point in time.
 */

import type { SchemaNode } from "../schema/schema-node.js";

export const HTTP_METHODS = [
  "GET",
  "PUT",
  "POST",
  "DELETE",
  "OPTIONS",
  "HEAD",
  "PATCH",
  "TRACE",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Pseudo-method used for source-extracted data models
 */
export const MODEL_METHOD = "SCHEMA";

/**
 * Response key used for source-extracted data models
 */
export const MODEL_RESPONSE_KEY = "model";

export interface EndpointIdentity {
  readonly method: string;
  readonly path: string;
}

export interface Endpoint extends EndpointIdentity {
  readonly summary?: string;
  /** Request body schema */
  readonly request?: SchemaNode;
  /** Response body schemas keyed by status class (`2xx`, `4xx`, `default`) */
  readonly responses: Readonly<Record<string, SchemaNode>>;
}

/**
 * An immutable, content-addressed contract version
 */
export interface Contract {
  readonly repo: string;
  /** SHA-256 of the canonical endpoint set; the version identifier */
  readonly contentHash: string;
  /** ISO 8601 capture timestamp */
  readonly capturedAt: string;
  /** 1-based position in the repository's history */
  readonly sequence: number;
  readonly endpoints: readonly Endpoint[];
}

/**
 * Stable key for an endpoint identity, e.g. `GET /users/{id}`
 */
export function endpointKey(identity: EndpointIdentity): string {
  return `${identity.method} ${identity.path}`;
}

export function compareIdentity(a: EndpointIdentity, b: EndpointIdentity): number {
  if (a.method !== b.method) return a.method < b.method ? -1 : 1;
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  return 0;
}

/**
 * Map a response code to its status class: `200` and `2XX` become `2xx`
 */
export function statusClassOf(code: string): string | undefined {
  const normalized = code.trim().toLowerCase();
  if (normalized === "default") return "default";
  const match = normalized.match(/^([1-5])(\d\d|xx)$/);
  return match ? `${match[1]}xx` : undefined;
}
