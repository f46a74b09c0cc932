/**
 * Shared record types for the registry, store and audit trail
 */

export type ContractType = "openapi" | "models";

/**
 * A registered repository
 */
export interface RepoInfo {
  /** Unique repository name; the key every other record uses */
  name: string;
  /** Root path on disk */
  path: string;
  /** Contract source to scan; both are scanned when absent */
  contractType?: ContractType;
  /** ISO 8601 registration time */
  registeredAt: string;
}

export type AuditOperation = "put" | "addEdge" | "removeEdge" | "tool";

/**
 * One entry of the audit trail
 */
export interface AuditRecord {
  operation: AuditOperation;
  repo: string;
  /** ISO 8601 */
  timestamp: string;
  /** Resulting content hash, edge description or tool input */
  detail: string;
}

export interface AuditQuery {
  repo?: string;
  operation?: AuditOperation;
  /** ISO 8601 lower bound on the timestamp, inclusive */
  since?: string;
  limit?: number;
}
