/**
 * Audit sink - receives one record per mutating operation.
 * The core only writes; reading the trail back is a presentation concern.
 */

import { Context, Effect, Layer } from "effect";
import type { StorageError } from "../errors.js";
import { StorageTag } from "../storage/storage.js";
import type { AuditOperation, AuditRecord } from "../types.js";

export interface AuditSink {
  readonly record: (entry: AuditRecord) => Effect.Effect<void, StorageError>;
}

export class AuditSinkTag extends Context.Tag("AuditSink")<AuditSinkTag, AuditSink>() {}

export function auditEntry(operation: AuditOperation, repo: string, detail: string): AuditRecord {
  return { operation, repo, timestamp: new Date().toISOString(), detail };
}

/**
 * Persists audit records through the Storage seam
 */
export const StorageAuditSinkLive = Layer.effect(
  AuditSinkTag,
  Effect.gen(function* () {
    const storage = yield* StorageTag;
    return {
      record: (entry) => storage.appendAudit(entry),
    } satisfies AuditSink;
  }),
);

