import { describe, it } from "@effect/vitest";
import type Database from "better-sqlite3";
import { Effect } from "effect";
import { afterEach, beforeEach, expect } from "vitest";
import { createEdge } from "../../src/graph/consumer-edge.js";
import type { ImpactReport, SavedReport } from "../../src/query/impact-analyzer.js";
import { objectNode, primitive } from "../../src/schema/schema-node.js";
import { makeSqliteStorage, openDatabase } from "../../src/storage/sqlite-storage.js";
import type { NewVersion, Storage } from "../../src/storage/storage.js";
import type { ChangeRecord } from "../../src/validators/breaking-changes.js";

const version = (contentHash: string): NewVersion => ({
  repo: "billing",
  contentHash,
  capturedAt: "2026-03-01T12:00:00.000Z",
  endpoints: [
    {
      method: "GET",
      path: "/invoices/{id}",
      summary: "Fetch one invoice",
      responses: { "2xx": objectNode({ total: primitive("number", { nullable: true }) }, ["total"]) },
    },
  ],
});

const removal: ChangeRecord = {
  endpoint: { method: "GET", path: "/invoices/{id}" },
  fieldPath: "",
  changeKind: "removed",
  rule: "endpoint-removed",
  severity: "breaking",
  direction: "endpoint",
  description: "Endpoint GET /invoices/{id} removed",
};

const impact: ImpactReport = {
  producer: "billing",
  changes: [{ record: removal, affectedConsumers: ["storefront"], actionable: true }],
  byConsumer: { storefront: [removal] },
  consumerCount: 1,
  severities: { breaking: 1, warning: 0, info: 0 },
  hasBreaking: true,
};

const saved = (id: string, createdAt: string): SavedReport => ({
  id,
  repo: "billing",
  versionHash: "aaaa",
  createdAt,
  report: impact,
});

describe("SqliteStorage", () => {
  let db: Database.Database;
  let storage: Storage;

  beforeEach(() => {
    db = openDatabase(":memory:");
    storage = makeSqliteStorage(db);
    Effect.runSync(
      storage.upsertRepo({
        name: "billing",
        path: "/srv/billing",
        contractType: "openapi",
        registeredAt: "2026-03-01T00:00:00.000Z",
      }),
    );
  });

  afterEach(() => {
    db.close();
  });

  it.effect("round-trips repositories", () =>
    Effect.gen(function* () {
      yield* storage.upsertRepo({ name: "admin", path: "/srv/admin", registeredAt: "2026-03-02T00:00:00.000Z" });
      expect(yield* storage.getRepo("billing")).toEqual({
        name: "billing",
        path: "/srv/billing",
        contractType: "openapi",
        registeredAt: "2026-03-01T00:00:00.000Z",
      });
      expect((yield* storage.listRepos()).map((repo) => repo.name)).toEqual(["admin", "billing"]);
      expect(yield* storage.getRepo("ghost")).toBeUndefined();
    }),
  );

  it.effect("appends versions with increasing sequence numbers", () =>
    Effect.gen(function* () {
      const first = yield* storage.appendVersion(version("aaaa"), undefined);
      const second = yield* storage.appendVersion(version("bbbb"), "aaaa");

      expect(first.sequence).toBe(1);
      expect(second.sequence).toBe(2);
      const latest = yield* storage.latestVersion("billing");
      expect(latest).toEqual({ ...version("bbbb"), sequence: 2 });
      expect((yield* storage.listVersions("billing")).map((v) => v.contentHash)).toEqual(["aaaa", "bbbb"]);
    }),
  );

  it.effect("rejects an append whose expected latest is stale", () =>
    Effect.gen(function* () {
      yield* storage.appendVersion(version("aaaa"), undefined);
      const error = yield* Effect.flip(storage.appendVersion(version("cccc"), undefined));

      expect(error._tag).toBe("VersionConflictError");
      expect(error._tag === "VersionConflictError" && error.actual).toBe("aaaa");
      expect(yield* storage.listVersions("billing")).toHaveLength(1);
    }),
  );

  it.effect("filters and orders edges", () =>
    Effect.gen(function* () {
      expect(yield* storage.insertEdge(createEdge("storefront", "billing", "GET", "/invoices/{id}", "t1"))).toBe(true);
      expect(yield* storage.insertEdge(createEdge("storefront", "billing", "GET", "/invoices/{id}", "t2"))).toBe(false);
      yield* storage.insertEdge(createEdge("admin", "billing", "GET", "/invoices/{id}", "t3"));
      yield* storage.insertEdge(createEdge("admin", "ledger", "POST", "/entries", "t4"));

      const billing = yield* storage.listEdges({ producer: "billing", method: "get" });
      expect(billing.map((edge) => edge.consumer)).toEqual(["admin", "storefront"]);
      expect(billing[1].registeredAt).toBe("t1");
      expect(yield* storage.deleteEdge(createEdge("admin", "ledger", "POST", "/entries"))).toBe(true);
      expect(yield* storage.listEdges({ consumer: "admin" })).toHaveLength(1);
    }),
  );

  it.effect("removes history and edges with the repository", () =>
    Effect.gen(function* () {
      yield* storage.appendVersion(version("aaaa"), undefined);
      yield* storage.insertEdge(createEdge("storefront", "billing", "GET", "/invoices/{id}", "t1"));

      expect(yield* storage.deleteRepo("billing")).toBe(true);
      expect(yield* storage.listVersions("billing")).toEqual([]);
      expect(yield* storage.listEdges()).toEqual([]);
      expect(yield* storage.deleteRepo("billing")).toBe(false);
    }),
  );

  it.effect("returns audit records newest first", () =>
    Effect.gen(function* () {
      yield* storage.appendAudit({ operation: "put", repo: "billing", timestamp: "t1", detail: "aaaa" });
      yield* storage.appendAudit({ operation: "tool", repo: "*", timestamp: "t2", detail: "faultline_graph {}" });
      yield* storage.appendAudit({ operation: "put", repo: "billing", timestamp: "t3", detail: "bbbb" });

      const puts = yield* storage.queryAudit({ operation: "put" });
      expect(puts.map((record) => record.detail)).toEqual(["bbbb", "aaaa"]);
      const latest = yield* storage.queryAudit({ limit: 1 });
      expect(latest).toEqual([{ operation: "put", repo: "billing", timestamp: "t3", detail: "bbbb" }]);
    }),
  );

  it.effect("keeps audit records at or after a point in time", () =>
    Effect.gen(function* () {
      yield* storage.appendAudit({ operation: "put", repo: "billing", timestamp: "2026-03-01T10:00:00.000Z", detail: "aaaa" });
      yield* storage.appendAudit({ operation: "put", repo: "billing", timestamp: "2026-03-01T11:00:00.000Z", detail: "bbbb" });
      yield* storage.appendAudit({ operation: "put", repo: "billing", timestamp: "2026-03-01T12:00:00.000Z", detail: "cccc" });

      const recent = yield* storage.queryAudit({ since: "2026-03-01T11:00:00.000Z" });
      expect(recent.map((record) => record.detail)).toEqual(["cccc", "bbbb"]);
    }),
  );

  it.effect("lists saved impact reports newest first", () =>
    Effect.gen(function* () {
      yield* storage.saveReport(saved("r1", "2026-03-01T10:00:00.000Z"));
      yield* storage.saveReport(saved("r2", "2026-03-01T12:00:00.000Z"));
      yield* storage.saveReport(saved("r3", "2026-03-01T11:00:00.000Z"));

      expect((yield* storage.listReports("billing")).map((report) => report.id)).toEqual(["r2", "r3", "r1"]);
      expect(yield* storage.listReports("billing", 1)).toEqual([saved("r2", "2026-03-01T12:00:00.000Z")]);
      expect(yield* storage.listReports("ledger")).toEqual([]);
    }),
  );

  it.effect("drops saved reports with their repository", () =>
    Effect.gen(function* () {
      yield* storage.saveReport(saved("r1", "2026-03-01T10:00:00.000Z"));
      yield* storage.deleteRepo("billing");
      expect(yield* storage.listReports("billing")).toEqual([]);
    }),
  );
});
