/**
 * SQLite Storage layer on better-sqlite3.
 *
 * Version appends run in an IMMEDIATE transaction that re-reads the latest
 * hash, so concurrent writers from other processes surface as
 * VersionConflictError instead of lost updates.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";
import { Effect, Layer } from "effect";
import { SCHEMA_VERSION, SqliteSchema } from "../constants.js";
import { StorageError, VersionConflictError } from "../errors.js";
import type { Contract } from "../graph/contract.js";
import type { ConsumerEdge } from "../graph/consumer-edge.js";
import type { SavedReport } from "../query/impact-analyzer.js";
import { EndpointListSchema, ImpactReportSchema } from "../schema/schemas.js";
import type { AuditOperation, AuditRecord, ContractType, RepoInfo } from "../types.js";
import type { EdgeFilter, NewVersion, Storage } from "./storage.js";
import { StorageTag } from "./storage.js";

/**
 * Internal row type for repos table
 */
interface RepoRow {
  name: string;
  path: string;
  contract_type: string | null;
  registered_at: string;
}

/**
 * Internal row type for contract_versions table
 */
interface VersionRow {
  repo: string;
  seq: number;
  hash: string;
  endpoints: string;
  captured_at: string;
}

interface EdgeRow {
  consumer: string;
  producer: string;
  method: string;
  path: string;
  registered_at: string;
}

interface ReportRow {
  id: string;
  repo: string;
  version_hash: string;
  created_at: string;
  report: string;
}

interface AuditRow {
  operation: string;
  repo: string;
  timestamp: string;
  detail: string;
}

const AUDIT_OPERATIONS: ReadonlySet<string> = new Set<AuditOperation>([
  "put",
  "addEdge",
  "removeEdge",
  "tool",
]);

function isAuditOperation(value: string): value is AuditOperation {
  return AUDIT_OPERATIONS.has(value);
}

function isContractType(value: string | null): value is ContractType {
  return value === "openapi" || value === "models";
}

function toRepo(row: RepoRow): RepoInfo {
  return {
    name: row.name,
    path: row.path,
    ...(isContractType(row.contract_type) && { contractType: row.contract_type }),
    registeredAt: row.registered_at,
  };
}

function toEdge(row: EdgeRow): ConsumerEdge {
  return {
    consumer: row.consumer,
    producer: row.producer,
    method: row.method,
    path: row.path,
    registeredAt: row.registered_at,
  };
}

/**
 * Thrown inside the append transaction to roll it back
 */
class AppendConflict extends Error {
  constructor(readonly actual: string | undefined) {
    super("latest version changed");
  }
}

/**
 * Open (creating if needed) a database file and apply the schema
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(SqliteSchema);
  db.prepare("INSERT OR IGNORE INTO meta (key, value) VALUES ('schema_version', ?)").run(
    String(SCHEMA_VERSION),
  );
  return db;
}

export function makeSqliteStorage(db: Database.Database): Storage {
  const attempt = <A>(message: string, run: () => A) =>
    Effect.try({
      try: run,
      catch: (error) => new StorageError({ message, cause: error }),
    });

  const toVersion = (row: VersionRow) =>
    Effect.try({
      try: (): Contract => ({
        repo: row.repo,
        contentHash: row.hash,
        capturedAt: row.captured_at,
        sequence: row.seq,
        endpoints: EndpointListSchema.parse(JSON.parse(row.endpoints)),
      }),
      catch: (error) =>
        new StorageError({
          message: `Corrupt contract version ${row.repo}#${row.seq}`,
          cause: error,
        }),
    });

  const toReport = (row: ReportRow) =>
    Effect.try({
      try: (): SavedReport => ({
        id: row.id,
        repo: row.repo,
        versionHash: row.version_hash,
        createdAt: row.created_at,
        report: ImpactReportSchema.parse(JSON.parse(row.report)),
      }),
      catch: (error) => new StorageError({ message: `Corrupt impact report ${row.id}`, cause: error }),
    });

  const statements = {
    upsertRepo: db.prepare<[string, string, string | null, string]>(
      `INSERT INTO repos (name, path, contract_type, registered_at) VALUES (?, ?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET path = excluded.path, contract_type = excluded.contract_type`,
    ),
    deleteRepo: db.prepare<[string]>("DELETE FROM repos WHERE name = ?"),
    deleteRepoEdges: db.prepare<[string, string]>(
      "DELETE FROM consumers WHERE consumer = ? OR producer = ?",
    ),
    getRepo: db.prepare<[string], RepoRow>("SELECT * FROM repos WHERE name = ?"),
    listRepos: db.prepare<[], RepoRow>("SELECT * FROM repos ORDER BY name"),
    listVersions: db.prepare<[string], VersionRow>(
      "SELECT * FROM contract_versions WHERE repo = ? ORDER BY seq",
    ),
    latestVersion: db.prepare<[string], VersionRow>(
      "SELECT * FROM contract_versions WHERE repo = ? ORDER BY seq DESC LIMIT 1",
    ),
    insertVersion: db.prepare<[string, number, string, string, string]>(
      "INSERT INTO contract_versions (repo, seq, hash, endpoints, captured_at) VALUES (?, ?, ?, ?, ?)",
    ),
    insertEdge: db.prepare<[string, string, string, string, string]>(
      "INSERT OR IGNORE INTO consumers (consumer, producer, method, path, registered_at) VALUES (?, ?, ?, ?, ?)",
    ),
    deleteEdge: db.prepare<[string, string, string, string]>(
      "DELETE FROM consumers WHERE consumer = ? AND producer = ? AND method = ? AND path = ?",
    ),
    insertReport: db.prepare<[string, string, string, string, string]>(
      "INSERT INTO impact_reports (id, repo, version_hash, created_at, report) VALUES (?, ?, ?, ?, ?)",
    ),
    insertAudit: db.prepare<[string, string, string, string]>(
      "INSERT INTO audit_log (operation, repo, timestamp, detail) VALUES (?, ?, ?, ?)",
    ),
  };

  const append = db
    .transaction((version: NewVersion, expectedLatest: string | undefined): Contract => {
      const latest = statements.latestVersion.get(version.repo);
      if (latest?.hash !== expectedLatest) {
        throw new AppendConflict(latest?.hash);
      }
      const sequence = (latest?.seq ?? 0) + 1;
      statements.insertVersion.run(
        version.repo,
        sequence,
        version.contentHash,
        JSON.stringify(version.endpoints),
        version.capturedAt,
      );
      return { ...version, sequence };
    })
    .immediate;

  return {
    upsertRepo: (repo) =>
      attempt(`Failed to save repository: ${repo.name}`, () => {
        statements.upsertRepo.run(repo.name, repo.path, repo.contractType ?? null, repo.registeredAt);
      }),

    deleteRepo: (name) =>
      attempt(`Failed to delete repository: ${name}`, () =>
        db.transaction(() => {
          statements.deleteRepoEdges.run(name, name);
          return statements.deleteRepo.run(name).changes > 0;
        })(),
      ),

    getRepo: (name) =>
      attempt(`Failed to get repository: ${name}`, () => {
        const row = statements.getRepo.get(name);
        return row ? toRepo(row) : undefined;
      }),

    listRepos: () =>
      attempt("Failed to list repositories", () => statements.listRepos.all().map(toRepo)),

    listVersions: (repo) =>
      attempt(`Failed to list versions: ${repo}`, () => statements.listVersions.all(repo)).pipe(
        Effect.flatMap((rows) => Effect.forEach(rows, toVersion)),
      ),

    latestVersion: (repo) =>
      attempt(`Failed to read latest version: ${repo}`, () => statements.latestVersion.get(repo)).pipe(
        Effect.flatMap((row) => (row ? toVersion(row) : Effect.succeed(undefined))),
      ),

    appendVersion: (version, expectedLatest) =>
      Effect.try({
        try: () => append(version, expectedLatest),
        catch: (error) =>
          error instanceof AppendConflict
            ? new VersionConflictError({
                message: `Latest version of ${version.repo} changed during append`,
                repo: version.repo,
                ...(expectedLatest !== undefined && { expected: expectedLatest }),
                ...(error.actual !== undefined && { actual: error.actual }),
              })
            : new StorageError({
                message: `Failed to append version for ${version.repo}`,
                cause: error,
              }),
      }),

    insertEdge: (edge) =>
      attempt("Failed to insert consumer edge", () =>
        statements.insertEdge.run(
          edge.consumer,
          edge.producer,
          edge.method,
          edge.path,
          edge.registeredAt ?? new Date().toISOString(),
        ).changes > 0,
      ),

    deleteEdge: (edge) =>
      attempt("Failed to delete consumer edge", () =>
        statements.deleteEdge.run(edge.consumer, edge.producer, edge.method, edge.path).changes > 0,
      ),

    listEdges: (filter: EdgeFilter = {}) =>
      attempt("Failed to list consumer edges", () => {
        const clauses: string[] = [];
        const params: string[] = [];
        if (filter.consumer !== undefined) {
          clauses.push("consumer = ?");
          params.push(filter.consumer);
        }
        if (filter.producer !== undefined) {
          clauses.push("producer = ?");
          params.push(filter.producer);
        }
        if (filter.method !== undefined) {
          clauses.push("method = ?");
          params.push(filter.method.toUpperCase());
        }
        if (filter.path !== undefined) {
          clauses.push("path = ?");
          params.push(filter.path);
        }
        const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
        return db
          .prepare<string[], EdgeRow>(
            `SELECT * FROM consumers ${where} ORDER BY producer, method, path, consumer`,
          )
          .all(...params)
          .map(toEdge);
      }),

    saveReport: (report) =>
      attempt(`Failed to save impact report for ${report.repo}`, () => {
        statements.insertReport.run(
          report.id,
          report.repo,
          report.versionHash,
          report.createdAt,
          JSON.stringify(report.report),
        );
      }),

    listReports: (repo, limit) =>
      attempt(`Failed to list impact reports: ${repo}`, () =>
        limit === undefined
          ? db
              .prepare<[string], ReportRow>(
                "SELECT * FROM impact_reports WHERE repo = ? ORDER BY created_at DESC, rowid DESC",
              )
              .all(repo)
          : db
              .prepare<[string, number], ReportRow>(
                "SELECT * FROM impact_reports WHERE repo = ? ORDER BY created_at DESC, rowid DESC LIMIT ?",
              )
              .all(repo, limit),
      ).pipe(Effect.flatMap((rows) => Effect.forEach(rows, toReport))),

    appendAudit: (record) =>
      attempt("Failed to write audit record", () => {
        statements.insertAudit.run(record.operation, record.repo, record.timestamp, record.detail);
      }),

    queryAudit: (query = {}) =>
      attempt("Failed to query audit log", () => {
        const clauses: string[] = [];
        const params: Array<string | number> = [];
        if (query.repo !== undefined) {
          clauses.push("repo = ?");
          params.push(query.repo);
        }
        if (query.operation !== undefined) {
          clauses.push("operation = ?");
          params.push(query.operation);
        }
        if (query.since !== undefined) {
          clauses.push("timestamp >= ?");
          params.push(query.since);
        }
        const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
        const limit = query.limit !== undefined ? "LIMIT ?" : "";
        if (query.limit !== undefined) params.push(query.limit);
        return db
          .prepare<Array<string | number>, AuditRow>(
            `SELECT operation, repo, timestamp, detail FROM audit_log ${where} ORDER BY id DESC ${limit}`,
          )
          .all(...params)
          .flatMap((row): AuditRecord[] =>
            isAuditOperation(row.operation)
              ? [{ operation: row.operation, repo: row.repo, timestamp: row.timestamp, detail: row.detail }]
              : [],
          );
      }),
  };
}

/**
 * Storage layer backed by a SQLite file; the connection closes with the scope
 */
export const SqliteStorageLive = (dbPath: string) =>
  Layer.scoped(
    StorageTag,
    Effect.acquireRelease(
      Effect.try({
        try: () => openDatabase(dbPath),
        catch: (error) =>
          new StorageError({ message: `Failed to initialize database: ${dbPath}`, cause: error }),
      }).pipe(Effect.tap(() => Effect.logDebug(`[SqliteStorage] Database opened at ${dbPath}`))),
      (db) => Effect.sync(() => db.close()),
    ).pipe(Effect.map(makeSqliteStorage)),
  );
