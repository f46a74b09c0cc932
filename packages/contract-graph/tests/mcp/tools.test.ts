import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { Effect, ManagedRuntime } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FaultlineConfig } from "../../src/config.js";
import { createMemoryLayer, type FaultlineServices } from "../../src/layers.js";
import { createToolHandlers, type ToolHandlers, type ToolResult } from "../../src/mcp/tools.js";
import { ImpactReports } from "../../src/services/impact-reports.js";
import { StorageTag } from "../../src/storage/storage.js";

const invoiceDocument = (fields: string[]) =>
  JSON.stringify({
    openapi: "3.0.3",
    paths: {
      "/invoices/{id}": {
        get: {
          responses: {
            "200": {
              content: {
                "application/json": {
                  schema: {
                    type: "object",
                    required: fields,
                    properties: Object.fromEntries(fields.map((field) => [field, { type: "string" }])),
                  },
                },
              },
            },
          },
        },
      },
    },
  });

const parse = (result: ToolResult): unknown => JSON.parse(result.content[0].text);

describe("MCP tool handlers", () => {
  let root: string;
  let runtime: ManagedRuntime.ManagedRuntime<FaultlineServices, never>;
  let tools: ToolHandlers;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "faultline-tools-"));
    await mkdir(path.join(root, "billing"));
    await mkdir(path.join(root, "storefront"));
    await writeFile(path.join(root, "billing", "openapi.json"), invoiceDocument(["id", "total"]));

    const config: FaultlineConfig = {
      projectPath: root,
      dataDir: path.join(root, ".faultline"),
      store: { dbName: ":memory:" },
      scanner: {
        documentPatterns: ["**/openapi.json"],
        modelDirs: ["src"],
        modelMarkers: ["BaseModel"],
        ignore: ["**/node_modules/**"],
      },
      server: { defaultQueryLimit: 1 },
      logLevel: "none",
    };
    runtime = ManagedRuntime.make(createMemoryLayer());
    tools = createToolHandlers((effect) => runtime.runPromiseExit(effect), config);
  });

  afterEach(async () => {
    await runtime.dispose();
    await rm(root, { recursive: true, force: true });
  });

  const registerBoth = async () => {
    await tools.faultline_register({ name: "billing", path: path.join(root, "billing"), contractType: "openapi" });
    await tools.faultline_register({ name: "storefront", path: path.join(root, "storefront") });
  };

  it("returns failures as flagged error results", async () => {
    const result = await tools.faultline_scan({ repo: "ghost" });

    expect(result.isError).toBe(true);
    expect(parse(result)).toEqual({
      error: "UnknownRepositoryError",
      message: "Repository 'ghost' is not registered",
    });
  });

  it("scans, checks and assesses a producer change", async () => {
    await registerBoth();
    await tools.faultline_add_consumer({
      consumer: "storefront",
      producer: "billing",
      method: "GET",
      path: "/invoices/{id}",
    });

    const scan = await tools.faultline_scan({ repo: "billing" });
    expect(parse(scan)).toMatchObject({ repo: "billing", created: true, sequence: 1, endpointCount: 1, warnings: [] });

    await writeFile(path.join(root, "billing", "openapi.json"), invoiceDocument(["id"]));

    const breaking = await tools.faultline_breaking({ repo: "billing" });
    expect(parse(breaking)).toMatchObject({
      hasBreaking: true,
      severities: { breaking: 1, warning: 0, info: 0 },
    });

    const impact = await tools.faultline_impact({ repo: "billing" });
    expect(parse(impact)).toMatchObject({
      consumerCount: 1,
      byConsumer: {
        storefront: [{ rule: "field-removed", description: "Field 'total' removed from 2xx response" }],
      },
    });

    const history = await tools.faultline_history({ repo: "billing" });
    expect(parse(history)).toMatchObject([{ sequence: 2, endpointCount: 1 }]);
    const fullHistory = await tools.faultline_history({ repo: "billing", limit: 5 });
    expect(parse(fullHistory)).toHaveLength(2);
  });

  it("answers consumer and graph queries", async () => {
    await registerBoth();
    await tools.faultline_add_consumer({
      consumer: "storefront",
      producer: "billing",
      method: "get",
      path: "/invoices/{id}",
    });

    expect(parse(await tools.faultline_consumers({ producer: "billing", method: "get", path: "/invoices/{id}" }))).toEqual({
      consumers: ["storefront"],
    });
    expect(parse(await tools.faultline_consumers({ producer: "billing" }))).toMatchObject({
      edges: [{ consumer: "storefront", producer: "billing", method: "GET", path: "/invoices/{id}" }],
      total: 1,
    });
    expect(parse(await tools.faultline_graph({}))).toEqual({
      billing: { dependsOn: [], dependedBy: ["storefront"] },
      storefront: { dependsOn: ["billing"], dependedBy: [] },
    });
  });

  it("searches stored endpoints and lists saved impact reports", async () => {
    await registerBoth();
    await tools.faultline_add_consumer({
      consumer: "storefront",
      producer: "billing",
      method: "GET",
      path: "/invoices/{id}",
    });
    await tools.faultline_scan({ repo: "billing" });

    expect(parse(await tools.faultline_contracts({ query: "get INVOICES" }))).toEqual({
      endpoints: [{ repo: "billing", method: "GET", path: "/invoices/{id}" }],
      total: 1,
    });
    expect(parse(await tools.faultline_contracts({ repo: "storefront" }))).toEqual({ endpoints: [], total: 0 });

    await writeFile(path.join(root, "billing", "openapi.json"), invoiceDocument(["id"]));
    const impact = await tools.faultline_impact({ repo: "billing" });
    const [saved] = await runtime.runPromise(
      Effect.flatMap(ImpactReports, (reports) => reports.list("billing")),
    );

    expect(parse(impact)).toMatchObject({ reportId: saved.id });
    expect(parse(await tools.faultline_reports({ repo: "billing" }))).toEqual([
      {
        id: saved.id,
        versionHash: saved.versionHash,
        createdAt: saved.createdAt,
        consumerCount: 1,
        severities: { breaking: 1, warning: 0, info: 0 },
      },
    ]);
  });

  it("queries the audit trail", async () => {
    await registerBoth();
    await tools.faultline_add_consumer({
      consumer: "storefront",
      producer: "billing",
      method: "GET",
      path: "/invoices/{id}",
    });

    expect(parse(await tools.faultline_audit({ operation: "addEdge", sinceMinutes: 5 }))).toMatchObject([
      { operation: "addEdge", repo: "storefront", detail: "storefront → billing GET /invoices/{id}" },
    ]);
    expect(parse(await tools.faultline_audit({ operation: "tool", limit: 3 }))).toMatchObject([
      { repo: "*", detail: 'faultline_audit {"operation":"tool","limit":3}' },
      { repo: "*", detail: 'faultline_audit {"operation":"addEdge","sinceMinutes":5}' },
      { repo: "storefront", detail: expect.stringMatching(/^faultline_add_consumer /) },
    ]);
  });

  it("audits every call", async () => {
    await tools.faultline_graph({});
    await tools.faultline_scan({ repo: "ghost" });

    const trail = await runtime.runPromise(
      Effect.flatMap(StorageTag, (storage) => storage.queryAudit({ operation: "tool" })),
    );
    expect(trail.map((record) => [record.repo, record.detail])).toEqual([
      ["ghost", 'faultline_scan {"repo":"ghost"}'],
      ["*", "faultline_graph {}"],
    ]);
  });
});
