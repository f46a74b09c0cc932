import { describe, expect, it } from "vitest";
import type { Contract } from "../../src/graph/contract.js";
import {
  formatAudit,
  formatChangeRecord,
  formatChangeRecords,
  formatDelta,
  formatDependencyMap,
  formatEdges,
  formatEndpointMatches,
  formatHistory,
  formatImpactReport,
  formatReports,
  formatWarnings,
  shortHash,
} from "../../src/generators/markdown.js";
import type { ImpactReport } from "../../src/query/impact-analyzer.js";
import type { ChangeRecord } from "../../src/validators/breaking-changes.js";

const removedField: ChangeRecord = {
  endpoint: { method: "GET", path: "/invoices/{id}" },
  fieldPath: "total",
  changeKind: "removed",
  rule: "field-removed",
  severity: "breaking",
  direction: "response",
  statusClass: "2xx",
  description: "Field 'total' removed from 2xx response",
};

const addedEndpoint: ChangeRecord = {
  endpoint: { method: "POST", path: "/refunds" },
  fieldPath: "",
  changeKind: "added",
  rule: "endpoint-added",
  severity: "info",
  direction: "endpoint",
  description: "Endpoint POST /refunds added",
};

const HASH = "0123456789abcdef0123456789abcdef";

describe("markdown reports", () => {
  it("formats one change record per line", () => {
    expect(formatChangeRecord(removedField)).toBe(
      "- 🔴 **breaking** `GET /invoices/{id}` Field 'total' removed from 2xx response _(field-removed)_",
    );
    expect(formatChangeRecords([])).toBe("No changes.");
  });

  it("groups an impact report by consumer", () => {
    const report: ImpactReport = {
      producer: "billing",
      changes: [
        { record: removedField, affectedConsumers: ["storefront"], actionable: true },
        { record: addedEndpoint, affectedConsumers: [], actionable: false },
      ],
      byConsumer: { storefront: [removedField] },
      consumerCount: 1,
      severities: { breaking: 1, warning: 0, info: 1 },
      hasBreaking: true,
    };

    expect(formatImpactReport(report)).toBe(
      [
        "# Impact of changes to billing",
        "",
        "- **Breaking**: 1",
        "- **Warnings**: 0",
        "- **Info**: 1",
        "- **Affected consumers**: 1",
        "",
        "## storefront",
        "",
        formatChangeRecord(removedField),
        "",
        "## No registered consumers",
        "",
        "- 🔵 **info** `POST /refunds` Endpoint POST /refunds added _(endpoint-added)_",
      ].join("\n"),
    );
  });

  it("tabulates version history", () => {
    const versions: Contract[] = [
      { repo: "billing", sequence: 1, contentHash: HASH, capturedAt: "2026-02-01T00:00:00.000Z", endpoints: [] },
    ];
    expect(formatHistory("billing", versions).split("\n").at(-1)).toBe(
      "| 1 | `0123456789ab` | 2026-02-01T00:00:00.000Z | 0 |",
    );
    expect(formatHistory("billing", [])).toBe("No versions stored for billing.");
    expect(shortHash(HASH)).toBe("0123456789ab");
  });

  it("lists structural changes under each endpoint", () => {
    const text = formatDelta({
      repo: "billing",
      to: HASH,
      endpoints: [
        {
          change: "modified",
          identity: { method: "GET", path: "/invoices/{id}" },
          before: { method: "GET", path: "/invoices/{id}", responses: {} },
          after: { method: "GET", path: "/invoices/{id}", responses: {} },
          changes: [{ location: "response", statusClass: "2xx", fieldPath: "total", kind: "field-removed" }],
        },
        {
          change: "added",
          identity: { method: "POST", path: "/refunds" },
          endpoint: { method: "POST", path: "/refunds", responses: {} },
        },
      ],
    });
    expect(text).toBe(
      [
        "# billing: (empty) → 0123456789ab",
        "",
        "- `GET /invoices/{id}` modified",
        "  - field-removed response 2xx `total`",
        "- `POST /refunds` added",
      ].join("\n"),
    );
  });

  it("renders the dependency map and edges", () => {
    expect(
      formatDependencyMap({
        billing: { dependsOn: [], dependedBy: ["storefront"] },
      }),
    ).toBe(["# Dependency map", "", "## billing", "- **Depends on**: -", "- **Depended on by**: storefront"].join("\n"));
    expect(formatDependencyMap({})).toBe("No consumer edges registered.");
    expect(
      formatEdges([{ consumer: "storefront", producer: "billing", method: "GET", path: "/invoices/{id}" }]),
    ).toBe("- storefront → billing `GET /invoices/{id}`");
  });

  it("renders warnings and audit records", () => {
    expect(
      formatWarnings([
        { kind: "UnparsableSourceError", file: "src/broken.ts", message: "'}' expected." },
        { kind: "DuplicateEndpoint", message: "Duplicate endpoint GET /a ignored" },
      ]),
    ).toBe(
      [
        "- UnparsableSourceError (src/broken.ts): '}' expected.",
        "- DuplicateEndpoint: Duplicate endpoint GET /a ignored",
      ].join("\n"),
    );
    expect(formatAudit([{ operation: "put", repo: "billing", timestamp: "t1", detail: HASH }])).toBe(
      `- t1 put billing: ${HASH}`,
    );
    expect(formatAudit([])).toBe("No audit records.");
  });

  it("lists endpoint search results", () => {
    expect(
      formatEndpointMatches([
        { repo: "billing", endpoint: { method: "GET", path: "/invoices/{id}", summary: "Fetch one invoice", responses: {} } },
        { repo: "ledger", endpoint: { method: "POST", path: "/entries", responses: {} } },
      ]),
    ).toBe(["- billing `GET /invoices/{id}` Fetch one invoice", "- ledger `POST /entries`"].join("\n"));
    expect(formatEndpointMatches([])).toBe("No matching endpoints.");
  });

  it("tabulates saved impact reports", () => {
    const report: ImpactReport = {
      producer: "billing",
      changes: [{ record: removedField, affectedConsumers: ["storefront"], actionable: true }],
      byConsumer: { storefront: [removedField] },
      consumerCount: 1,
      severities: { breaking: 1, warning: 0, info: 0 },
      hasBreaking: true,
    };

    expect(
      formatReports("billing", [
        {
          id: "9f8e7d6c-0000-4000-8000-000000000000",
          repo: "billing",
          versionHash: HASH,
          createdAt: "2026-02-01T00:00:00.000Z",
          report,
        },
      ]),
    ).toBe(
      [
        "# billing impact reports",
        "",
        "| Report | Version | Created | Breaking | Consumers |",
        "|--------|---------|---------|----------|-----------|",
        "| `9f8e7d6c` | `0123456789ab` | 2026-02-01T00:00:00.000Z | 1 | 1 |",
      ].join("\n"),
    );
    expect(formatReports("billing", [])).toBe("No impact reports saved for billing.");
  });
});
