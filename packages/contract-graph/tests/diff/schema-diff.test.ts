import { describe, expect, it } from "vitest";
import { diffEndpoint, diffEndpoints } from "../../src/diff/schema-diff.js";
import type { Endpoint } from "../../src/graph/contract.js";
import {
  arrayNode,
  objectNode,
  primitive,
  type SchemaNode,
  unionNode,
} from "../../src/schema/schema-node.js";

function responding(body: SchemaNode, extra: Partial<Endpoint> = {}): Endpoint {
  return { method: "GET", path: "/users", responses: { "2xx": body }, ...extra };
}

describe("diffEndpoint", () => {
  it("reports a removed response field", () => {
    const changes = diffEndpoint(
      responding(objectNode({ id: primitive("string"), name: primitive("string") }, ["id", "name"])),
      responding(objectNode({ id: primitive("string") }, ["id"])),
    );
    expect(changes).toEqual([
      {
        location: "response",
        statusClass: "2xx",
        fieldPath: "name",
        kind: "field-removed",
        required: true,
        before: "string",
      },
    ]);
  });

  it("tags integer to number as widening", () => {
    const changes = diffEndpoint(
      responding(objectNode({ total: primitive("integer") })),
      responding(objectNode({ total: primitive("number") })),
    );
    expect(changes).toEqual([
      {
        location: "response",
        statusClass: "2xx",
        fieldPath: "total",
        kind: "type-widened",
        before: "integer",
        after: "number",
      },
    ]);
  });

  it("treats added enum values as widening", () => {
    const [change] = diffEndpoint(
      responding(primitive("string", { enum: ["a"] })),
      responding(primitive("string", { enum: ["a", "b"] })),
    );
    expect(change).toMatchObject({
      kind: "type-widened",
      fieldPath: "",
      before: 'enum["a"]',
      after: 'enum["a", "b"]',
    });
  });

  it("addresses array items with brackets", () => {
    const changes = diffEndpoint(
      responding(objectNode({ tags: arrayNode(objectNode({ label: primitive("string") })) })),
      responding(objectNode({ tags: arrayNode(objectNode({ label: primitive("boolean") })) })),
    );
    expect(changes.map((change) => `${change.kind} ${change.fieldPath}`)).toEqual([
      "type-changed tags[].label",
    ]);
  });

  it("records optionality and nullability separately", () => {
    const changes = diffEndpoint(
      responding(objectNode({ email: primitive("string") }, ["email"])),
      responding(objectNode({ email: primitive("string", { nullable: true }) })),
    );
    expect(changes.map((change) => [change.kind, change.relaxed])).toEqual([
      ["optionality-changed", true],
      ["nullability-changed", true],
    ]);
  });

  it("compares union branches as sets", () => {
    const changes = diffEndpoint(
      responding(unionNode("oneOf", [primitive("string"), primitive("integer")])),
      responding(unionNode("oneOf", [primitive("integer"), primitive("boolean")])),
    );
    expect(changes.map((change) => change.kind)).toEqual(["branch-removed", "branch-added"]);
    expect(changes[0].before).toBe("string");
    expect(changes[1].after).toBe("boolean");
  });

  it("marks a new request body required when it has required fields", () => {
    const before: Endpoint = { method: "POST", path: "/users", responses: {} };
    const after: Endpoint = {
      ...before,
      request: objectNode({ name: primitive("string") }, ["name"]),
    };
    expect(diffEndpoint(before, after)).toEqual([
      { location: "request", fieldPath: "", kind: "body-added", required: true, after: "object" },
    ]);
  });

  it("notices summary edits", () => {
    const body = objectNode({});
    expect(
      diffEndpoint(responding(body, { summary: "List" }), responding(body, { summary: "List users" })),
    ).toEqual([
      { location: "endpoint", fieldPath: "", kind: "summary-changed", before: "List", after: "List users" },
    ]);
  });
});

describe("diffEndpoints", () => {
  it("returns added, removed and modified endpoints in identity order", () => {
    const before: Endpoint[] = [
      { method: "GET", path: "/b", responses: { "2xx": primitive("string") } },
      { method: "DELETE", path: "/a", responses: {} },
      { method: "GET", path: "/same", responses: { "2xx": objectNode({ x: primitive("string"), y: primitive("string") }) } },
    ];
    const after: Endpoint[] = [
      { method: "GET", path: "/same", responses: { "2xx": objectNode({ y: primitive("string"), x: primitive("string") }) } },
      { method: "GET", path: "/b", responses: { "2xx": primitive("integer") } },
      { method: "POST", path: "/c", responses: {} },
    ];

    expect(diffEndpoints(before, after).map((delta) => `${delta.change} ${delta.identity.method} ${delta.identity.path}`)).toEqual([
      "removed DELETE /a",
      "modified GET /b",
      "added POST /c",
    ]);
  });
});
