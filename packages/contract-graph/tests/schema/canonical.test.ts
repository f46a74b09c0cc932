import { describe, expect, it } from "vitest";
import type { Endpoint } from "../../src/graph/contract.js";
import {
  canonicalJson,
  canonicalizeEndpoints,
  canonicalizeNode,
  hashEndpoints,
} from "../../src/schema/canonical.js";
import { objectNode, primitive, unionNode } from "../../src/schema/schema-node.js";

describe("canonicalJson", () => {
  it("sorts keys at every level and drops undefined values", () => {
    expect(canonicalJson({ b: 1, a: { d: undefined, c: [2, 1] } })).toBe('{"a":{"c":[2,1]},"b":1}');
  });
});

describe("canonicalizeNode", () => {
  it("sorts and dedupes enum values", () => {
    expect(canonicalizeNode(primitive("string", { enum: ["b", "a", "b"] }))).toEqual(
      primitive("string", { enum: ["a", "b"] }),
    );
  });

  it("sorts required names and property keys", () => {
    const node = canonicalizeNode(
      objectNode({ zeta: primitive("string"), alpha: primitive("integer") }, ["zeta", "alpha"]),
    );
    expect(node.kind === "object" && Object.keys(node.properties)).toEqual(["alpha", "zeta"]);
    expect(node.kind === "object" && node.required).toEqual(["alpha", "zeta"]);
  });

  it("collapses duplicate union branches", () => {
    const node = canonicalizeNode(
      unionNode("oneOf", [primitive("string"), primitive("integer"), primitive("string")]),
    );
    expect(node.kind === "union" && node.branches).toEqual([primitive("integer"), primitive("string")]);
  });
});

describe("hashEndpoints", () => {
  const user = (properties: Parameters<typeof objectNode>[0], required: string[]): Endpoint => ({
    method: "GET",
    path: "/users/{id}",
    responses: { "2xx": objectNode(properties, required) },
  });
  const health: Endpoint = { method: "GET", path: "/health", responses: {} };

  it("ignores endpoint and property ordering", () => {
    const first = hashEndpoints([
      user({ id: primitive("string"), name: primitive("string") }, ["id", "name"]),
      health,
    ]);
    const second = hashEndpoints([
      health,
      user({ name: primitive("string"), id: primitive("string") }, ["name", "id"]),
    ]);
    expect(first).toBe(second);
    expect(first).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes when a field type changes", () => {
    expect(hashEndpoints([user({ id: primitive("string") }, ["id"])])).not.toBe(
      hashEndpoints([user({ id: primitive("integer") }, ["id"])]),
    );
  });

  it("orders canonical endpoints by method then path", () => {
    const sorted = canonicalizeEndpoints([
      { method: "POST", path: "/a", responses: {} },
      { method: "GET", path: "/b", responses: {} },
      { method: "GET", path: "/a", responses: {} },
    ]);
    expect(sorted.map((endpoint) => `${endpoint.method} ${endpoint.path}`)).toEqual([
      "GET /a",
      "GET /b",
      "POST /a",
    ]);
  });
});
