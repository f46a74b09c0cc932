import { describe, expect, it } from "vitest";
import { MalformedContractError, UnresolvedReferenceError } from "../../src/errors.js";
import { resolveContractDocument } from "../../src/parser/schema-resolver.js";
import {
  arrayNode,
  cycleMarker,
  objectNode,
  primitive,
  type SchemaNode,
  unknownNode,
  visitSchema,
} from "../../src/schema/schema-node.js";

const json = (schema: unknown) => ({ content: { "application/json": { schema } } });

function resolve(root: unknown, externalDocuments?: ReadonlyMap<string, unknown>) {
  return resolveContractDocument(
    { uri: "openapi.yaml", root },
    externalDocuments ? { externalDocuments } : {},
  );
}

function responseOf(root: unknown, key: string, statusClass = "2xx"): SchemaNode | undefined {
  return resolve(root).endpoints.get(key)?.responses[statusClass];
}

describe("resolveContractDocument", () => {
  describe("operations", () => {
    it("collects one endpoint per method and path", () => {
      const { endpoints } = resolve({
        openapi: "3.0.3",
        paths: {
          "/orders": {
            get: { summary: "List orders", responses: {} },
            post: { responses: {} },
          },
          "x-internal": { get: { responses: {} } },
        },
      });

      expect([...endpoints.keys()]).toEqual(["GET /orders", "POST /orders"]);
      expect(endpoints.get("GET /orders")?.summary).toBe("List orders");
    });

    it("resolves a response reference into the 2xx status class", () => {
      const schema = responseOf(
        {
          openapi: "3.0.3",
          paths: {
            "/users/{id}": {
              get: {
                responses: {
                  "200": json({ $ref: "#/components/schemas/User" }),
                  "404": { description: "Not found" },
                },
              },
            },
          },
          components: {
            schemas: {
              User: {
                type: "object",
                required: ["id"],
                properties: { id: { type: "integer" }, name: { type: "string" } },
              },
            },
          },
        },
        "GET /users/{id}",
      );

      expect(schema).toEqual(
        objectNode({ id: primitive("integer"), name: primitive("string") }, ["id"]),
      );
    });

    it("prefers a specific status code over its wildcard", () => {
      const endpoint = resolve({
        openapi: "3.1.0",
        paths: {
          "/ping": {
            get: {
              responses: {
                "2XX": json({ type: "string" }),
                "201": json({ type: "integer" }),
                default: json({ type: "boolean" }),
              },
            },
          },
        },
      }).endpoints.get("GET /ping");

      expect(endpoint?.responses).toEqual({
        "2xx": primitive("integer"),
        default: primitive("boolean"),
      });
    });

    it("reads Swagger 2 body parameters and response schemas", () => {
      const endpoint = resolve({
        swagger: "2.0",
        paths: {
          "/pets": {
            post: {
              parameters: [
                { in: "query", name: "dryRun", type: "boolean" },
                { in: "body", name: "pet", schema: { $ref: "#/definitions/Pet" } },
              ],
              responses: { "201": { schema: { $ref: "#/definitions/Pet" } } },
            },
          },
        },
        definitions: {
          Pet: { type: "object", required: ["name"], properties: { name: { type: "string" } } },
        },
      }).endpoints.get("POST /pets");

      const pet = objectNode({ name: primitive("string") }, ["name"]);
      expect(endpoint?.request).toEqual(pet);
      expect(endpoint?.responses).toEqual({ "2xx": pet });
    });

    it("recognizes a Swagger 2 document whose version loaded as a number", () => {
      const endpoint = resolve({
        swagger: 2,
        paths: {
          "/pets": {
            post: {
              parameters: [{ in: "body", name: "pet", schema: { type: "string" } }],
              responses: {},
            },
          },
        },
      }).endpoints.get("POST /pets");

      expect(endpoint?.request).toEqual(primitive("string"));
    });

    it("takes the first code of a class that declares a body", () => {
      const endpoint = resolve({
        openapi: "3.0.3",
        paths: {
          "/orders": {
            post: {
              responses: {
                "200": { description: "Accepted without a body" },
                "201": json({ type: "integer" }),
              },
            },
          },
        },
      }).endpoints.get("POST /orders");

      expect(endpoint?.responses).toEqual({ "2xx": primitive("integer") });
    });

    it("follows references to shared request bodies", () => {
      const endpoint = resolve({
        openapi: "3.0.3",
        paths: {
          "/notes": {
            put: { requestBody: { $ref: "#/components/requestBodies/Note" }, responses: {} },
          },
        },
        components: {
          requestBodies: { Note: json({ type: "object", properties: { text: { type: "string" } } }) },
        },
      }).endpoints.get("PUT /notes");

      expect(endpoint?.request).toEqual(objectNode({ text: primitive("string") }));
    });
  });

  describe("references", () => {
    it("cuts a recursive schema with a single cycle marker", () => {
      const schema = responseOf(
        {
          openapi: "3.0.3",
          paths: {
            "/tree": { get: { responses: { "200": json({ $ref: "#/components/schemas/Node" }) } } },
          },
          components: {
            schemas: {
              Node: {
                type: "object",
                properties: {
                  label: { type: "string" },
                  children: { type: "array", items: { $ref: "#/components/schemas/Node" } },
                },
              },
            },
          },
        },
        "GET /tree",
      );

      expect(schema).toEqual(
        objectNode({
          label: primitive("string"),
          children: arrayNode(cycleMarker("#/components/schemas/Node")),
        }),
      );

      let cycles = 0;
      if (schema) {
        visitSchema(schema, (node) => {
          if (node.kind === "cycle") cycles += 1;
        });
      }
      expect(cycles).toBe(1);
    });

    it("replaces an unresolved reference with unknown and records a warning", () => {
      const result = resolve({
        openapi: "3.0.3",
        paths: {
          "/reports": {
            get: { responses: { "200": json({ $ref: "#/components/schemas/Missing" }) } },
          },
        },
      });

      expect(result.endpoints.get("GET /reports")?.responses["2xx"]).toEqual(unknownNode());
      expect(result.warnings).toHaveLength(1);
      const [warning] = result.warnings;
      expect(warning).toBeInstanceOf(UnresolvedReferenceError);
      expect(warning instanceof UnresolvedReferenceError && warning.ref).toBe("#/components/schemas/Missing");
      expect(warning.pointer).toBe("/paths/~1reports/get/responses/200/content/application~1json/schema");
    });

    it("resolves references into external documents relative to the referencing file", () => {
      const result = resolve(
        {
          openapi: "3.0.3",
          paths: {
            "/accounts": {
              get: { responses: { "200": json({ $ref: "schemas/account.yaml#/Account" }) } },
            },
          },
        },
        new Map([
          [
            "schemas/account.yaml",
            { Account: { type: "object", properties: { balance: { type: "number" } } } },
          ],
        ]),
      );

      expect(result.warnings).toEqual([]);
      expect(result.endpoints.get("GET /accounts")?.responses["2xx"]).toEqual(
        objectNode({ balance: primitive("number") }),
      );
    });

    it("lets sibling keys next to a reference override its metadata", () => {
      const schema = responseOf(
        {
          openapi: "3.0.3",
          paths: {
            "/me": {
              get: {
                responses: {
                  "200": json({
                    $ref: "#/components/schemas/Name",
                    description: "Display name",
                    nullable: true,
                  }),
                },
              },
            },
          },
          components: { schemas: { Name: { type: "string", description: "A name" } } },
        },
        "GET /me",
      );

      expect(schema).toEqual(primitive("string", { nullable: true, description: "Display name" }));
    });
  });

  describe("composition", () => {
    const withSchemas = (schema: unknown, schemas: Record<string, unknown> = {}) => ({
      openapi: "3.0.3",
      paths: { "/items": { get: { responses: { "200": json(schema) } } } },
      components: { schemas },
    });

    it("merges allOf members with the union of their required fields", () => {
      const schema = responseOf(
        withSchemas(
          {
            allOf: [
              { $ref: "#/components/schemas/Base" },
              { type: "object", required: ["name"], properties: { name: { type: "string" } } },
            ],
          },
          {
            Base: { type: "object", required: ["id"], properties: { id: { type: "string" } } },
          },
        ),
        "GET /items",
      );

      expect(schema).toEqual(
        objectNode({ id: primitive("string"), name: primitive("string") }, ["id", "name"]),
      );
    });

    it("skips an operation whose allOf members have conflicting primitive types", () => {
      const result = resolve(withSchemas({ allOf: [{ type: "string" }, { type: "integer" }] }));

      expect(result.endpoints.size).toBe(0);
      expect(result.warnings).toHaveLength(1);
      const [warning] = result.warnings;
      expect(warning).toBeInstanceOf(MalformedContractError);
      expect(warning.pointer).toBe("/paths/~1items/get/responses/200/content/application~1json/schema/allOf");
      expect(warning.message).toBe(
        "conflicting types 'string' and 'integer' at openapi.yaml#/paths/~1items/get/responses/200/content/application~1json/schema/allOf",
      );
    });

    it("folds a null branch of oneOf into nullability", () => {
      const schema = responseOf(
        withSchemas({ oneOf: [{ type: "string" }, { type: "null" }] }),
        "GET /items",
      );
      expect(schema).toEqual(primitive("string", { nullable: true }));
    });

    it("keeps several alternatives as a union", () => {
      const schema = responseOf(
        withSchemas({ anyOf: [{ type: "string" }, { type: "integer" }] }),
        "GET /items",
      );
      expect(schema).toMatchObject({ kind: "union", combinator: "anyOf", nullable: false });
      expect(schema?.kind === "union" && schema.branches).toEqual([
        primitive("string"),
        primitive("integer"),
      ]);
    });

    it("turns a multi-type declaration into an anyOf union", () => {
      const schema = responseOf(withSchemas({ type: ["string", "integer", "null"] }), "GET /items");
      expect(schema).toMatchObject({ kind: "union", combinator: "anyOf", nullable: true });
    });

    it("infers an object from properties without a type", () => {
      const schema = responseOf(
        withSchemas({ properties: { flag: { type: "boolean" } } }),
        "GET /items",
      );
      expect(schema).toEqual(objectNode({ flag: primitive("boolean") }));
    });
  });

  describe("malformed documents", () => {
    it("fails with the pointer of a missing paths key", () => {
      try {
        resolve({ openapi: "3.0.3" });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedContractError);
        if (error instanceof MalformedContractError) {
          expect(error.pointer).toBe("/paths");
          expect(error.document).toBe("openapi.yaml");
        }
      }
    });

    it("fails when the document root is not a mapping", () => {
      expect(() => resolve(["openapi"])).toThrow(MalformedContractError);
    });

    it("skips an operation that is not a mapping and keeps its siblings", () => {
      const result = resolve({
        openapi: "3.0.3",
        paths: { "/a": { get: "nope", delete: { responses: {} } }, "/b": { get: { responses: {} } } },
      });

      expect([...result.endpoints.keys()]).toEqual(["DELETE /a", "GET /b"]);
      expect(result.warnings.map((warning) => [warning._tag, warning.pointer])).toEqual([
        ["MalformedContractError", "/paths/~1a/get"],
      ]);
    });

    it("skips a circular path item reference", () => {
      const result = resolve({
        openapi: "3.0.3",
        paths: { "/loop": { $ref: "#/paths/~1loop" }, "/ok": { get: { responses: {} } } },
      });

      expect([...result.endpoints.keys()]).toEqual(["GET /ok"]);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toBeInstanceOf(MalformedContractError);
      expect(result.warnings[0].pointer).toBe("/paths/~1loop");
    });
  });
});
