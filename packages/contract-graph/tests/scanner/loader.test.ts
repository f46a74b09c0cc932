import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadEndpoints } from "../../src/scanner/loader.js";

const OPENAPI = `openapi: 3.0.3
paths:
  /users/{id}:
    get:
      responses:
        "200":
          content:
            application/json:
              schema:
                $ref: "schemas/user.yaml#/User"
`;

const USER_SCHEMA = `User:
  type: object
  required: [id]
  properties:
    id:
      type: string
`;

const USER_MODEL = `
export class Profile extends BaseModel {
  bio?: string;
}
`;

describe("loadEndpoints", () => {
  let root: string;

  const write = async (file: string, text: string) => {
    const target = path.join(root, file);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, text);
  };

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "faultline-loader-"));
    await write("openapi.yaml", OPENAPI);
    await write("schemas/user.yaml", USER_SCHEMA);
    await write("src/models/profile.ts", USER_MODEL);
    await write("node_modules/vendor/openapi.yaml", "not: [valid");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("collects endpoints from documents and model sources", async () => {
    const result = await loadEndpoints(root);

    expect(result.files).toEqual(["openapi.yaml", "src/models/profile.ts"]);
    expect(result.warnings).toEqual([]);
    expect(result.endpoints.map((endpoint) => `${endpoint.method} ${endpoint.path}`)).toEqual([
      "GET /users/{id}",
      "SCHEMA src.models.profile.Profile",
    ]);
    expect(result.endpoints[0].responses["2xx"]).toEqual({
      kind: "object",
      properties: { id: { kind: "primitive", type: "string", nullable: false } },
      required: ["id"],
      nullable: false,
    });
  });

  it("scans only the requested contract type", async () => {
    const result = await loadEndpoints(root, { contractType: "models" });
    expect(result.files).toEqual(["src/models/profile.ts"]);
  });

  it("turns bad files into warnings and keeps going", async () => {
    await write("legacy/swagger.json", "{");
    await write("src/broken.ts", "export class Broken extends BaseModel { id: string");

    const result = await loadEndpoints(root);

    expect(result.warnings.map((warning) => [warning.kind, warning.file])).toEqual([
      ["MalformedContractError", "legacy/swagger.json"],
      ["UnparsableSourceError", "src/broken.ts"],
    ]);
    expect(result.endpoints).toHaveLength(2);
  });

  it("keeps the healthy operations of a document with one malformed operation", async () => {
    await write(
      "openapi.yaml",
      `${OPENAPI}  /orders:
    post:
      responses:
        "201":
          content:
            application/json:
              schema:
                allOf:
                  - type: string
                  - type: integer
`,
    );

    const result = await loadEndpoints(root, { contractType: "openapi" });

    expect(result.endpoints.map((endpoint) => `${endpoint.method} ${endpoint.path}`)).toEqual([
      "GET /users/{id}",
    ]);
    expect(result.warnings).toEqual([
      {
        kind: "MalformedContractError",
        file: "openapi.yaml",
        message:
          "conflicting types 'string' and 'integer' at openapi.yaml#/paths/~1orders/post/responses/201/content/application~1json/schema/allOf",
      },
    ]);
  });

  it("keeps the first of two identical endpoints", async () => {
    await write(
      "v2/openapi.yaml",
      ["openapi: 3.0.3", "paths:", "  /users/{id}:", "    get:", "      summary: Duplicate", "      responses: {}"].join("\n"),
    );

    const result = await loadEndpoints(root, { contractType: "openapi" });

    expect(result.endpoints).toHaveLength(1);
    expect(result.endpoints[0].summary).toBeUndefined();
    expect(result.warnings).toEqual([
      { kind: "DuplicateEndpoint", message: "Duplicate endpoint GET /users/{id} ignored" },
    ]);
  });

  it("reports a missing root as a warning", async () => {
    const result = await loadEndpoints(path.join(root, "missing"));
    expect(result.endpoints).toEqual([]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].kind).toBe("ReadError");
  });
});
