/**
 * Schema Resolver - turns a parsed contract document (OpenAPI 3.x or
 * Swagger 2) into endpoints with fully resolved, reference-free schemas.
 *
 * References are followed recursively across the document and any supplied
 * external documents. The set of reference keys currently being expanded is
 * passed down each branch; meeting one again yields a cycle marker.
 */

import {
  endpointKey,
  HTTP_METHODS,
  statusClassOf,
  type Endpoint,
  type HttpMethod,
} from "../graph/contract.js";
import { MalformedContractError, UnresolvedReferenceError } from "../errors.js";
import {
  arrayNode,
  cycleMarker,
  type EnumValue,
  objectNode,
  primitive,
  type PrimitiveType,
  type SchemaNode,
  unionNode,
  unknownNode,
  withMeta,
} from "../schema/schema-node.js";
import { isRecord, joinPointer, lookupPointer, splitRef } from "./json-pointer.js";

export interface ContractDocument {
  /** Document URI, usually the path relative to the repository root */
  uri: string;
  /** Parsed document tree */
  root: unknown;
}

export interface ResolveOptions {
  /** Other documents reachable through cross-document references, keyed by URI */
  externalDocuments?: ReadonlyMap<string, unknown>;
}

export type ResolveWarning = UnresolvedReferenceError | MalformedContractError;

export interface ResolveResult {
  /** Endpoints keyed by `METHOD path` */
  endpoints: Map<string, Endpoint>;
  /**
   * References that could not be followed (each replaced by `unknown`) and
   * path items or operations skipped as malformed
   */
  warnings: ResolveWarning[];
}

/**
 * Resolve every operation of a contract document. A malformed path item or
 * operation is skipped with a warning; the rest of the document still resolves.
 *
 * @throws MalformedContractError when the document root or `paths` is invalid
 */
export function resolveContractDocument(
  document: ContractDocument,
  options: ResolveOptions = {},
): ResolveResult {
  const documents = new Map<string, unknown>(options.externalDocuments ?? []);
  documents.set(document.uri, document.root);
  const resolver = new Resolver(document.uri, documents);
  const endpoints = resolver.resolveEndpoints();
  return { endpoints, warnings: resolver.warnings };
}

interface Location {
  uri: string;
  pointer: string;
}

interface Dereferenced {
  value: Record<string, unknown>;
  at: Location;
}

const PRIMITIVE_TYPES: ReadonlySet<string> = new Set<PrimitiveType>([
  "string",
  "integer",
  "number",
  "boolean",
  "null",
]);

function isPrimitiveType(value: string): value is PrimitiveType {
  return PRIMITIVE_TYPES.has(value);
}

function isEnumValue(value: unknown): value is EnumValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/**
 * An `unknown` schema carrying no constraint
 */
function isBareUnknown(node: SchemaNode): boolean {
  return node.kind === "primitive" && node.type === "unknown" && node.enum === undefined;
}

function at(location: Location, ...tokens: Array<string | number>): Location {
  return { uri: location.uri, pointer: joinPointer(location.pointer, ...tokens) };
}

/**
 * Order response codes so specific codes come before their wildcard
 */
function responseCodeOrder(code: string): string {
  return code.toLowerCase().replace(/x/g, "9");
}

/**
 * Pick the media type whose schema describes a body
 */
export function pickMediaType(content: Record<string, unknown>): string | undefined {
  const types = Object.keys(content);
  return (
    types.find((type) => type.toLowerCase().startsWith("application/json")) ??
    types.find((type) => /\+json(\s*;|$)/i.test(type)) ??
    types[0]
  );
}

class Resolver {
  readonly warnings: ResolveWarning[] = [];

  constructor(
    private readonly rootUri: string,
    private readonly documents: ReadonlyMap<string, unknown>,
  ) {}

  resolveEndpoints(): Map<string, Endpoint> {
    const root = this.documents.get(this.rootUri);
    const rootAt: Location = { uri: this.rootUri, pointer: "" };
    const doc = this.expectRecord(root, rootAt, "document root");
    // `swagger: 2.0` unquoted in YAML loads as a number
    const swagger2 = "swagger" in doc && !("openapi" in doc);

    if (!("paths" in doc)) {
      throw this.malformed(at(rootAt, "paths"), "missing required key 'paths'");
    }
    const paths = this.expectRecord(doc.paths, at(rootAt, "paths"), "'paths'");
    const endpoints = new Map<string, Endpoint>();

    for (const [path, rawItem] of Object.entries(paths)) {
      if (path.startsWith("x-")) continue;
      const item = this.skippingMalformed(() =>
        this.deref(rawItem, at(rootAt, "paths", path), "path item", new Set()),
      );
      if (!item) continue;

      for (const method of HTTP_METHODS) {
        const key = method.toLowerCase();
        if (!(key in item.value)) continue;
        const endpoint = this.skippingMalformed(() => this.operation(item, method, path, swagger2));
        if (endpoint) endpoints.set(endpointKey(endpoint), endpoint);
      }
    }

    return endpoints;
  }

  private operation(item: Dereferenced, method: HttpMethod, path: string, swagger2: boolean): Endpoint {
    const opAt = at(item.at, method.toLowerCase());
    const operation = this.expectRecord(item.value[method.toLowerCase()], opAt, "operation");

    const summary = typeof operation.summary === "string" ? operation.summary : undefined;
    const request = swagger2
      ? this.swaggerBodyParameter([
          ...this.parameterList(item.value.parameters, at(item.at, "parameters")),
          ...this.parameterList(operation.parameters, at(opAt, "parameters")),
        ])
      : this.requestBody(operation.requestBody, at(opAt, "requestBody"));
    const responses = this.responses(operation.responses, at(opAt, "responses"), swagger2);

    return {
      method,
      path,
      ...(summary !== undefined && { summary }),
      ...(request !== undefined && { request }),
      responses,
    };
  }

  /**
   * Run one unit of resolution, recording a malformed structure as a warning
   */
  private skippingMalformed<A>(resolve: () => A | undefined): A | undefined {
    try {
      return resolve();
    } catch (err) {
      if (!(err instanceof MalformedContractError)) throw err;
      this.warnings.push(err);
      return undefined;
    }
  }

  // ─── structure ─────────────────────────────────────────────

  private malformed(location: Location, message: string): MalformedContractError {
    return new MalformedContractError({
      message: `${message} at ${location.uri}#${location.pointer || "/"}`,
      document: location.uri,
      pointer: location.pointer || "/",
    });
  }

  private expectRecord(value: unknown, location: Location, what: string): Record<string, unknown> {
    if (!isRecord(value)) {
      throw this.malformed(location, `${what} must be a mapping`);
    }
    return value;
  }

  private refKey(target: Location): string {
    return target.uri === this.rootUri ? `#${target.pointer}` : `${target.uri}#${target.pointer}`;
  }

  private unresolved(ref: string, location: Location): void {
    this.warnings.push(
      new UnresolvedReferenceError({
        message: `Cannot resolve reference '${ref}' at ${location.uri}#${location.pointer || "/"}`,
        ref,
        document: location.uri,
        pointer: location.pointer || "/",
      }),
    );
  }

  /**
   * Follow `$ref` chains on a non-schema object (path item, request body,
   * response, parameter). Returns undefined when the chain cannot be resolved.
   */
  private deref(
    value: unknown,
    location: Location,
    what: string,
    seen: ReadonlySet<string>,
  ): Dereferenced | undefined {
    const record = this.expectRecord(value, location, what);
    const ref = record.$ref;
    if (typeof ref !== "string") {
      return { value: record, at: location };
    }
    const target = splitRef(ref, location.uri);
    const key = this.refKey(target);
    if (seen.has(key)) {
      throw this.malformed(location, `circular reference '${ref}' on ${what}`);
    }
    const lookup = lookupPointer(this.documents.get(target.uri), target.pointer);
    if (!this.documents.has(target.uri) || !lookup.found) {
      this.unresolved(ref, location);
      return undefined;
    }
    return this.deref(lookup.value, target, what, new Set([...seen, key]));
  }

  // ─── bodies ────────────────────────────────────────────────

  private mediaSchema(content: unknown, location: Location): SchemaNode | undefined {
    if (content === undefined) return undefined;
    const media = this.expectRecord(content, location, "'content'");
    const type = pickMediaType(media);
    if (type === undefined) return undefined;
    const mediaAt = at(location, type);
    const mediaObject = this.expectRecord(media[type], mediaAt, "media type object");
    if (!("schema" in mediaObject)) return undefined;
    return this.schema(mediaObject.schema, at(mediaAt, "schema"), new Set());
  }

  private requestBody(value: unknown, location: Location): SchemaNode | undefined {
    if (value === undefined) return undefined;
    const body = this.deref(value, location, "'requestBody'", new Set());
    if (!body) return unknownNode();
    return this.mediaSchema(body.value.content, at(body.at, "content"));
  }

  private parameterList(value: unknown, location: Location): Dereferenced[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      throw this.malformed(location, "'parameters' must be a sequence");
    }
    const parameters: Dereferenced[] = [];
    value.forEach((parameter, index) => {
      const resolved = this.deref(parameter, at(location, index), "parameter", new Set());
      if (resolved) parameters.push(resolved);
    });
    return parameters;
  }

  private swaggerBodyParameter(parameters: Dereferenced[]): SchemaNode | undefined {
    const body = parameters.filter((p) => p.value.in === "body").pop();
    if (!body || !("schema" in body.value)) return undefined;
    return this.schema(body.value.schema, at(body.at, "schema"), new Set());
  }

  private responses(
    value: unknown,
    location: Location,
    swagger2: boolean,
  ): Record<string, SchemaNode> {
    if (value === undefined) return {};
    const responses = this.expectRecord(value, location, "'responses'");
    const codes = Object.keys(responses).sort((a, b) =>
      responseCodeOrder(a).localeCompare(responseCodeOrder(b)),
    );

    const result: Record<string, SchemaNode> = {};
    for (const code of codes) {
      const statusClass = statusClassOf(code);
      if (statusClass === undefined || statusClass in result) continue;

      const response = this.deref(responses[code], at(location, code), "response object", new Set());
      if (!response) {
        result[statusClass] = unknownNode();
        continue;
      }
      const schema = swagger2
        ? "schema" in response.value
          ? this.schema(response.value.schema, at(response.at, "schema"), new Set())
          : undefined
        : this.mediaSchema(response.value.content, at(response.at, "content"));
      if (schema !== undefined) {
        result[statusClass] = schema;
      }
    }
    return result;
  }

  // ─── schemas ───────────────────────────────────────────────

  private schema(raw: unknown, location: Location, resolving: ReadonlySet<string>): SchemaNode {
    if (raw === true) return unknownNode();
    const node = this.expectRecord(raw, location, "schema");

    if (typeof node.$ref === "string") {
      return this.applySiblings(this.reference(node.$ref, location, resolving), node);
    }

    for (const combinator of ["allOf", "anyOf", "oneOf"] as const) {
      if (combinator in node && !Array.isArray(node[combinator])) {
        throw this.malformed(at(location, combinator), `'${combinator}' must be a sequence`);
      }
    }

    if (Array.isArray(node.allOf)) {
      return this.allOf(node, node.allOf, location, resolving);
    }
    const alternatives = Array.isArray(node.oneOf)
      ? { combinator: "oneOf" as const, members: node.oneOf }
      : Array.isArray(node.anyOf)
        ? { combinator: "anyOf" as const, members: node.anyOf }
        : undefined;
    if (alternatives) {
      const branches = alternatives.members.map((member, index) =>
        this.schema(member, at(location, alternatives.combinator, index), resolving),
      );
      return this.union(alternatives.combinator, branches, node);
    }

    return this.typed(node, location, resolving);
  }

  private reference(ref: string, location: Location, resolving: ReadonlySet<string>): SchemaNode {
    const target = splitRef(ref, location.uri);
    const key = this.refKey(target);
    if (resolving.has(key)) {
      return cycleMarker(key);
    }
    const lookup = lookupPointer(this.documents.get(target.uri), target.pointer);
    if (!this.documents.has(target.uri) || !lookup.found) {
      this.unresolved(ref, location);
      return unknownNode();
    }
    return this.schema(lookup.value, target, new Set([...resolving, key]));
  }

  /**
   * Sibling keys next to `$ref` (or a combinator) override the resolved node
   */
  private applySiblings(resolved: SchemaNode, node: Record<string, unknown>): SchemaNode {
    return withMeta(resolved, {
      ...(typeof node.description === "string" && { description: node.description }),
      ...(node.nullable === true && { nullable: true }),
    });
  }

  private union(
    combinator: "anyOf" | "oneOf",
    members: SchemaNode[],
    node: Record<string, unknown>,
  ): SchemaNode {
    const isNullBranch = (branch: SchemaNode) =>
      branch.kind === "primitive" && branch.type === "null";
    const branches = members.filter((branch) => !isNullBranch(branch));
    const nullable = branches.length < members.length;

    const merged =
      branches.length === 0
        ? primitive("null")
        : branches.length === 1
          ? branches[0]
          : unionNode(combinator, branches);
    const withNull = nullable ? withMeta(merged, { nullable: true }) : merged;
    return this.applySiblings(withNull, node);
  }

  private allOf(
    node: Record<string, unknown>,
    members: unknown[],
    location: Location,
    resolving: ReadonlySet<string>,
  ): SchemaNode {
    const resolved = members.map((member, index) =>
      this.schema(member, at(location, "allOf", index), resolving),
    );
    const hasOwnShape = "type" in node || "properties" in node || "items" in node;
    if (hasOwnShape) {
      resolved.push(this.typed(node, location, resolving));
    }

    let merged: SchemaNode | undefined;
    for (const member of resolved) {
      if (member.kind === "cycle") continue;
      merged = merged === undefined ? member : this.merge(merged, member, at(location, "allOf"), "");
    }
    const base = merged ?? unknownNode();

    const alternatives = Array.isArray(node.oneOf) ? node.oneOf : Array.isArray(node.anyOf) ? node.anyOf : undefined;
    if (alternatives) {
      const combinator = Array.isArray(node.oneOf) ? "oneOf" : "anyOf";
      const branches = alternatives.map((member, index) =>
        this.merge(
          base,
          this.schema(member, at(location, combinator, index), resolving),
          at(location, combinator, index),
          "",
        ),
      );
      return this.union(combinator, branches, node);
    }
    return this.applySiblings(base, node);
  }

  /**
   * Merge two `allOf` members. Objects merge field by field with a union of
   * required names; metadata is last-write-wins; unknown members are neutral.
   */
  private merge(a: SchemaNode, b: SchemaNode, location: Location, field: string): SchemaNode {
    const description = b.description ?? a.description;
    const meta = {
      nullable: a.nullable || b.nullable,
      ...(description !== undefined && { description }),
    };
    const conflict = (message: string) =>
      this.malformed(location, field ? `${message} for field '${field}'` : message);

    if (b.kind === "cycle") return a;
    if (a.kind === "cycle") return b;
    if (isBareUnknown(b)) return withMeta(a, meta);
    if (isBareUnknown(a)) return withMeta(b, meta);

    if (a.kind === "object" && b.kind === "object") {
      const properties: Record<string, SchemaNode> = { ...a.properties };
      for (const [name, child] of Object.entries(b.properties)) {
        const existing = properties[name];
        properties[name] =
          existing === undefined
            ? child
            : this.merge(existing, child, location, field ? `${field}.${name}` : name);
      }
      const required = [...new Set([...a.required, ...b.required])];
      return objectNode(properties, required, meta);
    }
    if (a.kind === "object" || b.kind === "object") {
      throw conflict("cannot merge an object with a non-object schema");
    }

    if (a.kind === "primitive" && b.kind === "primitive") {
      if (a.type !== b.type) {
        throw conflict(`conflicting types '${a.type}' and '${b.type}'`);
      }
      const format = b.format ?? a.format;
      const values = b.enum ?? a.enum;
      return primitive(a.type, {
        ...meta,
        ...(format !== undefined && { format }),
        ...(values !== undefined && { enum: values }),
      });
    }
    if (a.kind === "array" && b.kind === "array") {
      return arrayNode(this.merge(a.items, b.items, location, `${field}[]`), meta);
    }
    if (a.kind === "union" && b.kind === "union") {
      return unionNode(b.combinator, [...a.branches, ...b.branches], meta);
    }
    throw conflict(`cannot merge '${a.kind}' with '${b.kind}'`);
  }

  private typed(
    node: Record<string, unknown>,
    location: Location,
    resolving: ReadonlySet<string>,
  ): SchemaNode {
    const types = this.declaredTypes(node, location);
    const nullable = node.nullable === true || types.includes("null");
    const description = typeof node.description === "string" ? node.description : undefined;
    const meta = { nullable, ...(description !== undefined && { description }) };

    const concrete = types.filter((type) => type !== "null");
    if (concrete.length > 1) {
      return unionNode(
        "anyOf",
        concrete.map((type) => this.ofType(type, node, location, resolving, { nullable: false })),
        meta,
      );
    }
    if (concrete.length === 1) {
      return this.ofType(concrete[0], node, location, resolving, meta);
    }
    if (types.length > 0) {
      return primitive("null", { description });
    }
    return this.ofType(this.inferType(node), node, location, resolving, meta);
  }

  private declaredTypes(node: Record<string, unknown>, location: Location): string[] {
    const type = node.type;
    if (type === undefined) return [];
    if (typeof type === "string") return [type];
    if (Array.isArray(type) && type.every((entry): entry is string => typeof entry === "string")) {
      return type;
    }
    throw this.malformed(at(location, "type"), "'type' must be a string or a sequence of strings");
  }

  private inferType(node: Record<string, unknown>): string {
    if ("properties" in node) return "object";
    if ("items" in node) return "array";
    const values = Array.isArray(node.enum) ? node.enum : "const" in node ? [node.const] : [];
    if (values.length > 0 && values.every((value) => typeof value === "string")) return "string";
    return "unknown";
  }

  private ofType(
    type: string,
    node: Record<string, unknown>,
    location: Location,
    resolving: ReadonlySet<string>,
    meta: { nullable: boolean; description?: string },
  ): SchemaNode {
    if (type === "object") {
      const properties: Record<string, SchemaNode> = {};
      if ("properties" in node) {
        const raw = this.expectRecord(node.properties, at(location, "properties"), "'properties'");
        for (const [name, child] of Object.entries(raw)) {
          properties[name] = this.schema(child, at(location, "properties", name), resolving);
        }
      }
      return objectNode(properties, this.requiredNames(node, location), meta);
    }

    if (type === "array") {
      const items =
        "items" in node
          ? this.schema(node.items, at(location, "items"), resolving)
          : unknownNode();
      return arrayNode(items, meta);
    }

    const format = typeof node.format === "string" ? node.format : undefined;
    const rawValues = Array.isArray(node.enum) ? node.enum : "const" in node ? [node.const] : undefined;
    const values = rawValues?.filter(isEnumValue);

    if (isPrimitiveType(type)) {
      return primitive(type, {
        ...meta,
        ...(format !== undefined && { format }),
        ...(values !== undefined && { enum: values }),
      });
    }
    // Non-standard types such as Swagger 2 `file` keep their name as format
    const tag = type !== "unknown" ? (format ?? type) : format;
    return unknownNode({ ...meta, ...(tag !== undefined && { format: tag }) });
  }

  private requiredNames(node: Record<string, unknown>, location: Location): string[] {
    const required = node.required;
    if (required === undefined) return [];
    if (Array.isArray(required) && required.every((name): name is string => typeof name === "string")) {
      return required;
    }
    throw this.malformed(at(location, "required"), "'required' must be a sequence of strings");
  }
}
