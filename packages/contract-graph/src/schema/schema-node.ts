/**
 * Canonical schema representation shared by contract documents and
 * source-extracted models. A resolved node never holds a reference; recursion
 * is cut with a cycle marker.
 */

export type PrimitiveType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "null"
  | "unknown";

export type EnumValue = string | number | boolean | null;

export type UnionCombinator = "anyOf" | "oneOf";

interface NodeMeta {
  readonly nullable: boolean;
  readonly description?: string;
}

export interface PrimitiveNode extends NodeMeta {
  readonly kind: "primitive";
  readonly type: PrimitiveType;
  /** Semantic tag such as `date-time`, `email`, `int64` */
  readonly format?: string;
  readonly enum?: readonly EnumValue[];
}

export interface ObjectNode extends NodeMeta {
  readonly kind: "object";
  readonly properties: Readonly<Record<string, SchemaNode>>;
  readonly required: readonly string[];
}

export interface ArrayNode extends NodeMeta {
  readonly kind: "array";
  readonly items: SchemaNode;
}

export interface UnionNode extends NodeMeta {
  readonly kind: "union";
  readonly combinator: UnionCombinator;
  readonly branches: readonly SchemaNode[];
}

/**
 * Stands in for a reference that is already being expanded higher up
 */
export interface CycleNode extends NodeMeta {
  readonly kind: "cycle";
  readonly ref: string;
}

export type SchemaNode =
  | PrimitiveNode
  | ObjectNode
  | ArrayNode
  | UnionNode
  | CycleNode;

export type SchemaKind = SchemaNode["kind"];

type Meta = Partial<NodeMeta>;

export function primitive(
  type: PrimitiveType,
  extra: Meta & { format?: string; enum?: readonly EnumValue[] } = {},
): PrimitiveNode {
  return {
    kind: "primitive",
    type,
    nullable: extra.nullable ?? false,
    ...(extra.description !== undefined && { description: extra.description }),
    ...(extra.format !== undefined && { format: extra.format }),
    ...(extra.enum !== undefined && { enum: extra.enum }),
  };
}

export function unknownNode(extra: Meta & { format?: string } = {}): PrimitiveNode {
  return primitive("unknown", extra);
}

export function objectNode(
  properties: Readonly<Record<string, SchemaNode>>,
  required: readonly string[] = [],
  extra: Meta = {},
): ObjectNode {
  return {
    kind: "object",
    properties,
    required,
    nullable: extra.nullable ?? false,
    ...(extra.description !== undefined && { description: extra.description }),
  };
}

export function arrayNode(items: SchemaNode, extra: Meta = {}): ArrayNode {
  return {
    kind: "array",
    items,
    nullable: extra.nullable ?? false,
    ...(extra.description !== undefined && { description: extra.description }),
  };
}

export function unionNode(
  combinator: UnionCombinator,
  branches: readonly SchemaNode[],
  extra: Meta = {},
): UnionNode {
  return {
    kind: "union",
    combinator,
    branches,
    nullable: extra.nullable ?? false,
    ...(extra.description !== undefined && { description: extra.description }),
  };
}

export function cycleMarker(ref: string): CycleNode {
  return { kind: "cycle", ref, nullable: false };
}

/**
 * Return a copy of the node with metadata overridden
 */
export function withMeta<T extends SchemaNode>(node: T, meta: Meta): T {
  return {
    ...node,
    ...(meta.nullable !== undefined && { nullable: meta.nullable }),
    ...(meta.description !== undefined && { description: meta.description }),
  };
}

/**
 * Short human-readable type label, e.g. `array<string>` or `oneOf(string | integer)`
 */
export function describeType(node: SchemaNode): string {
  const suffix = node.nullable ? "?" : "";
  switch (node.kind) {
    case "primitive":
      return `${node.type}${node.format ? `(${node.format})` : ""}${suffix}`;
    case "object":
      return `object${suffix}`;
    case "array":
      return `array<${describeType(node.items)}>${suffix}`;
    case "union":
      return `${node.combinator}(${node.branches.map(describeType).join(" | ")})${suffix}`;
    case "cycle":
      return `cycle(${node.ref})`;
  }
}

/**
 * Depth-first walk over a schema tree
 */
export function visitSchema(
  node: SchemaNode,
  visit: (node: SchemaNode, path: string) => void,
  path = "",
): void {
  visit(node, path);
  switch (node.kind) {
    case "object":
      for (const [name, child] of Object.entries(node.properties)) {
        visitSchema(child, visit, path ? `${path}.${name}` : name);
      }
      break;
    case "array":
      visitSchema(node.items, visit, `${path}[]`);
      break;
    case "union":
      node.branches.forEach((branch, index) =>
        visitSchema(branch, visit, `${path}|${index}`),
      );
      break;
    default:
      break;
  }
}

/**
 * True when the object (or the body it describes) has at least one required field
 */
export function hasRequiredFields(node: SchemaNode): boolean {
  return node.kind === "object" && node.required.length > 0;
}
