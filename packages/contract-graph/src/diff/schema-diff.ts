/**
 * Structural diff between two endpoint sets.
 *
 * The walk descends into object properties and array items; union branches
 * are compared as sets of canonical forms, so a changed branch shows up as
 * one branch removed and one added.
 */

import {
  compareIdentity,
  type Endpoint,
  type EndpointIdentity,
  endpointKey,
} from "../graph/contract.js";
import { canonicalizeEndpoint, canonicalizeNode, canonicalJson } from "../schema/canonical.js";
import {
  describeType,
  hasRequiredFields,
  type PrimitiveNode,
  type SchemaNode,
} from "../schema/schema-node.js";

export type SchemaChangeKind =
  | "field-added"
  | "field-removed"
  | "type-changed"
  | "type-widened"
  | "type-narrowed"
  | "optionality-changed"
  | "nullability-changed"
  | "branch-added"
  | "branch-removed"
  | "description-changed"
  | "body-added"
  | "body-removed"
  | "summary-changed";

export type ChangeLocation = "request" | "response" | "endpoint";

export interface SchemaChange {
  location: ChangeLocation;
  /** Response status class for response-side changes */
  statusClass?: string;
  /** Dotted field path; `[]` marks array items; empty for the body itself */
  fieldPath: string;
  kind: SchemaChangeKind;
  /** Added fields and bodies: whether the new element is required */
  required?: boolean;
  /** Optionality and nullability changes: true when the constraint was loosened */
  relaxed?: boolean;
  before?: string;
  after?: string;
}

export type EndpointDelta =
  | { change: "added"; identity: EndpointIdentity; endpoint: Endpoint }
  | { change: "removed"; identity: EndpointIdentity; endpoint: Endpoint }
  | {
      change: "modified";
      identity: EndpointIdentity;
      before: Endpoint;
      after: Endpoint;
      changes: SchemaChange[];
    };

/**
 * Delta between two versions of one repository's contract
 */
export interface ContractDelta {
  repo: string;
  /** Content hash of the older version, absent when diffing against nothing */
  from?: string;
  to: string;
  endpoints: EndpointDelta[];
}

interface DiffContext {
  location: "request" | "response";
  statusClass?: string;
}

function childPath(path: string, name: string): string {
  return path ? `${path}.${name}` : name;
}

function canonicalKey(node: SchemaNode): string {
  return canonicalJson(canonicalizeNode(node));
}

function isBareUnknown(node: SchemaNode): boolean {
  return node.kind === "primitive" && node.type === "unknown" && node.enum === undefined;
}

class ChangeCollector {
  readonly changes: SchemaChange[] = [];

  push(context: DiffContext, fieldPath: string, change: Omit<SchemaChange, "location" | "statusClass" | "fieldPath">): void {
    this.changes.push({
      location: context.location,
      ...(context.statusClass !== undefined && { statusClass: context.statusClass }),
      fieldPath,
      ...change,
    });
  }

  /**
   * Record a type transition, tagging it as widened, narrowed or changed
   */
  private typeChange(
    context: DiffContext,
    path: string,
    kind: "type-changed" | "type-widened" | "type-narrowed",
    before: SchemaNode,
    after: SchemaNode,
  ): void {
    this.push(context, path, { kind, before: describeType(before), after: describeType(after) });
  }

  nodes(before: SchemaNode, after: SchemaNode, context: DiffContext, path: string): void {
    if (before.nullable !== after.nullable) {
      this.push(context, path, {
        kind: "nullability-changed",
        relaxed: after.nullable,
        before: describeType(before),
        after: describeType(after),
      });
    }
    if (before.description !== after.description) {
      this.push(context, path, { kind: "description-changed" });
    }

    if (before.kind !== after.kind) {
      if (isBareUnknown(after)) {
        this.typeChange(context, path, "type-widened", before, after);
      } else if (isBareUnknown(before)) {
        this.typeChange(context, path, "type-narrowed", before, after);
      } else {
        this.typeChange(context, path, "type-changed", before, after);
      }
      return;
    }

    switch (before.kind) {
      case "primitive":
        if (after.kind === "primitive") this.primitives(before, after, context, path);
        return;
      case "object":
        if (after.kind === "object") {
          this.objects(before.properties, before.required, after.properties, after.required, context, path);
        }
        return;
      case "array":
        if (after.kind === "array") this.nodes(before.items, after.items, context, `${path}[]`);
        return;
      case "union":
        if (after.kind === "union") {
          if (before.combinator !== after.combinator) {
            this.typeChange(context, path, "type-changed", before, after);
          }
          this.branches(before.branches, after.branches, context, path);
        }
        return;
      case "cycle":
        if (after.kind === "cycle" && before.ref !== after.ref) {
          this.typeChange(context, path, "type-changed", before, after);
        }
        return;
    }
  }

  private primitives(before: PrimitiveNode, after: PrimitiveNode, context: DiffContext, path: string): void {
    if (before.type !== after.type) {
      const widened =
        (before.type === "integer" && after.type === "number") ||
        (after.type === "unknown" && after.enum === undefined);
      const narrowed =
        (before.type === "number" && after.type === "integer") ||
        (before.type === "unknown" && before.enum === undefined);
      this.typeChange(
        context,
        path,
        widened ? "type-widened" : narrowed ? "type-narrowed" : "type-changed",
        before,
        after,
      );
      return;
    }

    if (before.format !== after.format) {
      const kind =
        after.format === undefined
          ? "type-widened"
          : before.format === undefined
            ? "type-narrowed"
            : "type-changed";
      this.typeChange(context, path, kind, before, after);
    }

    const beforeValues = new Set((before.enum ?? []).map((value) => JSON.stringify(value)));
    const afterValues = new Set((after.enum ?? []).map((value) => JSON.stringify(value)));
    if (before.enum === undefined && after.enum === undefined) return;
    if (after.enum === undefined) {
      this.push(context, path, { kind: "type-widened", before: "enum", after: describeType(after) });
      return;
    }
    if (before.enum === undefined) {
      this.push(context, path, { kind: "type-narrowed", before: describeType(before), after: "enum" });
      return;
    }
    const added = [...afterValues].filter((value) => !beforeValues.has(value));
    const removed = [...beforeValues].filter((value) => !afterValues.has(value));
    if (added.length === 0 && removed.length === 0) return;
    const kind =
      removed.length === 0 ? "type-widened" : added.length === 0 ? "type-narrowed" : "type-changed";
    this.push(context, path, {
      kind,
      before: `enum[${[...beforeValues].join(", ")}]`,
      after: `enum[${[...afterValues].join(", ")}]`,
    });
  }

  private objects(
    beforeProps: Readonly<Record<string, SchemaNode>>,
    beforeRequired: readonly string[],
    afterProps: Readonly<Record<string, SchemaNode>>,
    afterRequired: readonly string[],
    context: DiffContext,
    path: string,
  ): void {
    const names = [...new Set([...Object.keys(beforeProps), ...Object.keys(afterProps)])].sort();
    for (const name of names) {
      const fieldPath = childPath(path, name);
      const previous = beforeProps[name];
      const next = afterProps[name];
      const wasRequired = beforeRequired.includes(name);
      const isRequired = afterRequired.includes(name);

      if (previous === undefined && next !== undefined) {
        this.push(context, fieldPath, { kind: "field-added", required: isRequired, after: describeType(next) });
      } else if (previous !== undefined && next === undefined) {
        this.push(context, fieldPath, { kind: "field-removed", required: wasRequired, before: describeType(previous) });
      } else if (previous !== undefined && next !== undefined) {
        if (wasRequired !== isRequired) {
          this.push(context, fieldPath, {
            kind: "optionality-changed",
            relaxed: wasRequired && !isRequired,
            before: wasRequired ? "required" : "optional",
            after: isRequired ? "required" : "optional",
          });
        }
        this.nodes(previous, next, context, fieldPath);
      }
    }
  }

  private branches(
    before: readonly SchemaNode[],
    after: readonly SchemaNode[],
    context: DiffContext,
    path: string,
  ): void {
    const beforeKeys = new Map(before.map((branch) => [canonicalKey(branch), branch]));
    const afterKeys = new Map(after.map((branch) => [canonicalKey(branch), branch]));
    for (const [key, branch] of beforeKeys) {
      if (!afterKeys.has(key)) {
        this.push(context, path, { kind: "branch-removed", before: describeType(branch) });
      }
    }
    for (const [key, branch] of afterKeys) {
      if (!beforeKeys.has(key)) {
        this.push(context, path, { kind: "branch-added", after: describeType(branch) });
      }
    }
  }

  body(before: SchemaNode | undefined, after: SchemaNode | undefined, context: DiffContext): void {
    if (before === undefined && after === undefined) return;
    if (before === undefined && after !== undefined) {
      this.push(context, "", { kind: "body-added", required: hasRequiredFields(after), after: describeType(after) });
    } else if (before !== undefined && after === undefined) {
      this.push(context, "", { kind: "body-removed", before: describeType(before) });
    } else if (before !== undefined && after !== undefined) {
      this.nodes(before, after, context, "");
    }
  }
}

/**
 * Structural changes between two versions of the same endpoint
 */
export function diffEndpoint(before: Endpoint, after: Endpoint): SchemaChange[] {
  const collector = new ChangeCollector();

  if (before.summary !== after.summary) {
    collector.changes.push({
      location: "endpoint",
      fieldPath: "",
      kind: "summary-changed",
      ...(before.summary !== undefined && { before: before.summary }),
      ...(after.summary !== undefined && { after: after.summary }),
    });
  }

  collector.body(before.request, after.request, { location: "request" });

  const statusClasses = [
    ...new Set([...Object.keys(before.responses), ...Object.keys(after.responses)]),
  ].sort();
  for (const statusClass of statusClasses) {
    collector.body(before.responses[statusClass], after.responses[statusClass], {
      location: "response",
      statusClass,
    });
  }

  return collector.changes;
}

/**
 * Per-endpoint deltas between two endpoint sets, ordered by identity.
 * Unchanged endpoints are omitted.
 */
export function diffEndpoints(
  before: readonly Endpoint[],
  after: readonly Endpoint[],
): EndpointDelta[] {
  const previous = new Map(before.map((endpoint) => [endpointKey(endpoint), endpoint]));
  const next = new Map(after.map((endpoint) => [endpointKey(endpoint), endpoint]));
  const deltas: EndpointDelta[] = [];

  for (const [key, endpoint] of previous) {
    const identity = { method: endpoint.method, path: endpoint.path };
    const updated = next.get(key);
    if (updated === undefined) {
      deltas.push({ change: "removed", identity, endpoint });
      continue;
    }
    if (canonicalJson(canonicalizeEndpoint(endpoint)) === canonicalJson(canonicalizeEndpoint(updated))) {
      continue;
    }
    const changes = diffEndpoint(endpoint, updated);
    if (changes.length > 0) {
      deltas.push({ change: "modified", identity, before: endpoint, after: updated, changes });
    }
  }
  for (const [key, endpoint] of next) {
    if (!previous.has(key)) {
      deltas.push({ change: "added", identity: { method: endpoint.method, path: endpoint.path }, endpoint });
    }
  }

  return deltas.sort((a, b) => compareIdentity(a.identity, b.identity));
}
