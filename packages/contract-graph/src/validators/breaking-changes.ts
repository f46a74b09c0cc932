/**
 * Breaking Changes Classifier - labels structural deltas as breaking,
 * warning or info.
 *
 * Request and response sides are evaluated with opposite polarity: the
 * producer controls response shape, the consumer controls request shape.
 * The rule table below is the classifier's entire decision surface.
 */

import {
  type EndpointIdentity,
  endpointKey,
  compareIdentity,
} from "../graph/contract.js";
import type { EndpointDelta, SchemaChange } from "../diff/schema-diff.js";

export type Severity = "breaking" | "warning" | "info";

export type ChangeDirection = "request" | "response" | "endpoint";

/**
 * What happened to the element at the field path
 */
export type ChangeKind = "added" | "removed" | "modified";

export type ChangeRule =
  | "endpoint-removed"
  | "endpoint-added"
  | "field-added"
  | "required-field-added"
  | "field-removed"
  | "required-to-optional"
  | "optional-to-required"
  | "type-changed"
  | "type-widened"
  | "description-only";

/**
 * A classified change to one element of one endpoint
 */
export interface ChangeRecord {
  endpoint: EndpointIdentity;
  /** Dotted field path; empty for the body or the endpoint itself */
  fieldPath: string;
  changeKind: ChangeKind;
  rule: ChangeRule;
  severity: Severity;
  direction: ChangeDirection;
  /** Response status class for response-side records */
  statusClass?: string;
  description: string;
}

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  breaking: 2,
  warning: 1,
  info: 0,
};

type RuleRow = Readonly<Record<ChangeDirection, Severity>>;

/**
 * Severity of each rule by direction
 */
export const RULES: Readonly<Record<ChangeRule, RuleRow>> = {
  "endpoint-removed": { request: "breaking", response: "breaking", endpoint: "breaking" },
  "endpoint-added": { request: "info", response: "info", endpoint: "info" },
  "field-added": { request: "info", response: "info", endpoint: "info" },
  "required-field-added": { request: "breaking", response: "info", endpoint: "info" },
  "field-removed": { request: "info", response: "breaking", endpoint: "breaking" },
  "required-to-optional": { request: "info", response: "warning", endpoint: "info" },
  "optional-to-required": { request: "breaking", response: "info", endpoint: "info" },
  "type-changed": { request: "breaking", response: "breaking", endpoint: "breaking" },
  "type-widened": { request: "info", response: "warning", endpoint: "info" },
  "description-only": { request: "info", response: "info", endpoint: "info" },
};

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/**
 * Map a structural change onto its rule
 */
export function ruleFor(change: SchemaChange): ChangeRule {
  switch (change.kind) {
    case "field-added":
    case "body-added":
      return change.required ? "required-field-added" : "field-added";
    case "field-removed":
    case "body-removed":
      return "field-removed";
    case "optionality-changed":
    case "nullability-changed":
      return change.relaxed ? "required-to-optional" : "optional-to-required";
    case "type-changed":
    case "type-narrowed":
    case "branch-removed":
      return "type-changed";
    case "type-widened":
    case "branch-added":
      return "type-widened";
    case "description-changed":
    case "summary-changed":
      return "description-only";
  }
}

function changeKindOf(change: SchemaChange): ChangeKind {
  switch (change.kind) {
    case "field-added":
    case "body-added":
    case "branch-added":
      return "added";
    case "field-removed":
    case "body-removed":
    case "branch-removed":
      return "removed";
    default:
      return "modified";
  }
}

function describeLocation(change: SchemaChange): string {
  if (change.location === "request") return "request body";
  if (change.location === "response") return `${change.statusClass ?? "default"} response`;
  return "endpoint";
}

function describeChange(change: SchemaChange): string {
  const field = change.fieldPath ? `'${change.fieldPath}'` : "body";
  const where = describeLocation(change);
  const transition =
    change.before !== undefined && change.after !== undefined
      ? ` from ${change.before} to ${change.after}`
      : "";

  switch (change.kind) {
    case "field-added":
      return `${change.required ? "Required" : "Optional"} field ${field} added to ${where}`;
    case "field-removed":
      return `Field ${field} removed from ${where}`;
    case "body-added":
      return `Body added to ${where}`;
    case "body-removed":
      return `Body removed from ${where}`;
    case "optionality-changed":
      return `Field ${field} in ${where} became ${change.relaxed ? "optional" : "required"}`;
    case "nullability-changed":
      return `Field ${field} in ${where} became ${change.relaxed ? "nullable" : "non-nullable"}`;
    case "type-changed":
      return `Type of ${field} in ${where} changed${transition}`;
    case "type-narrowed":
      return `Type of ${field} in ${where} narrowed${transition}`;
    case "type-widened":
      return `Type of ${field} in ${where} widened${transition}`;
    case "branch-added":
      return `Union ${field} in ${where} gained branch ${change.after ?? ""}`.trimEnd();
    case "branch-removed":
      return `Union ${field} in ${where} lost branch ${change.before ?? ""}`.trimEnd();
    case "description-changed":
      return `Description of ${field} in ${where} changed`;
    case "summary-changed":
      return "Summary changed";
  }
}

/**
 * Classify one structural change
 */
export function classifyChange(endpoint: EndpointIdentity, change: SchemaChange): ChangeRecord {
  const rule = ruleFor(change);
  return {
    endpoint,
    fieldPath: change.fieldPath,
    changeKind: changeKindOf(change),
    rule,
    severity: RULES[rule][change.location],
    direction: change.location,
    ...(change.statusClass !== undefined && { statusClass: change.statusClass }),
    description: describeChange(change),
  };
}

function recordKey(record: ChangeRecord): string {
  return [endpointKey(record.endpoint), record.direction, record.statusClass ?? "", record.fieldPath].join("|");
}

function compareRecords(a: ChangeRecord, b: ChangeRecord): number {
  return (
    compareIdentity(a.endpoint, b.endpoint) ||
    a.direction.localeCompare(b.direction) ||
    (a.statusClass ?? "").localeCompare(b.statusClass ?? "") ||
    a.fieldPath.localeCompare(b.fieldPath)
  );
}

/**
 * Classify a delta set. When several changes hit the same field of the same
 * body, only the most severe survives (breaking > warning > info).
 */
export function classifyChanges(deltas: readonly EndpointDelta[]): ChangeRecord[] {
  const winners = new Map<string, ChangeRecord>();
  const keep = (record: ChangeRecord) => {
    const key = recordKey(record);
    const current = winners.get(key);
    if (!current || compareSeverity(record.severity, current.severity) > 0) {
      winners.set(key, record);
    }
  };

  for (const delta of deltas) {
    const label = endpointKey(delta.identity);
    switch (delta.change) {
      case "removed":
        keep({
          endpoint: delta.identity,
          fieldPath: "",
          changeKind: "removed",
          rule: "endpoint-removed",
          severity: RULES["endpoint-removed"].endpoint,
          direction: "endpoint",
          description: `Endpoint ${label} removed`,
        });
        break;
      case "added":
        keep({
          endpoint: delta.identity,
          fieldPath: "",
          changeKind: "added",
          rule: "endpoint-added",
          severity: RULES["endpoint-added"].endpoint,
          direction: "endpoint",
          description: `Endpoint ${label} added`,
        });
        break;
      case "modified":
        for (const change of delta.changes) {
          keep(classifyChange(delta.identity, change));
        }
        break;
    }
  }

  return [...winners.values()].sort(compareRecords);
}

export function hasBreakingChanges(records: readonly ChangeRecord[]): boolean {
  return records.some((record) => record.severity === "breaking");
}

export function summarizeSeverities(records: readonly ChangeRecord[]): Record<Severity, number> {
  const summary: Record<Severity, number> = { breaking: 0, warning: 0, info: 0 };
  for (const record of records) {
    summary[record.severity] += 1;
  }
  return summary;
}

/**
 * Most severe level in a record set, or undefined when empty
 */
export function highestSeverity(records: readonly ChangeRecord[]): Severity | undefined {
  let highest: Severity | undefined;
  for (const record of records) {
    if (highest === undefined || compareSeverity(record.severity, highest) > 0) {
      highest = record.severity;
    }
  }
  return highest;
}
