/**
 * Zod schemas for stored contract data.
 * Used to validate endpoint sets and impact reports read back from
 * persistent storage.
 */

import { z } from "zod";
import type { Endpoint } from "../graph/contract.js";
import type { ImpactReport } from "../query/impact-analyzer.js";
import type { ChangeRecord } from "../validators/breaking-changes.js";
import type { SchemaNode } from "./schema-node.js";

const metaShape = {
  nullable: z.boolean(),
  description: z.string().optional(),
};

export const EnumValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const SchemaNodeSchema: z.ZodType<SchemaNode> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("primitive"),
      type: z.enum(["string", "integer", "number", "boolean", "null", "unknown"]),
      format: z.string().optional(),
      enum: z.array(EnumValueSchema).optional(),
      ...metaShape,
    }),
    z.object({
      kind: z.literal("object"),
      properties: z.record(SchemaNodeSchema),
      required: z.array(z.string()),
      ...metaShape,
    }),
    z.object({
      kind: z.literal("array"),
      items: SchemaNodeSchema,
      ...metaShape,
    }),
    z.object({
      kind: z.literal("union"),
      combinator: z.enum(["anyOf", "oneOf"]),
      branches: z.array(SchemaNodeSchema),
      ...metaShape,
    }),
    z.object({
      kind: z.literal("cycle"),
      ref: z.string(),
      ...metaShape,
    }),
  ]),
);

export const EndpointSchema: z.ZodType<Endpoint> = z.object({
  method: z.string().min(1),
  path: z.string().min(1),
  summary: z.string().optional(),
  request: SchemaNodeSchema.optional(),
  responses: z.record(SchemaNodeSchema),
});

export const EndpointListSchema = z.array(EndpointSchema);

const SeveritySchema = z.enum(["breaking", "warning", "info"]);

export const ChangeRecordSchema: z.ZodType<ChangeRecord> = z.object({
  endpoint: z.object({ method: z.string(), path: z.string() }),
  fieldPath: z.string(),
  changeKind: z.enum(["added", "removed", "modified"]),
  rule: z.enum([
    "endpoint-removed",
    "endpoint-added",
    "field-added",
    "required-field-added",
    "field-removed",
    "required-to-optional",
    "optional-to-required",
    "type-changed",
    "type-widened",
    "description-only",
  ]),
  severity: SeveritySchema,
  direction: z.enum(["request", "response", "endpoint"]),
  statusClass: z.string().optional(),
  description: z.string(),
});

export const ImpactReportSchema: z.ZodType<ImpactReport> = z.object({
  producer: z.string(),
  changes: z.array(
    z.object({
      record: ChangeRecordSchema,
      affectedConsumers: z.array(z.string()),
      actionable: z.boolean(),
    }),
  ),
  byConsumer: z.record(z.array(ChangeRecordSchema)),
  consumerCount: z.number().int(),
  severities: z.object({ breaking: z.number(), warning: z.number(), info: z.number() }),
  hasBreaking: z.boolean(),
});
