/**
 * MCP Tool Registration
 *
 * Each tool runs one pipeline or service call in the server's runtime.
 * Every call is written to the audit trail first; failures come back as a
 * text result flagged `isError` and never reach the transport.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Cause, Effect, Exit } from "effect";
import { z } from "zod";
import { type FaultlineConfig, scanOptionsOf } from "../config.js";
import type { FaultlineServices } from "../layers.js";
import { assessImpact, checkBreaking, scanRepository } from "../pipeline/assess.js";
import { auditEntry, AuditSinkTag } from "../services/audit.js";
import { ContractStore } from "../services/contract-store.js";
import { ImpactGraph } from "../services/impact-graph.js";
import { ImpactReports } from "../services/impact-reports.js";
import { RepositoryRegistry } from "../services/registry.js";
import { StorageTag } from "../storage/storage.js";

/**
 * Runs an effect in the server's runtime
 */
export type ToolRunner = <A, E>(
  effect: Effect.Effect<A, E, FaultlineServices>,
) => Promise<Exit.Exit<A, unknown>>;

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

const RegisterInputSchema = z.object({
  name: z.string().min(1).describe("Unique repository name"),
  path: z.string().min(1).describe("Repository root on disk"),
  contractType: z
    .enum(["openapi", "models"])
    .optional()
    .describe("Contract source to scan; both are scanned when omitted"),
});

const RepoInputSchema = z.object({
  repo: z.string().min(1).describe("Registered repository name"),
});

const HistoryInputSchema = RepoInputSchema.extend({
  limit: z.number().int().positive().optional().describe("Most recent versions to return"),
});

const ConsumersInputSchema = z.object({
  producer: z.string().min(1).describe("Producer repository name"),
  method: z.string().min(1).optional().describe("HTTP method, or SCHEMA for models"),
  path: z.string().min(1).optional().describe("Endpoint path, or module path for models"),
});

const AddConsumerInputSchema = z.object({
  consumer: z.string().min(1).describe("Repository that calls the endpoint"),
  producer: z.string().min(1).describe("Repository that serves the endpoint"),
  method: z.string().min(1).describe("HTTP method, or SCHEMA for models"),
  path: z.string().min(1).describe("Endpoint path, or module path for models"),
});

const GraphInputSchema = z.object({});

const ContractsInputSchema = z.object({
  repo: z.string().min(1).optional().describe("Registered repository name; every repository when omitted"),
  query: z
    .string()
    .optional()
    .describe("Terms that must all appear in the method, path or summary"),
  limit: z.number().int().positive().optional().describe("Maximum endpoints to return"),
});

const ReportsInputSchema = RepoInputSchema.extend({
  limit: z.number().int().positive().optional().describe("Most recent reports to return"),
});

const AuditInputSchema = z.object({
  operation: z
    .enum(["put", "addEdge", "removeEdge", "tool"])
    .optional()
    .describe("Only entries of this operation"),
  repo: z.string().min(1).optional().describe("Only entries for this repository"),
  sinceMinutes: z.number().int().positive().optional().describe("Look back this many minutes"),
  limit: z.number().int().positive().optional().describe("Maximum entries to return"),
});

function textResult(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

function errorResult(error: unknown): ToolResult {
  const message = error instanceof Error ? error.message : String(error);
  const tag =
    typeof error === "object" && error !== null && "_tag" in error && typeof error._tag === "string"
      ? error._tag
      : "Error";
  return { content: [{ type: "text", text: JSON.stringify({ error: tag, message }) }], isError: true };
}

/**
 * Tool handlers keyed by tool name; each takes validated input
 */
export function createToolHandlers(run: ToolRunner, config: FaultlineConfig) {
  const scanOptions = scanOptionsOf(config);
  const limit = config.server.defaultQueryLimit;

  const call = async <A, E>(
    tool: string,
    repo: string,
    input: unknown,
    effect: Effect.Effect<A, E, FaultlineServices>,
  ): Promise<ToolResult> => {
    const audited = Effect.flatMap(AuditSinkTag, (audit) =>
      audit.record(auditEntry("tool", repo, `${tool} ${JSON.stringify(input)}`)),
    ).pipe(Effect.zipRight(effect));

    const exit = await run(audited);
    return Exit.isSuccess(exit) ? textResult(exit.value) : errorResult(Cause.squash(exit.cause));
  };

  return {
    faultline_register: (input: z.infer<typeof RegisterInputSchema>) =>
      call(
        "faultline_register",
        input.name,
        input,
        Effect.flatMap(RepositoryRegistry, (registry) =>
          registry.register(input.name, input.path, input.contractType),
        ),
      ),

    faultline_scan: (input: z.infer<typeof RepoInputSchema>) =>
      call(
        "faultline_scan",
        input.repo,
        input,
        scanRepository(input.repo, scanOptions).pipe(
          Effect.map((outcome) => ({
            repo: outcome.repo,
            created: outcome.created,
            sequence: outcome.version.sequence,
            contentHash: outcome.version.contentHash,
            endpointCount: outcome.endpointCount,
            warnings: outcome.warnings,
          })),
        ),
      ),

    faultline_breaking: (input: z.infer<typeof RepoInputSchema>) =>
      call(
        "faultline_breaking",
        input.repo,
        input,
        checkBreaking(input.repo, scanOptions).pipe(
          Effect.map((assessment) => ({
            repo: assessment.repo,
            hasBreaking: assessment.impact.hasBreaking,
            severities: assessment.impact.severities,
            changes: assessment.records,
            warnings: assessment.warnings,
          })),
        ),
      ),

    faultline_impact: (input: z.infer<typeof RepoInputSchema>) =>
      call(
        "faultline_impact",
        input.repo,
        input,
        assessImpact(input.repo, scanOptions).pipe(
          Effect.map((assessment) => ({
            repo: assessment.repo,
            from: assessment.delta.from,
            to: assessment.delta.to,
            consumerCount: assessment.impact.consumerCount,
            byConsumer: assessment.impact.byConsumer,
            severities: assessment.impact.severities,
            reportId: assessment.reportId,
            warnings: assessment.warnings,
          })),
        ),
      ),

    faultline_consumers: (input: z.infer<typeof ConsumersInputSchema>) =>
      call(
        "faultline_consumers",
        input.producer,
        input,
        Effect.gen(function* () {
          const graph = yield* ImpactGraph;
          if (input.method !== undefined && input.path !== undefined) {
            const consumers = yield* graph.consumersOf(input.producer, {
              method: input.method.toUpperCase(),
              path: input.path,
            });
            return { consumers };
          }
          const edges = yield* graph.edges({
            producer: input.producer,
            ...(input.method !== undefined && { method: input.method }),
            ...(input.path !== undefined && { path: input.path }),
          });
          return { edges: edges.slice(0, limit), total: edges.length };
        }),
      ),

    faultline_add_consumer: (input: z.infer<typeof AddConsumerInputSchema>) =>
      call(
        "faultline_add_consumer",
        input.consumer,
        input,
        Effect.flatMap(ImpactGraph, (graph) => graph.addEdge(input)),
      ),

    faultline_history: (input: z.infer<typeof HistoryInputSchema>) =>
      call(
        "faultline_history",
        input.repo,
        input,
        Effect.flatMap(ContractStore, (store) => store.history(input.repo)).pipe(
          Effect.map((versions) =>
            versions.slice(-(input.limit ?? limit)).map((version) => ({
              sequence: version.sequence,
              contentHash: version.contentHash,
              capturedAt: version.capturedAt,
              endpointCount: version.endpoints.length,
            })),
          ),
        ),
      ),

    faultline_graph: (input: z.infer<typeof GraphInputSchema>) =>
      call(
        "faultline_graph",
        "*",
        input,
        Effect.flatMap(ImpactGraph, (graph) => graph.dependencyMap()),
      ),

    faultline_contracts: (input: z.infer<typeof ContractsInputSchema>) =>
      call(
        "faultline_contracts",
        input.repo ?? "*",
        input,
        Effect.flatMap(ContractStore, (store) =>
          store.searchEndpoints({
            ...(input.repo !== undefined && { repo: input.repo }),
            ...(input.query !== undefined && { text: input.query }),
          }),
        ).pipe(
          Effect.map((matches) => ({
            endpoints: matches.slice(0, input.limit ?? limit).map(({ repo, endpoint }) => ({
              repo,
              method: endpoint.method,
              path: endpoint.path,
              ...(endpoint.summary !== undefined && { summary: endpoint.summary }),
            })),
            total: matches.length,
          })),
        ),
      ),

    faultline_reports: (input: z.infer<typeof ReportsInputSchema>) =>
      call(
        "faultline_reports",
        input.repo,
        input,
        Effect.flatMap(ImpactReports, (reports) => reports.list(input.repo, input.limit ?? limit)).pipe(
          Effect.map((saved) =>
            saved.map((entry) => ({
              id: entry.id,
              versionHash: entry.versionHash,
              createdAt: entry.createdAt,
              consumerCount: entry.report.consumerCount,
              severities: entry.report.severities,
            })),
          ),
        ),
      ),

    faultline_audit: (input: z.infer<typeof AuditInputSchema>) =>
      call(
        "faultline_audit",
        input.repo ?? "*",
        input,
        Effect.flatMap(StorageTag, (storage) =>
          storage.queryAudit({
            ...(input.operation !== undefined && { operation: input.operation }),
            ...(input.repo !== undefined && { repo: input.repo }),
            ...(input.sinceMinutes !== undefined && {
              since: new Date(Date.now() - input.sinceMinutes * 60_000).toISOString(),
            }),
            limit: input.limit ?? limit,
          }),
        ),
      ),
  };
}

export type ToolHandlers = ReturnType<typeof createToolHandlers>;

/**
 * Register all tools with the MCP server
 */
export function registerTools(server: McpServer, handlers: ToolHandlers): void {
  server.tool(
    "faultline_register",
    "Register a repository (name → root path) so it can be scanned and referenced by consumer edges.",
    RegisterInputSchema.shape,
    handlers.faultline_register,
  );
  server.tool(
    "faultline_scan",
    "Scan a registered repository and store its contract as a new version when it changed.",
    RepoInputSchema.shape,
    handlers.faultline_scan,
  );
  server.tool(
    "faultline_breaking",
    "Compare a repository's current files against its latest stored contract without saving, and classify every change as breaking, warning or info.",
    RepoInputSchema.shape,
    handlers.faultline_breaking,
  );
  server.tool(
    "faultline_impact",
    "Scan and store a repository, then list the consumers affected by each change since the previous version.",
    RepoInputSchema.shape,
    handlers.faultline_impact,
  );
  server.tool(
    "faultline_consumers",
    "List the repositories that call a producer's endpoint, or every consumer edge onto the producer when no endpoint is given.",
    ConsumersInputSchema.shape,
    handlers.faultline_consumers,
  );
  server.tool(
    "faultline_add_consumer",
    "Record that a consumer repository calls an endpoint of a producer repository.",
    AddConsumerInputSchema.shape,
    handlers.faultline_add_consumer,
  );
  server.tool(
    "faultline_history",
    "List the stored contract versions of a repository, oldest first.",
    HistoryInputSchema.shape,
    handlers.faultline_history,
  );
  server.tool(
    "faultline_graph",
    "Show which registered repositories depend on which.",
    GraphInputSchema.shape,
    handlers.faultline_graph,
  );
  server.tool(
    "faultline_contracts",
    "Search the endpoints of the latest stored contracts by method, path or summary.",
    ContractsInputSchema.shape,
    handlers.faultline_contracts,
  );
  server.tool(
    "faultline_reports",
    "List the saved impact reports of a repository, newest first.",
    ReportsInputSchema.shape,
    handlers.faultline_reports,
  );
  server.tool(
    "faultline_audit",
    "Query the audit trail of contract writes, edge changes and tool calls, newest first.",
    AuditInputSchema.shape,
    handlers.faultline_audit,
  );
}
