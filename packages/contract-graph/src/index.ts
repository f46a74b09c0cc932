/**
 * Contract Graph - cross-repository API contract versioning, breaking-change
 * classification and consumer impact analysis.
 *
 * Contracts come from OpenAPI/Swagger documents or from model classes in
 * TypeScript sources. Each scan is normalized, content-addressed and stored
 * as a version; consecutive versions are diffed, every change is classified
 * by direction, and the result is mapped onto the repositories registered as
 * consumers of the changed endpoints.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { assessImpact, createMemoryLayer, ImpactGraph, RepositoryRegistry } from "@faultline/contract-graph";
 *
 * const program = Effect.gen(function* () {
 *   const registry = yield* RepositoryRegistry;
 *   const graph = yield* ImpactGraph;
 *   yield* registry.register("billing", "./services/billing");
 *   yield* registry.register("storefront", "./apps/storefront");
 *   yield* graph.addEdge({ consumer: "storefront", producer: "billing", method: "GET", path: "/invoices/{id}" });
 *   return yield* assessImpact("billing");
 * });
 *
 * const assessment = await Effect.runPromise(program.pipe(Effect.provide(createMemoryLayer())));
 * console.log(assessment.impact.byConsumer);
 * ```
 */

// Errors
export {
  MalformedContractError,
  UnparsableSourceError,
  UnresolvedReferenceError,
  VersionConflictError,
  UnknownRepositoryError,
  UnknownVersionError,
  StorageError,
  type AnalysisWarning,
  toWarning,
} from "./errors.js";

// Canonical schema model
export {
  type SchemaNode,
  type SchemaKind,
  type PrimitiveNode,
  type PrimitiveType,
  type ObjectNode,
  type ArrayNode,
  type UnionNode,
  type CycleNode,
  type EnumValue,
  type UnionCombinator,
  primitive,
  unknownNode,
  objectNode,
  arrayNode,
  unionNode,
  cycleMarker,
  describeType,
  visitSchema,
  hasRequiredFields,
} from "./schema/schema-node.js";

export {
  canonicalJson,
  canonicalizeNode,
  canonicalizeEndpoint,
  canonicalizeEndpoints,
  hashEndpoints,
} from "./schema/canonical.js";

export {
  SchemaNodeSchema,
  EndpointSchema,
  EndpointListSchema,
  ChangeRecordSchema,
  ImpactReportSchema,
} from "./schema/schemas.js";

// Contracts and endpoints
export {
  HTTP_METHODS,
  MODEL_METHOD,
  MODEL_RESPONSE_KEY,
  type HttpMethod,
  type EndpointIdentity,
  type Endpoint,
  type Contract,
  endpointKey,
  compareIdentity,
  statusClassOf,
} from "./graph/contract.js";

export {
  type ConsumerEdge,
  createEdge,
  edgeKey,
  describeEdge,
} from "./graph/consumer-edge.js";

export { DependencyGraph, type RepoDependencies } from "./graph/graph.js";

// Parsing
export { parseContractDocument } from "./parser/document-loader.js";

export {
  resolveContractDocument,
  pickMediaType,
  type ContractDocument,
  type ResolveOptions,
  type ResolveResult,
  type ResolveWarning,
} from "./parser/schema-resolver.js";

export {
  extractModels,
  modulePathOf,
  DEFAULT_MODEL_MARKERS,
  type ExtractOptions,
} from "./parser/model-extractor.js";

// Diff and classification
export {
  type SchemaChange,
  type SchemaChangeKind,
  type ChangeLocation,
  type EndpointDelta,
  type ContractDelta,
  diffEndpoint,
  diffEndpoints,
} from "./diff/schema-diff.js";

export {
  type Severity,
  type ChangeDirection,
  type ChangeKind,
  type ChangeRule,
  type ChangeRecord,
  SEVERITY_RANK,
  RULES,
  compareSeverity,
  ruleFor,
  classifyChange,
  classifyChanges,
  hasBreakingChanges,
  summarizeSeverities,
  highestSeverity,
} from "./validators/breaking-changes.js";

// Impact
export {
  ImpactAnalyzer,
  type ImpactReport,
  type ImpactedChange,
  type SavedReport,
  actionableChanges,
} from "./query/impact-analyzer.js";

// Scanning
export { loadEndpoints, type ScanOptions, type ScanResult } from "./scanner/loader.js";

// Services
export {
  ContractStore,
  ContractStoreLive,
  type ContractInput,
  type PutResult,
  type EndpointQuery,
  type EndpointMatch,
  matchesEndpointText,
  MIN_HASH_PREFIX,
  diffContracts,
  resolveVersionRef,
} from "./services/contract-store.js";

export { ImpactGraph, ImpactGraphLive, type EdgeInput } from "./services/impact-graph.js";
export { ImpactReports, ImpactReportsLive } from "./services/impact-reports.js";
export { RepositoryRegistry, RepositoryRegistryLive } from "./services/registry.js";
export { RepositoryLocks, RepositoryLocksLive } from "./services/repository-locks.js";
export { Scanner, ScannerLive } from "./services/scanner.js";
export {
  type AuditSink,
  AuditSinkTag,
  auditEntry,
  StorageAuditSinkLive,
} from "./services/audit.js";

// Storage
export {
  type Storage,
  type NewVersion,
  type EdgeFilter,
  StorageTag,
  matchesEdgeFilter,
} from "./storage/storage.js";
export { makeMemoryStorage, MemoryStorageLive } from "./storage/memory-storage.js";
export { openDatabase, makeSqliteStorage, SqliteStorageLive } from "./storage/sqlite-storage.js";

// Pipeline
export {
  scanRepository,
  checkBreaking,
  assessImpact,
  type ScanOutcome,
  type Assessment,
} from "./pipeline/assess.js";

export { createFaultlineLayer, createMemoryLayer, type FaultlineServices } from "./layers.js";

// Configuration and logging
export {
  type FaultlineConfig,
  type FaultlineLogLevel,
  type ConfigFile,
  LOG_LEVELS,
  loadConfig,
  databasePath,
  scanOptionsOf,
  defaultConfigFile,
} from "./config.js";
export { createLoggerLayer, formatLogLine } from "./logging.js";

// Reports
export {
  formatChangeRecord,
  formatChangeRecords,
  formatImpactReport,
  formatHistory,
  formatDelta,
  formatDependencyMap,
  formatEdges,
  formatWarnings,
  formatAudit,
  formatEndpointMatches,
  formatReports,
  shortHash,
} from "./generators/markdown.js";

// Protocol server
export { createToolHandlers, registerTools, type ToolHandlers, type ToolRunner, type ToolResult } from "./mcp/tools.js";
export { createServer, startServer } from "./mcp/server.js";

export type { ContractType, RepoInfo, AuditOperation, AuditRecord, AuditQuery } from "./types.js";
export { FaultlinePaths, ScannerDefaults, ServerDefaults, SCHEMA_VERSION } from "./constants.js";
