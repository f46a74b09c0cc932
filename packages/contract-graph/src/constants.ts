/**
 * Constants and configuration defaults
 */

/**
 * Default paths (relative to the project directory)
 */
export const FaultlinePaths = {
  /** Data directory */
  base: ".faultline",
  /** Configuration file inside the data directory */
  configFile: "config.json",
  /** Database file name */
  dbFile: "faultline.db",
} as const;

/**
 * Default scanner configuration
 */
export const ScannerDefaults = {
  documentPatterns: [
    "**/openapi.{yaml,yml,json}",
    "**/swagger.{yaml,yml,json}",
  ],
  modelDirs: ["src", "app", "lib"],
  modelExtensions: "ts,tsx,mts,cts",
  modelMarkers: ["BaseModel"],
  ignore: ["**/node_modules/**", "**/dist/**", "**/.git/**", "**/*.d.ts"],
} as const;

/**
 * Default protocol server configuration
 */
export const ServerDefaults = {
  /** Maximum rows returned by list-style queries */
  defaultQueryLimit: 50,
} as const;

/**
 * Schema version recorded in the `meta` table
 */
export const SCHEMA_VERSION = 1;

/**
 * SQLite schema
 */
export const SqliteSchema = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS repos (
  name TEXT PRIMARY KEY,
  path TEXT NOT NULL,
  contract_type TEXT,
  registered_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS contract_versions (
  repo TEXT NOT NULL REFERENCES repos(name) ON DELETE CASCADE,
  seq INTEGER NOT NULL,
  hash TEXT NOT NULL,
  endpoints TEXT NOT NULL,
  captured_at TEXT NOT NULL,
  PRIMARY KEY (repo, seq),
  UNIQUE (repo, hash, seq)
);

CREATE INDEX IF NOT EXISTS idx_versions_hash ON contract_versions(repo, hash);

CREATE TABLE IF NOT EXISTS consumers (
  consumer TEXT NOT NULL,
  producer TEXT NOT NULL,
  method TEXT NOT NULL,
  path TEXT NOT NULL,
  registered_at TEXT NOT NULL,
  PRIMARY KEY (consumer, producer, method, path)
);

CREATE INDEX IF NOT EXISTS idx_consumers_producer ON consumers(producer, method, path);

CREATE TABLE IF NOT EXISTS impact_reports (
  id TEXT PRIMARY KEY,
  repo TEXT NOT NULL REFERENCES repos(name) ON DELETE CASCADE,
  version_hash TEXT NOT NULL,
  created_at TEXT NOT NULL,
  report TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_reports_repo ON impact_reports(repo, created_at);

CREATE TABLE IF NOT EXISTS audit_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  operation TEXT NOT NULL,
  repo TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  detail TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_repo ON audit_log(repo);
`;
