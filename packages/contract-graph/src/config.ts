/**
 * Configuration
 *
 * Loads `.faultline/config.json` from the project directory, applies
 * FAULTLINE_* environment overrides, and fills in defaults.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Either } from "effect";
import { z } from "zod";
import { FaultlinePaths, ScannerDefaults, ServerDefaults } from "./constants.js";
import type { ScanOptions } from "./scanner/loader.js";

export const LOG_LEVELS = ["debug", "info", "warning", "error", "none"] as const;

export type FaultlineLogLevel = (typeof LOG_LEVELS)[number];

export interface FaultlineConfig {
  /** Directory the data directory lives in */
  projectPath: string;
  /** Absolute path of the data directory */
  dataDir: string;
  store: {
    /** Database file name inside the data directory, or ":memory:" */
    dbName: string;
  };
  scanner: {
    documentPatterns: string[];
    modelDirs: string[];
    modelMarkers: string[];
    ignore: string[];
  };
  server: {
    /** Maximum rows returned by list-style tool calls */
    defaultQueryLimit: number;
  };
  logLevel: FaultlineLogLevel;
}

/**
 * Shape of `.faultline/config.json`; every key is optional
 */
const ConfigFileSchema = z
  .object({
    store: z.object({ dbName: z.string().min(1).optional() }).strict().optional(),
    scanner: z
      .object({
        documentPatterns: z.array(z.string().min(1)).optional(),
        modelDirs: z.array(z.string().min(1)).optional(),
        modelMarkers: z.array(z.string().min(1)).optional(),
        ignore: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    server: z
      .object({ defaultQueryLimit: z.number().int().positive().optional() })
      .strict()
      .optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function readConfigFile(file: string): Either.Either<ConfigFile, string> {
  if (!fs.existsSync(file)) {
    return Either.right({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (error) {
    return Either.left(
      `Failed to read ${file}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  return parsed.success
    ? Either.right(parsed.data)
    : Either.left(`Invalid ${file}: ${formatIssues(parsed.error)}`);
}

function isLogLevel(value: string): value is FaultlineLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load configuration for a project directory
 */
export function loadConfig(
  projectPath: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): Either.Either<FaultlineConfig, string> {
  const root = path.resolve(projectPath);
  const dataDir = path.join(root, FaultlinePaths.base);

  const file = readConfigFile(path.join(dataDir, FaultlinePaths.configFile));
  if (Either.isLeft(file)) {
    return Either.left(file.left);
  }
  const fromFile = file.right;

  let defaultQueryLimit =
    fromFile.server?.defaultQueryLimit ?? ServerDefaults.defaultQueryLimit;
  if (env.FAULTLINE_DEFAULT_QUERY_LIMIT) {
    const limit = Number(env.FAULTLINE_DEFAULT_QUERY_LIMIT);
    if (!Number.isInteger(limit) || limit <= 0) {
      return Either.left(
        `FAULTLINE_DEFAULT_QUERY_LIMIT must be a positive integer, got '${env.FAULTLINE_DEFAULT_QUERY_LIMIT}'`,
      );
    }
    defaultQueryLimit = limit;
  }

  let logLevel: FaultlineLogLevel = fromFile.logLevel ?? "info";
  if (env.FAULTLINE_LOG_LEVEL) {
    const level = env.FAULTLINE_LOG_LEVEL.trim().toLowerCase();
    if (!isLogLevel(level)) {
      return Either.left(
        `FAULTLINE_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got '${env.FAULTLINE_LOG_LEVEL}'`,
      );
    }
    logLevel = level;
  }

  const envMarkers = env.FAULTLINE_MODEL_MARKERS?.split(",")
    .map((marker) => marker.trim())
    .filter((marker) => marker.length > 0);

  return Either.right({
    projectPath: root,
    dataDir,
    store: {
      dbName: env.FAULTLINE_DB_NAME || fromFile.store?.dbName || FaultlinePaths.dbFile,
    },
    scanner: {
      documentPatterns: fromFile.scanner?.documentPatterns ?? [...ScannerDefaults.documentPatterns],
      modelDirs: fromFile.scanner?.modelDirs ?? [...ScannerDefaults.modelDirs],
      modelMarkers:
        envMarkers && envMarkers.length > 0
          ? envMarkers
          : (fromFile.scanner?.modelMarkers ?? [...ScannerDefaults.modelMarkers]),
      ignore: fromFile.scanner?.ignore ?? [...ScannerDefaults.ignore],
    },
    server: { defaultQueryLimit },
    logLevel,
  });
}

/**
 * Database location for a configuration
 */
export function databasePath(config: FaultlineConfig): string {
  return config.store.dbName === ":memory:"
    ? ":memory:"
    : path.join(config.dataDir, config.store.dbName);
}

export function scanOptionsOf(config: FaultlineConfig): ScanOptions {
  return { ...config.scanner };
}

/**
 * Contents written by `faultline init`
 */
export function defaultConfigFile(): ConfigFile {
  return {
    store: { dbName: FaultlinePaths.dbFile },
    scanner: {
      documentPatterns: [...ScannerDefaults.documentPatterns],
      modelDirs: [...ScannerDefaults.modelDirs],
      modelMarkers: [...ScannerDefaults.modelMarkers],
      ignore: [...ScannerDefaults.ignore],
    },
    server: { defaultQueryLimit: ServerDefaults.defaultQueryLimit },
    logLevel: "info",
  };
}
