/**
 * Repository loader - discovers contract documents and model sources under
 * a repository root and turns them into endpoints.
 *
 * One bad file never aborts a scan: every failure becomes a warning and the
 * remaining files are still analyzed.
 */

import { readFile, stat } from "node:fs/promises";
import * as path from "node:path";
import { glob } from "glob";
import { ScannerDefaults } from "../constants.js";
import {
  type AnalysisWarning,
  MalformedContractError,
  toWarning,
  UnparsableSourceError,
} from "../errors.js";
import { type Endpoint, endpointKey } from "../graph/contract.js";
import { parseContractDocument } from "../parser/document-loader.js";
import { collectExternalRefs } from "../parser/json-pointer.js";
import { extractModels } from "../parser/model-extractor.js";
import { resolveContractDocument } from "../parser/schema-resolver.js";
import type { ContractType } from "../types.js";

/**
 * Options for loading a repository
 */
export interface ScanOptions {
  /** Globs for contract documents, relative to the root */
  documentPatterns?: readonly string[];
  /** Directories searched for model sources */
  modelDirs?: readonly string[];
  /** Base-class names that mark a model */
  modelMarkers?: readonly string[];
  /** Patterns to ignore */
  ignore?: readonly string[];
  /** Restrict to one contract source; both are scanned when absent */
  contractType?: ContractType;
}

/**
 * Result of loading a repository
 */
export interface ScanResult {
  endpoints: Endpoint[];
  warnings: AnalysisWarning[];
  /** Files analyzed, relative to the root */
  files: string[];
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRemote(uri: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(uri);
}

async function findFiles(
  root: string,
  patterns: readonly string[],
  ignore: readonly string[],
): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    const matches = await glob(pattern, {
      cwd: root,
      ignore: [...ignore],
      nodir: true,
      posix: true,
    });
    files.push(...matches);
  }
  return [...new Set(files)].sort();
}

/**
 * Load a contract document and every document it references, transitively
 */
async function loadDocumentSet(
  root: string,
  uri: string,
  cache: Map<string, unknown>,
  warnings: AnalysisWarning[],
): Promise<void> {
  const pending = [uri];
  while (pending.length > 0) {
    const next = pending.shift();
    if (next === undefined || cache.has(next) || isRemote(next)) continue;

    let text: string;
    try {
      text = await readFile(path.join(root, next), "utf-8");
    } catch (err) {
      if (next === uri) throw err;
      // Missing external documents surface as unresolved references
      continue;
    }

    try {
      const document = parseContractDocument(text, next);
      cache.set(next, document.root);
      pending.push(...collectExternalRefs(document.root, next));
    } catch (err) {
      if (next === uri) throw err;
      if (err instanceof MalformedContractError) warnings.push(toWarning(err, next));
      else warnings.push({ kind: "ReadError", file: next, message: describeError(err) });
    }
  }
}

async function loadDocuments(
  root: string,
  files: readonly string[],
  warnings: AnalysisWarning[],
): Promise<Endpoint[]> {
  const cache = new Map<string, unknown>();
  const endpoints: Endpoint[] = [];

  for (const file of files) {
    try {
      await loadDocumentSet(root, file, cache, warnings);
      const result = resolveContractDocument(
        { uri: file, root: cache.get(file) },
        { externalDocuments: cache },
      );
      endpoints.push(...result.endpoints.values());
      warnings.push(...result.warnings.map((warning) => toWarning(warning, file)));
    } catch (err) {
      warnings.push(
        err instanceof MalformedContractError
          ? toWarning(err, file)
          : { kind: "ReadError", file, message: `Failed to load ${file}: ${describeError(err)}` },
      );
    }
  }

  return endpoints;
}

async function loadModels(
  root: string,
  files: readonly string[],
  markers: readonly string[],
  warnings: AnalysisWarning[],
): Promise<Endpoint[]> {
  const endpoints: Endpoint[] = [];
  for (const file of files) {
    try {
      const content = await readFile(path.join(root, file), "utf-8");
      endpoints.push(...extractModels(content, { fileName: file, markers }));
    } catch (err) {
      warnings.push(
        err instanceof UnparsableSourceError
          ? toWarning(err, file)
          : { kind: "ReadError", file, message: `Failed to load ${file}: ${describeError(err)}` },
      );
    }
  }
  return endpoints;
}

/**
 * Load every endpoint a repository declares
 */
export async function loadEndpoints(root: string, options: ScanOptions = {}): Promise<ScanResult> {
  const documentPatterns = options.documentPatterns ?? ScannerDefaults.documentPatterns;
  const modelDirs = options.modelDirs ?? ScannerDefaults.modelDirs;
  const markers = options.modelMarkers ?? ScannerDefaults.modelMarkers;
  const ignore = options.ignore ?? ScannerDefaults.ignore;
  const warnings: AnalysisWarning[] = [];

  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      return { endpoints: [], warnings: [{ kind: "ReadError", message: `Not a directory: ${root}` }], files: [] };
    }
  } catch (err) {
    return {
      endpoints: [],
      warnings: [{ kind: "ReadError", message: `Cannot read ${root}: ${describeError(err)}` }],
      files: [],
    };
  }

  let documentFiles: string[] = [];
  let modelFiles: string[] = [];
  try {
    if (options.contractType !== "models") {
      documentFiles = await findFiles(root, documentPatterns, ignore);
    }
    if (options.contractType !== "openapi") {
      const modelPatterns = modelDirs.map(
        (dir) => `${dir.replace(/\/+$/, "")}/**/*.{${ScannerDefaults.modelExtensions}}`,
      );
      modelFiles = await findFiles(root, modelPatterns, ignore);
    }
  } catch (err) {
    warnings.push({ kind: "ReadError", message: `File discovery failed: ${describeError(err)}` });
  }

  const found = [
    ...(await loadDocuments(root, documentFiles, warnings)),
    ...(await loadModels(root, modelFiles, markers, warnings)),
  ];

  // First declaration of an identity wins; files are visited in sorted order
  const unique = new Map<string, Endpoint>();
  for (const endpoint of found) {
    const key = endpointKey(endpoint);
    if (unique.has(key)) {
      warnings.push({ kind: "DuplicateEndpoint", message: `Duplicate endpoint ${key} ignored` });
      continue;
    }
    unique.set(key, endpoint);
  }

  return {
    endpoints: [...unique.values()],
    warnings,
    files: [...documentFiles, ...modelFiles],
  };
}
