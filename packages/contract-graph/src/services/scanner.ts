/**
 * Scanner - reads a registered repository from disk into endpoints.
 * All file I/O of a scan happens here; the core receives in-memory data.
 */

import { Effect } from "effect";
import { loadEndpoints, type ScanOptions } from "../scanner/loader.js";
import type { RepoInfo } from "../types.js";

export class Scanner extends Effect.Service<Scanner>()("Scanner", {
  succeed: {
    /**
     * Scan a repository; the repository's own contract type takes precedence
     */
    scan: (repo: RepoInfo, options: ScanOptions = {}) =>
      Effect.promise(() =>
        loadEndpoints(repo.path, {
          ...options,
          ...(repo.contractType !== undefined && { contractType: repo.contractType }),
        }),
      ).pipe(
        Effect.tap((result) =>
          Effect.forEach(result.warnings, (warning) =>
            Effect.logWarning(
              `[Scanner] ${repo.name}${warning.file ? ` ${warning.file}` : ""}: ${warning.message}`,
            ),
          ),
        ),
        Effect.tap((result) =>
          Effect.logDebug(
            `[Scanner] ${repo.name}: ${result.endpoints.length} endpoints from ${result.files.length} files`,
          ),
        ),
      ),
  },
}) {}

export const ScannerLive = Scanner.Default;
