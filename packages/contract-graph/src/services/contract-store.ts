/**
 * Contract Store - content-addressed, append-only version history per
 * repository, with structural diffs between any two versions.
 */

import { Effect } from "effect";
import { UnknownVersionError } from "../errors.js";
import { type Contract, type Endpoint, endpointKey } from "../graph/contract.js";
import { type ContractDelta, diffEndpoints, type EndpointDelta } from "../diff/schema-diff.js";
import { canonicalizeEndpoints, hashEndpoints } from "../schema/canonical.js";
import { StorageTag } from "../storage/storage.js";
import { auditEntry, AuditSinkTag } from "./audit.js";
import { RepositoryLocks } from "./repository-locks.js";
import { RepositoryRegistry } from "./registry.js";

/**
 * Input to `put`: the scanned endpoint set
 */
export interface ContractInput {
  endpoints: readonly Endpoint[];
  capturedAt?: Date;
}

export interface PutResult {
  version: Contract;
  /** False when the content matched the latest version */
  created: boolean;
}

export interface EndpointQuery {
  /** Restrict to one repository; every registered repository otherwise */
  repo?: string;
  /** Whitespace-separated terms, all of which must appear in the method, path or summary */
  text?: string;
  limit?: number;
}

export interface EndpointMatch {
  repo: string;
  endpoint: Endpoint;
}

/**
 * Case-insensitive term match against `METHOD path summary`
 */
export function matchesEndpointText(endpoint: Endpoint, text: string | undefined): boolean {
  const terms = (text ?? "").toLowerCase().split(/\s+/).filter(Boolean);
  const haystack = `${endpointKey(endpoint)} ${endpoint.summary ?? ""}`.toLowerCase();
  return terms.every((term) => haystack.includes(term));
}

/** Minimum hash prefix accepted as a version reference */
export const MIN_HASH_PREFIX = 4;

const DIFF_CACHE_LIMIT = 256;

/**
 * Structural delta between two versions; `before` may be absent
 */
export function diffContracts(
  repo: string,
  before: Contract | undefined,
  after: { contentHash: string; endpoints: readonly Endpoint[] },
): ContractDelta {
  return {
    repo,
    ...(before !== undefined && { from: before.contentHash }),
    to: after.contentHash,
    endpoints: diffEndpoints(before?.endpoints ?? [], after.endpoints),
  };
}

/**
 * Resolve a version reference against a history: `latest`, `previous`,
 * a full content hash or a unique prefix of at least four characters.
 * A hash that occurs more than once resolves to its most recent occurrence.
 */
export function resolveVersionRef(
  repo: string,
  history: readonly Contract[],
  ref: string,
): Effect.Effect<Contract, UnknownVersionError> {
  const fail = (reason: string) =>
    Effect.fail(
      new UnknownVersionError({ message: `${reason} for '${ref}' in ${repo}`, repo, ref }),
    );
  const normalized = ref.trim().toLowerCase();

  if (normalized === "latest" || normalized === "previous") {
    const offset = normalized === "latest" ? 1 : 2;
    const version = history.at(-offset);
    return version ? Effect.succeed(version) : fail("No such version");
  }
  if (normalized.length < MIN_HASH_PREFIX) {
    return fail(`Version prefix must have at least ${MIN_HASH_PREFIX} characters`);
  }

  const newestFirst = [...history].reverse();
  const exact = newestFirst.find((version) => version.contentHash === normalized);
  if (exact) return Effect.succeed(exact);

  const matches = newestFirst.filter((version) => version.contentHash.startsWith(normalized));
  const distinct = new Set(matches.map((version) => version.contentHash));
  if (distinct.size > 1) return fail("Ambiguous version prefix");
  const [match] = matches;
  return match ? Effect.succeed(match) : fail("No such version");
}

export class ContractStore extends Effect.Service<ContractStore>()("ContractStore", {
  effect: Effect.gen(function* () {
    const storage = yield* StorageTag;
    const registry = yield* RepositoryRegistry;
    const locks = yield* RepositoryLocks;
    const audit = yield* AuditSinkTag;
    const diffCache = new Map<string, EndpointDelta[]>();

    const cachedDiff = (
      repo: string,
      before: Contract | undefined,
      after: Contract,
    ): ContractDelta => {
      const key = `${before?.contentHash ?? ""}:${after.contentHash}`;
      const cached = diffCache.get(key);
      if (cached) {
        return {
          repo,
          ...(before !== undefined && { from: before.contentHash }),
          to: after.contentHash,
          endpoints: cached,
        };
      }
      const delta = diffContracts(repo, before, after);
      if (diffCache.size >= DIFF_CACHE_LIMIT) {
        const oldest = diffCache.keys().next();
        if (!oldest.done) diffCache.delete(oldest.value);
      }
      diffCache.set(key, delta.endpoints);
      return delta;
    };

    /**
     * Store a scanned contract. A no-op returning the latest version when the
     * canonical content is unchanged; otherwise a compare-and-append retried
     * once on a concurrent write.
     */
    const put = (repo: string, input: ContractInput) =>
      Effect.gen(function* () {
        yield* registry.requireRepo(repo);
        const endpoints = canonicalizeEndpoints(input.endpoints);
        const contentHash = hashEndpoints(endpoints);
        const capturedAt = (input.capturedAt ?? new Date()).toISOString();

        const attempt = Effect.gen(function* () {
          const latest = yield* storage.latestVersion(repo);
          if (latest?.contentHash === contentHash) {
            return { version: latest, created: false } satisfies PutResult;
          }
          const version = yield* storage.appendVersion(
            { repo, contentHash, capturedAt, endpoints },
            latest?.contentHash,
          );
          return { version, created: true } satisfies PutResult;
        });

        const result = yield* attempt.pipe(
          Effect.catchTag("VersionConflictError", (conflict) =>
            Effect.logWarning(`[ContractStore] ${conflict.message}, retrying`).pipe(
              Effect.zipRight(attempt),
            ),
          ),
          locks.withLock(repo),
        );

        if (result.created) {
          yield* audit.record(auditEntry("put", repo, contentHash));
          yield* Effect.logInfo(
            `[ContractStore] ${repo} v${result.version.sequence} ${contentHash.slice(0, 12)} (${endpoints.length} endpoints)`,
          );
        } else {
          yield* Effect.logDebug(`[ContractStore] ${repo} unchanged at ${contentHash.slice(0, 12)}`);
        }
        return result;
      });

    /**
     * Ordered versions, most recent last
     */
    const history = (repo: string) =>
      registry.requireRepo(repo).pipe(Effect.zipRight(storage.listVersions(repo)));

    const latest = (repo: string) =>
      registry.requireRepo(repo).pipe(Effect.zipRight(storage.latestVersion(repo)));

    const get = (repo: string, ref: string) =>
      history(repo).pipe(Effect.flatMap((versions) => resolveVersionRef(repo, versions, ref)));

    /**
     * Per-endpoint structural delta from version A to version B
     */
    const diff = (repo: string, refA: string, refB: string) =>
      Effect.gen(function* () {
        const versions = yield* history(repo);
        const before = yield* resolveVersionRef(repo, versions, refA);
        const after = yield* resolveVersionRef(repo, versions, refB);
        return cachedDiff(repo, before, after);
      });

    /**
     * Delta from the latest stored version to an unsaved endpoint set
     */
    const preview = (repo: string, endpoints: readonly Endpoint[]) =>
      latest(repo).pipe(
        Effect.map((current) =>
          diffContracts(repo, current, {
            contentHash: hashEndpoints(endpoints),
            endpoints: canonicalizeEndpoints(endpoints),
          }),
        ),
      );

    /**
     * Delta introduced by a version relative to the one before it
     */
    const deltaOf = (repo: string, version: Contract) =>
      history(repo).pipe(
        Effect.map((versions) => {
          const index = versions.findIndex((v) => v.sequence === version.sequence);
          const before = index > 0 ? versions[index - 1] : undefined;
          return cachedDiff(repo, before, version);
        }),
      );

    /**
     * Endpoints of the latest versions, filtered by text
     */
    const searchEndpoints = (query: EndpointQuery = {}) =>
      Effect.gen(function* () {
        const repos =
          query.repo !== undefined
            ? [yield* registry.requireRepo(query.repo)]
            : yield* registry.list();
        const matches: EndpointMatch[] = [];
        for (const repo of repos) {
          const current = yield* storage.latestVersion(repo.name);
          for (const endpoint of current?.endpoints ?? []) {
            if (matchesEndpointText(endpoint, query.text)) {
              matches.push({ repo: repo.name, endpoint });
            }
          }
        }
        return query.limit === undefined ? matches : matches.slice(0, query.limit);
      });

    return { put, history, latest, get, diff, preview, deltaOf, searchEndpoints } as const;
  }),
}) {}

export const ContractStoreLive = ContractStore.Default;
