/**
 * Repository Registry - name → root path and contract type.
 * Names are the opaque keys every other service uses.
 */

import * as path from "node:path";
import { Effect } from "effect";
import { UnknownRepositoryError } from "../errors.js";
import { StorageTag } from "../storage/storage.js";
import type { ContractType, RepoInfo } from "../types.js";

export class RepositoryRegistry extends Effect.Service<RepositoryRegistry>()(
  "RepositoryRegistry",
  {
    effect: Effect.gen(function* () {
      const storage = yield* StorageTag;

      /**
       * Register or update a repository. Re-registering keeps the original
       * registration time.
       */
      const register = (name: string, repoPath: string, contractType?: ContractType) =>
        Effect.gen(function* () {
          const existing = yield* storage.getRepo(name);
          const repo: RepoInfo = {
            name,
            path: path.resolve(repoPath),
            ...(contractType !== undefined && { contractType }),
            registeredAt: existing?.registeredAt ?? new Date().toISOString(),
          };
          yield* storage.upsertRepo(repo);
          yield* Effect.logDebug(`[RepositoryRegistry] Registered ${name} at ${repo.path}`);
          return repo;
        });

      const get = (name: string) => storage.getRepo(name);

      const list = () => storage.listRepos();

      /**
       * Look up a repository, failing when it is not registered
       */
      const requireRepo = (name: string) =>
        get(name).pipe(
          Effect.flatMap((repo) =>
            repo
              ? Effect.succeed(repo)
              : Effect.fail(
                  new UnknownRepositoryError({
                    message: `Repository '${name}' is not registered`,
                    repo: name,
                  }),
                ),
          ),
        );

      /**
       * Remove a repository with its history and every edge naming it
       */
      const unregister = (name: string) =>
        Effect.gen(function* () {
          yield* requireRepo(name);
          yield* storage.deleteRepo(name);
          yield* Effect.logDebug(`[RepositoryRegistry] Unregistered ${name}`);
        });

      return { register, unregister, get, list, requireRepo } as const;
    }),
  },
) {}

export const RepositoryRegistryLive = RepositoryRegistry.Default;
