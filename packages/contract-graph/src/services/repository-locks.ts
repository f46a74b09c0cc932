/**
 * Per-repository mutual exclusion.
 *
 * Writes to one repository (version appends, edges it owns as consumer) run
 * one at a time; different repositories proceed independently.
 */

import { Effect } from "effect";

export class RepositoryLocks extends Effect.Service<RepositoryLocks>()("RepositoryLocks", {
  sync: () => {
    const locks = new Map<string, Effect.Semaphore>();

    const lockFor = (key: string): Effect.Semaphore => {
      const existing = locks.get(key);
      if (existing) return existing;
      const semaphore = Effect.unsafeMakeSemaphore(1);
      locks.set(key, semaphore);
      return semaphore;
    };

    /**
     * Run an effect while holding the lock for a repository key
     */
    const withLock =
      (key: string) =>
      <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
        lockFor(key).withPermits(1)(effect);

    return { withLock } as const;
  },
}) {}

export const RepositoryLocksLive = RepositoryLocks.Default;
