/**
 * CLI Runtime
 *
 * Builds a managed runtime over the project's SQLite store and runs one
 * command's effect in it.
 */

import { Cause, Effect, Either, Exit, Layer, ManagedRuntime } from "effect";
import type { Command } from "commander";
import { databasePath, type FaultlineConfig, loadConfig } from "../config.js";
import { createFaultlineLayer, type FaultlineServices } from "../layers.js";
import { createLoggerLayer } from "../logging.js";
import { SqliteStorageLive } from "../storage/sqlite-storage.js";

/**
 * Configuration for the `--project` directory given to the root program
 */
export function configFor(program: Command): FaultlineConfig {
  const { project } = program.opts<{ project?: string }>();
  const config = loadConfig(project);
  if (Either.isLeft(config)) {
    throw new Error(config.left);
  }
  return config.right;
}

export function createCliRuntime(config: FaultlineConfig) {
  const layer = createFaultlineLayer(SqliteStorageLive(databasePath(config))).pipe(
    Layer.provideMerge(createLoggerLayer(config.logLevel)),
  );
  return ManagedRuntime.make(layer);
}

/**
 * Run an effect against the project store, disposing the runtime afterwards.
 * A failure is rethrown as the error it failed with.
 */
export async function runCli<A, E>(
  config: FaultlineConfig,
  effect: Effect.Effect<A, E, FaultlineServices>,
): Promise<A> {
  const runtime = createCliRuntime(config);
  const exit = await runtime.runPromiseExit(effect);
  await runtime.dispose();

  if (Exit.isFailure(exit)) {
    throw Cause.squash(exit.cause);
  }
  return exit.value;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Parse a positive integer option, falling back when it is absent
 */
export function parsePositiveInt(value: string | undefined, fallback: number, flag = "--limit"): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new Error(`${flag} must be a positive integer, got '${value}'`);
  }
  return parsed;
}
