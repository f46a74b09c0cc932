import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { databasePath, defaultConfigFile, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  let project: string;

  const writeConfig = async (contents: string) => {
    await mkdir(path.join(project, ".faultline"), { recursive: true });
    await writeFile(path.join(project, ".faultline", "config.json"), contents);
  };

  const load = (env: NodeJS.ProcessEnv = {}) => loadConfig(project, env);

  beforeEach(async () => {
    project = await mkdtemp(path.join(tmpdir(), "faultline-config-"));
  });

  afterEach(async () => {
    await rm(project, { recursive: true, force: true });
  });

  it("falls back to defaults without a config file", () => {
    const config = Either.getOrThrow(load());

    expect(config.dataDir).toBe(path.join(project, ".faultline"));
    expect(config.store.dbName).toBe("faultline.db");
    expect(config.server.defaultQueryLimit).toBe(50);
    expect(config.logLevel).toBe("info");
    expect(config.scanner.modelMarkers).toEqual(["BaseModel"]);
    expect(databasePath(config)).toBe(path.join(project, ".faultline", "faultline.db"));
  });

  it("reads the config file", async () => {
    await writeConfig(
      JSON.stringify({
        store: { dbName: "contracts.db" },
        scanner: { modelDirs: ["models"] },
        server: { defaultQueryLimit: 10 },
        logLevel: "debug",
      }),
    );

    const config = Either.getOrThrow(load());
    expect(config.store.dbName).toBe("contracts.db");
    expect(config.scanner.modelDirs).toEqual(["models"]);
    expect(config.scanner.documentPatterns).toEqual(defaultConfigFile().scanner?.documentPatterns);
    expect(config.server.defaultQueryLimit).toBe(10);
    expect(config.logLevel).toBe("debug");
  });

  it("lets the environment override the file", async () => {
    await writeConfig(JSON.stringify({ store: { dbName: "contracts.db" }, logLevel: "debug" }));

    const config = Either.getOrThrow(
      load({
        FAULTLINE_DB_NAME: ":memory:",
        FAULTLINE_LOG_LEVEL: "WARNING",
        FAULTLINE_DEFAULT_QUERY_LIMIT: "5",
        FAULTLINE_MODEL_MARKERS: "Entity, Model,",
      }),
    );
    expect(databasePath(config)).toBe(":memory:");
    expect(config.logLevel).toBe("warning");
    expect(config.server.defaultQueryLimit).toBe(5);
    expect(config.scanner.modelMarkers).toEqual(["Entity", "Model"]);
  });

  it("rejects a bad query limit", () => {
    expect(load({ FAULTLINE_DEFAULT_QUERY_LIMIT: "0" })).toEqual(
      Either.left("FAULTLINE_DEFAULT_QUERY_LIMIT must be a positive integer, got '0'"),
    );
  });

  it("rejects unknown log levels", () => {
    const result = load({ FAULTLINE_LOG_LEVEL: "loud" });
    expect(Either.isLeft(result) && result.left).toBe(
      "FAULTLINE_LOG_LEVEL must be one of debug, info, warning, error, none, got 'loud'",
    );
  });

  it("rejects unknown keys in the config file", async () => {
    await writeConfig(JSON.stringify({ server: { port: 8080 } }));
    const result = load();
    expect(Either.isLeft(result) && result.left.startsWith("Invalid ")).toBe(true);
  });

  it("reports unreadable JSON", async () => {
    await writeConfig("{ not json");
    const result = load();
    expect(Either.isLeft(result) && result.left.startsWith("Failed to read ")).toBe(true);
  });
});
