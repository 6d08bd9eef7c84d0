/**
 * Unit tests for configuration resolution.
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors.js";
import { readConfigFile, resolveConfig } from "./config.js";
import { TEST_SIGNING_SECRET } from "./test-helpers.js";

const TEST_KEY = "0123456789abcdef".repeat(4);

describe("resolveConfig", () => {
  it("fills defaults in development", () => {
    const { config, warnings } = resolveConfig({ env: {} });

    expect(config).toMatchObject({
      mode: "development",
      encryptionKeyPath: ".vault/encryption.key",
      databasePath: "vault.db",
      tokenTtlSeconds: 2_592_000,
      port: 5000,
      bindAddress: "127.0.0.1",
      logLevel: "info",
    });
    expect(config.encryptionKey).toBeUndefined();
    expect(config.signingSecret).toHaveLength(86);
    expect(warnings).toEqual([
      "JWT_SECRET_KEY not set; using a random per-process signing secret. Tokens will not survive a restart",
    ]);
  });

  it("refuses to start in production without secrets", () => {
    expect(() => resolveConfig({ env: { NODE_ENV: "production" } })).toThrow(
      new ConfigError(
        "Production mode requires JWT_SECRET_KEY and ENCRYPTION_KEY. Generate values with: vault generate-secrets"
      )
    );
  });

  it("names the one missing production secret", () => {
    expect(() =>
      resolveConfig({ env: { NODE_ENV: "production", JWT_SECRET_KEY: TEST_SIGNING_SECRET } })
    ).toThrow("Production mode requires ENCRYPTION_KEY. Generate values with: vault generate-secrets");
  });

  it("treats mode from the config file like NODE_ENV", () => {
    expect(() => resolveConfig({ file: { mode: "production" }, env: {} })).toThrow(ConfigError);
  });

  it("accepts production with both secrets", () => {
    const { config, warnings } = resolveConfig({
      env: { NODE_ENV: "production", JWT_SECRET_KEY: TEST_SIGNING_SECRET, ENCRYPTION_KEY: TEST_KEY },
    });

    expect(config.mode).toBe("production");
    expect(config.signingSecret).toBe(TEST_SIGNING_SECRET);
    expect(config.encryptionKey).toBe(TEST_KEY);
    expect(warnings).toEqual([]);
  });

  it("applies CLI > environment > file precedence", () => {
    const file = { port: 6000, databasePath: "file.db", bindAddress: "10.0.0.1" };
    const env = { PORT: "7000", DATABASE_PATH: "env.db", JWT_SECRET_KEY: TEST_SIGNING_SECRET };

    expect(resolveConfig({ file, env: {} }).config).toMatchObject({
      port: 6000,
      databasePath: "file.db",
      bindAddress: "10.0.0.1",
    });
    expect(resolveConfig({ file, env }).config).toMatchObject({ port: 7000, databasePath: "env.db" });
    expect(
      resolveConfig({ file, env, overrides: { port: 8000, databasePath: "cli.db" } }).config
    ).toMatchObject({ port: 8000, databasePath: "cli.db", bindAddress: "10.0.0.1" });
  });

  it("rejects a malformed encryption key", () => {
    expect(() => resolveConfig({ env: { ENCRYPTION_KEY: "abc" } })).toThrow(
      "Invalid configuration: encryptionKey must be a 64-character hex string"
    );
  });

  it("rejects a short signing secret", () => {
    expect(() => resolveConfig({ env: { JWT_SECRET_KEY: "too-short" } })).toThrow(
      "Invalid configuration: signingSecret must be at least 32 characters"
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => resolveConfig({ env: { LOG_LEVEL: "loud" } })).toThrow(/^Invalid environment: LOG_LEVEL/);
  });
});

describe("readConfigFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vault-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns null when the file does not exist", async () => {
    expect(await readConfigFile(join(dir, "vault.config.json"))).toBeNull();
  });

  it("parses a valid file", async () => {
    const path = join(dir, "vault.config.json");
    await writeFile(path, JSON.stringify({ port: 6001, logLevel: "debug" }), "utf-8");

    expect(await readConfigFile(path)).toEqual({ port: 6001, logLevel: "debug" });
  });

  it("rejects invalid JSON", async () => {
    const path = join(dir, "vault.config.json");
    await writeFile(path, "{", "utf-8");

    await expect(readConfigFile(path)).rejects.toThrow(`Config file ${path} is not valid JSON`);
  });

  it("rejects secrets and unknown keys in the file", async () => {
    const path = join(dir, "vault.config.json");
    await writeFile(path, JSON.stringify({ signingSecret: TEST_SIGNING_SECRET }), "utf-8");

    await expect(readConfigFile(path)).rejects.toThrow(ConfigError);
  });
});
