/**
 * Configuration loading
 *
 * Priority: CLI options > environment > vault.config.json > defaults.
 * The result is validated once and then passed by reference to the
 * components that need it.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DEFAULT_CONFIG, SESSION_CONFIG } from "@credvault/shared";
import type { VaultConfig, VaultConfigFile } from "@credvault/shared";
import { ConfigError } from "./errors.js";
import { generateSigningSecret } from "./services/crypto.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export const VaultConfigSchema = z.object({
  mode: z.enum(["development", "production"]),
  signingSecret: z
    .string()
    .min(
      SESSION_CONFIG.MIN_SECRET_LENGTH,
      `must be at least ${SESSION_CONFIG.MIN_SECRET_LENGTH} characters`
    ),
  encryptionKey: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, "must be a 64-character hex string")
    .optional(),
  encryptionKeyPath: z.string().min(1),
  databasePath: z.string().min(1),
  tokenTtlSeconds: z.number().int().positive(),
  port: z.number().int().min(0).max(65535),
  bindAddress: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
});

export const VaultConfigFileSchema = VaultConfigSchema.omit({
  signingSecret: true,
  encryptionKey: true,
})
  .partial()
  .strict();

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  JWT_SECRET_KEY: z.string().optional(),
  ENCRYPTION_KEY: z.string().optional(),
  ENCRYPTION_KEY_PATH: z.string().optional(),
  DATABASE_PATH: z.string().optional(),
  TOKEN_TTL_SECONDS: z.coerce.number().int().optional(),
  PORT: z.coerce.number().int().optional(),
  BIND_ADDRESS: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface ConfigOverrides {
  port?: number;
  bindAddress?: string;
  databasePath?: string;
}

export interface ResolveConfigInput {
  file?: VaultConfigFile;
  env: Record<string, string | undefined>;
  overrides?: ConfigOverrides;
}

export interface ResolvedConfig {
  config: VaultConfig;
  /** Startup warnings, logged once a logger exists */
  warnings: string[];
}

/**
 * Read and validate vault.config.json. A missing file yields null.
 */
export async function readConfigFile(path: string): Promise<VaultConfigFile | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw new ConfigError(`Could not read config file ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigError(`Config file ${path} is not valid JSON`);
  }

  const parsed = VaultConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Merge all sources into one validated VaultConfig.
 * @throws ConfigError when a value is invalid, or when production mode lacks
 * a signing secret or encryption key
 */
export function resolveConfig({ file = {}, env, overrides = {} }: ResolveConfigInput): ResolvedConfig {
  const envParsed = EnvSchema.safeParse(env);
  if (!envParsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(envParsed.error)}`);
  }
  const e = envParsed.data;
  const warnings: string[] = [];

  const mode =
    e.NODE_ENV === "production" ? "production" : (file.mode ?? DEFAULT_CONFIG.mode);

  let signingSecret = e.JWT_SECRET_KEY;
  const encryptionKey = e.ENCRYPTION_KEY;

  if (mode === "production") {
    const missing = [
      signingSecret ? null : "JWT_SECRET_KEY",
      encryptionKey ? null : "ENCRYPTION_KEY",
    ].filter((name): name is string => name !== null);
    if (missing.length > 0) {
      throw new ConfigError(
        `Production mode requires ${missing.join(" and ")}. Generate values with: vault generate-secrets`
      );
    }
  }

  if (!signingSecret) {
    signingSecret = generateSigningSecret();
    warnings.push(
      "JWT_SECRET_KEY not set; using a random per-process signing secret. Tokens will not survive a restart"
    );
  }

  const merged = {
    mode,
    signingSecret,
    encryptionKey,
    encryptionKeyPath:
      e.ENCRYPTION_KEY_PATH ?? file.encryptionKeyPath ?? DEFAULT_CONFIG.encryptionKeyPath,
    databasePath:
      overrides.databasePath ?? e.DATABASE_PATH ?? file.databasePath ?? DEFAULT_CONFIG.databasePath,
    tokenTtlSeconds:
      e.TOKEN_TTL_SECONDS ?? file.tokenTtlSeconds ?? DEFAULT_CONFIG.tokenTtlSeconds,
    port: overrides.port ?? e.PORT ?? file.port ?? DEFAULT_CONFIG.port,
    bindAddress:
      overrides.bindAddress ?? e.BIND_ADDRESS ?? file.bindAddress ?? DEFAULT_CONFIG.bindAddress,
    logLevel: e.LOG_LEVEL ?? file.logLevel ?? DEFAULT_CONFIG.logLevel,
  };

  const parsed = VaultConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return { config: parsed.data, warnings };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
    .join("; ");
}
