/**
 * Configuration types - vault.config.json
 */

export type VaultMode = "development" | "production";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * Fully resolved configuration, built once at startup and passed by reference
 */
export interface VaultConfig {
  mode: VaultMode;
  signingSecret: string;
  encryptionKey?: string; // 64 hex chars; falls back to encryptionKeyPath
  encryptionKeyPath: string; // default ".vault/encryption.key"
  databasePath: string; // default "vault.db"
  tokenTtlSeconds: number; // default 30 days
  port: number;
  bindAddress: string;
  logLevel: LogLevel;
}

/**
 * Shape of vault.config.json; every field is optional
 */
export type VaultConfigFile = Partial<Omit<VaultConfig, "signingSecret" | "encryptionKey">>;

export const DEFAULT_CONFIG = {
  mode: "development",
  encryptionKeyPath: ".vault/encryption.key",
  databasePath: "vault.db",
  tokenTtlSeconds: 30 * 24 * 60 * 60, // 30 days
  port: 5000,
  bindAddress: "127.0.0.1",
  logLevel: "info",
} as const satisfies Omit<VaultConfig, "signingSecret" | "encryptionKey">;
