/**
 * Logger factory (pino)
 */

import pino, { type Logger, type LoggerOptions as PinoOptions } from "pino";
import type { LogLevel, VaultMode } from "@credvault/shared";

/**
 * Paths never written to the log, whatever object they appear in
 */
export const REDACT_PATHS = [
  "secret",
  "*.secret",
  "encryptedSecret",
  "*.encryptedSecret",
  "encrypted_secret",
  "*.encrypted_secret",
  "signingSecret",
  "*.signingSecret",
  "encryptionKey",
  "*.encryptionKey",
  "token",
  "*.token",
  "req.headers.authorization",
];

export interface LoggerOptions {
  level: LogLevel | "silent";
  mode: VaultMode;
}

export function loggerOptions(options: LoggerOptions): PinoOptions {
  return {
    level: options.level,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    // JSON lines in production, pretty output for local runs
    ...(options.mode === "development"
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true },
          },
        }
      : {}),
  };
}

export function createLogger(options: LoggerOptions): Logger {
  return pino(loggerOptions(options));
}
