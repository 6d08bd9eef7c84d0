/**
 * Vault error classes
 *
 * Every failure the core can surface carries a stable code and an HTTP
 * status. 500-class errors are operator-facing: their message goes to the
 * log, never to the response body.
 */

import { ERROR_CODES, ERROR_MESSAGES } from "@credvault/shared";
import type { ErrorCode, ErrorStatus } from "@credvault/shared";

/**
 * Base error class for vault errors
 */
export class VaultError extends Error {
  readonly statusCode: ErrorStatus;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "VaultError";
    this.statusCode = ERROR_CODES[code];
  }

  get isInternal(): boolean {
    return this.statusCode >= 500;
  }
}

/**
 * Malformed input; the caller can correct it
 */
export class ValidationError extends VaultError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

export class DuplicateUsernameError extends VaultError {
  constructor() {
    super("DUPLICATE_USERNAME", ERROR_MESSAGES.DUPLICATE_USERNAME);
    this.name = "DuplicateUsernameError";
  }
}

/**
 * Login failure. Deliberately says nothing about which field was wrong.
 */
export class InvalidCredentialsError extends VaultError {
  constructor() {
    super("INVALID_CREDENTIALS", ERROR_MESSAGES.INVALID_CREDENTIALS);
    this.name = "InvalidCredentialsError";
  }
}

export class MissingOrMalformedAuthError extends VaultError {
  constructor(message: string = ERROR_MESSAGES.AUTH_HEADER_MALFORMED) {
    super("AUTH_REQUIRED", message);
    this.name = "MissingOrMalformedAuthError";
  }
}

export class InvalidOrExpiredTokenError extends VaultError {
  constructor() {
    super("INVALID_TOKEN", ERROR_MESSAGES.INVALID_TOKEN);
    this.name = "InvalidOrExpiredTokenError";
  }
}

/**
 * Ciphertext could not be authenticated: tampered, truncated, or sealed
 * under another key
 */
export class DecryptionError extends VaultError {
  constructor(message = "Ciphertext could not be decrypted", options?: { cause?: unknown }) {
    super("DECRYPTION_FAILED", message, options);
    this.name = "DecryptionError";
  }
}

export class StorageUnavailableError extends VaultError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super("STORAGE_UNAVAILABLE", `Storage operation failed: ${operation}`, options);
    this.name = "StorageUnavailableError";
  }
}

/**
 * Invalid or missing configuration; raised before the server starts
 */
export class ConfigError extends VaultError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
    this.name = "ConfigError";
  }
}
