/**
 * Cryptography utilities (AES-256-GCM sealing of stored secrets, key material)
 */

import {
  createCipheriv,
  createDecipheriv,
  createHash,
  randomBytes,
  timingSafeEqual,
} from "node:crypto";
import { link, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "pino";
import { ConfigError, DecryptionError } from "../errors.js";

const ALGORITHM = "aes-256-gcm";
const KEY_BYTES = 32;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const FORMAT_VERSION = "v1";
const KEY_HEX_PATTERN = /^[0-9a-fA-F]{64}$/;

/**
 * Symmetric encrypt/decrypt of opaque secret strings.
 *
 * Output format: `v1.<iv>.<authTag>.<ciphertext>`, each part base64url.
 * A fresh IV is drawn per call, so sealing the same plaintext twice gives
 * two different ciphertexts.
 */
export class CredentialCipher {
  readonly #key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_BYTES) {
      throw new ConfigError(`Encryption key must be ${KEY_BYTES} bytes`);
    }
    this.#key = Buffer.from(key);
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.#key, iv, {
      authTagLength: TAG_BYTES,
    });
    const encrypted = Buffer.concat([
      cipher.update(plaintext, "utf8"),
      cipher.final(),
    ]);
    const tag = cipher.getAuthTag();

    return [
      FORMAT_VERSION,
      iv.toString("base64url"),
      tag.toString("base64url"),
      encrypted.toString("base64url"),
    ].join(".");
  }

  decrypt(ciphertext: string): string {
    const parts = ciphertext.split(".");
    if (parts.length !== 4 || parts[0] !== FORMAT_VERSION) {
      throw new DecryptionError("Ciphertext is malformed");
    }

    const [, ivPart, tagPart, bodyPart] = parts;
    const iv = Buffer.from(ivPart, "base64url");
    const tag = Buffer.from(tagPart, "base64url");
    if (iv.length !== IV_BYTES || tag.length !== TAG_BYTES) {
      throw new DecryptionError("Ciphertext is malformed");
    }

    try {
      const decipher = createDecipheriv(ALGORITHM, this.#key, iv, {
        authTagLength: TAG_BYTES,
      });
      decipher.setAuthTag(tag);
      return Buffer.concat([
        decipher.update(Buffer.from(bodyPart, "base64url")),
        decipher.final(),
      ]).toString("utf8");
    } catch (error) {
      // GCM tag mismatch: wrong key or tampered payload
      throw new DecryptionError("Ciphertext failed authentication", {
        cause: error,
      });
    }
  }
}

/**
 * Generate a fresh AES-256 key as 64 hex chars
 */
export function generateEncryptionKey(): string {
  return randomBytes(KEY_BYTES).toString("hex");
}

/**
 * Generate a token signing secret (64 random bytes, base64url)
 */
export function generateSigningSecret(): string {
  return randomBytes(64).toString("base64url");
}

export function parseEncryptionKey(value: string): Buffer {
  const trimmed = value.trim();
  if (!KEY_HEX_PATTERN.test(trimmed)) {
    throw new ConfigError(
      "Encryption key must be a 64-character hex string. Generate one with: vault generate-secrets"
    );
  }
  return Buffer.from(trimmed, "hex");
}

/**
 * Constant-time string equality. Both sides are hashed first so inputs of
 * different length take the same path.
 */
export function safeEqual(a: string, b: string): boolean {
  const digestA = createHash("sha256").update(a, "utf8").digest();
  const digestB = createHash("sha256").update(b, "utf8").digest();
  return timingSafeEqual(digestA, digestB);
}

export type KeySource = "config" | "file" | "generated" | "ephemeral";

export interface LoadedKey {
  key: Buffer;
  source: KeySource;
}

export interface LoadKeyOptions {
  configured?: string;
  keyPath: string;
  log: Logger;
}

/**
 * Resolve the process-wide encryption key.
 *
 * Order: configured value, then the key file, then a generated key written
 * to the key file. When another instance writes the file first, its key is
 * adopted. If the file cannot be written the generated key is kept in
 * memory only; secrets sealed under it are lost on restart.
 */
export async function loadEncryptionKey(options: LoadKeyOptions): Promise<LoadedKey> {
  const { configured, keyPath, log } = options;

  if (configured) {
    return { key: parseEncryptionKey(configured), source: "config" };
  }

  const existing = await readKeyFile(keyPath);
  if (existing !== null) {
    log.info({ keyPath }, "Loaded encryption key from file");
    return { key: parseEncryptionKey(existing), source: "file" };
  }

  const generated = generateEncryptionKey();
  let published: boolean;
  try {
    await mkdir(dirname(keyPath), { recursive: true });
    published = await publishKeyFile(keyPath, generated);
  } catch (error) {
    log.warn(
      { keyPath, err: error },
      "Could not persist encryption key; using an in-memory key. Stored secrets will be unrecoverable after restart"
    );
    return { key: parseEncryptionKey(generated), source: "ephemeral" };
  }

  if (published) {
    log.info({ keyPath }, "Generated new encryption key");
    return { key: parseEncryptionKey(generated), source: "generated" };
  }

  const winner = await readKeyFile(keyPath);
  if (winner === null) {
    throw new ConfigError(`Could not read encryption key file ${keyPath}`);
  }
  log.info({ keyPath }, "Loaded encryption key written by another instance");
  return { key: parseEncryptionKey(winner), source: "file" };
}

/**
 * Write the key to a staging file, then hard-link it into place so readers
 * never see a partial file. Returns false when the key file already exists.
 */
async function publishKeyFile(keyPath: string, key: string): Promise<boolean> {
  const staging = `${keyPath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
  await writeFile(staging, key + "\n", { encoding: "utf-8", mode: 0o600, flag: "wx" });
  try {
    await link(staging, keyPath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      return false;
    }
    throw error;
  } finally {
    await rm(staging, { force: true });
  }
}

async function readKeyFile(keyPath: string): Promise<string | null> {
  try {
    return await readFile(keyPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return null;
    }
    throw new ConfigError(`Could not read encryption key file ${keyPath}`);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
