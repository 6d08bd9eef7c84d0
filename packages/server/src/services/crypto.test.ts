/**
 * Unit tests for CredentialCipher and key provisioning.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, DecryptionError } from "../errors.js";
import { silentLogger } from "../test-helpers.js";
import {
  CredentialCipher,
  generateEncryptionKey,
  generateSigningSecret,
  loadEncryptionKey,
  parseEncryptionKey,
  safeEqual,
} from "./crypto.js";

function newCipher(): CredentialCipher {
  return new CredentialCipher(parseEncryptionKey(generateEncryptionKey()));
}

describe("CredentialCipher", () => {
  it("decrypts what it encrypts", () => {
    const cipher = newCipher();
    for (const secret of ["correct-secret", "", "pässwörd with spaces ✓"]) {
      expect(cipher.decrypt(cipher.encrypt(secret))).toBe(secret);
    }
  });

  it("produces a different ciphertext on every call", () => {
    const cipher = newCipher();
    const first = cipher.encrypt("same-secret");
    const second = cipher.encrypt("same-secret");

    expect(first).not.toBe(second);
    expect(cipher.decrypt(first)).toBe("same-secret");
    expect(cipher.decrypt(second)).toBe("same-secret");
  });

  it("emits the versioned four-part format", () => {
    const parts = newCipher().encrypt("hello").split(".");
    expect(parts).toHaveLength(4);
    expect(parts[0]).toBe("v1");
    expect(Buffer.from(parts[1], "base64url")).toHaveLength(12);
    expect(Buffer.from(parts[2], "base64url")).toHaveLength(16);
    expect(Buffer.from(parts[3], "base64url")).toHaveLength(5);
  });

  it("does not contain the plaintext", () => {
    const ciphertext = newCipher().encrypt("correct-secret");
    expect(ciphertext.includes("correct-secret")).toBe(false);
  });

  it("rejects ciphertext sealed under another key", () => {
    const ciphertext = newCipher().encrypt("correct-secret");
    expect(() => newCipher().decrypt(ciphertext)).toThrow(DecryptionError);
  });

  it("rejects a tampered body", () => {
    const cipher = newCipher();
    const parts = cipher.encrypt("correct-secret").split(".");
    const body = Buffer.from(parts[3], "base64url");
    body[0] ^= 0xff;
    parts[3] = body.toString("base64url");

    expect(() => cipher.decrypt(parts.join("."))).toThrow(DecryptionError);
  });

  it("rejects a tampered auth tag", () => {
    const cipher = newCipher();
    const parts = cipher.encrypt("correct-secret").split(".");
    const tag = Buffer.from(parts[2], "base64url");
    tag[15] ^= 0x01;
    parts[2] = tag.toString("base64url");

    expect(() => cipher.decrypt(parts.join("."))).toThrow("Ciphertext failed authentication");
  });

  it.each(["not-a-ciphertext", "", "v1.abc", "v2.a.b.c", "v1.AAAA.AAAA.AAAA"])(
    "rejects malformed input %j",
    (input) => {
      expect(() => newCipher().decrypt(input)).toThrow(DecryptionError);
    }
  );

  it("requires a 32-byte key", () => {
    expect(() => new CredentialCipher(Buffer.alloc(16))).toThrow(ConfigError);
  });
});

describe("key material", () => {
  it("generates 64-char hex encryption keys", () => {
    const key = generateEncryptionKey();
    expect(key).toMatch(/^[0-9a-f]{64}$/);
    expect(parseEncryptionKey(key)).toHaveLength(32);
  });

  it("generates base64url signing secrets", () => {
    const secret = generateSigningSecret();
    expect(secret).toMatch(/^[A-Za-z0-9_-]{86}$/);
  });

  it("accepts a key with surrounding whitespace", () => {
    const key = generateEncryptionKey();
    expect(parseEncryptionKey(`  ${key}\n`).toString("hex")).toBe(key);
  });

  it.each(["", "abc", "z".repeat(64), "a".repeat(63)])("rejects key %j", (value) => {
    expect(() => parseEncryptionKey(value)).toThrow(ConfigError);
  });
});

describe("safeEqual", () => {
  it("compares by value", () => {
    expect(safeEqual("correct-secret", "correct-secret")).toBe(true);
    expect(safeEqual("correct-secret", "correct-secreT")).toBe(false);
    expect(safeEqual("short", "a much longer value")).toBe(false);
    expect(safeEqual("", "")).toBe(true);
  });
});

describe("loadEncryptionKey", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vault-key-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prefers the configured key", async () => {
    const configured = generateEncryptionKey();
    const keyPath = join(dir, "encryption.key");

    const loaded = await loadEncryptionKey({ configured, keyPath, log: silentLogger() });

    expect(loaded.source).toBe("config");
    expect(loaded.key.toString("hex")).toBe(configured);
    await expect(readFile(keyPath, "utf-8")).rejects.toThrow();
  });

  it("generates and persists a key on first run, then reuses it", async () => {
    const keyPath = join(dir, "nested", "encryption.key");

    const first = await loadEncryptionKey({ keyPath, log: silentLogger() });
    expect(first.source).toBe("generated");
    expect(await readFile(keyPath, "utf-8")).toBe(first.key.toString("hex") + "\n");

    const second = await loadEncryptionKey({ keyPath, log: silentLogger() });
    expect(second.source).toBe("file");
    expect(second.key.equals(first.key)).toBe(true);
  });

  it("gives instances racing on first run the same key", async () => {
    const keyPath = join(dir, "encryption.key");

    const [a, b] = await Promise.all([
      loadEncryptionKey({ keyPath, log: silentLogger() }),
      loadEncryptionKey({ keyPath, log: silentLogger() }),
    ]);

    expect(a.key.equals(b.key)).toBe(true);
    expect([a.source, b.source].sort()).toEqual(["file", "generated"]);
    expect(await readFile(keyPath, "utf-8")).toBe(a.key.toString("hex") + "\n");
    expect(await readdir(dir)).toEqual(["encryption.key"]);
  });

  it("rejects a key file with invalid contents", async () => {
    const keyPath = join(dir, "encryption.key");
    await writeFile(keyPath, "not-a-key", "utf-8");

    await expect(loadEncryptionKey({ keyPath, log: silentLogger() })).rejects.toThrow(ConfigError);
  });

  it("falls back to an in-memory key when the file cannot be written", async () => {
    // A regular file where a directory is expected makes mkdir fail
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "", "utf-8");
    const log = silentLogger();
    const warn = vi.spyOn(log, "warn");

    const loaded = await loadEncryptionKey({ keyPath: join(blocker, "encryption.key"), log });

    expect(loaded.source).toBe("ephemeral");
    expect(loaded.key).toHaveLength(32);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
