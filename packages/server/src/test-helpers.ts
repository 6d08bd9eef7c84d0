/**
 * Shared fixtures for unit tests: isolated in-memory services per call
 */

import pino, { type Logger } from "pino";
import { CredentialCipher, generateEncryptionKey, parseEncryptionKey } from "./services/crypto.js";
import { TokenIssuer } from "./services/token-issuer.js";
import { UserStore, openDatabase } from "./services/user-store.js";
import { AccountService } from "./services/account-service.js";
import { createApp } from "./app.js";

export const TEST_SIGNING_SECRET = "test-signing-secret-must-be-32-chars-or-more";
export const TEST_TTL_SECONDS = 30 * 24 * 60 * 60;

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function createTestCipher(): CredentialCipher {
  return new CredentialCipher(parseEncryptionKey(generateEncryptionKey()));
}

export function createTestStore(): UserStore {
  const store = new UserStore(openDatabase(":memory:"));
  store.migrate();
  return store;
}

export interface TestContext {
  store: UserStore;
  cipher: CredentialCipher;
  tokens: TokenIssuer;
  accounts: AccountService;
  log: Logger;
}

export function createTestContext(overrides: Partial<TestContext> = {}): TestContext {
  const log = overrides.log ?? silentLogger();
  const store = overrides.store ?? createTestStore();
  const cipher = overrides.cipher ?? createTestCipher();
  const tokens =
    overrides.tokens ??
    new TokenIssuer({ signingSecret: TEST_SIGNING_SECRET, ttlSeconds: TEST_TTL_SECONDS, log });
  const accounts = overrides.accounts ?? new AccountService({ store, cipher, tokens, log });
  return { store, cipher, tokens, accounts, log };
}

export function createTestApp(overrides: Partial<TestContext> = {}) {
  const ctx = createTestContext(overrides);
  const app = createApp({ accounts: ctx.accounts, tokens: ctx.tokens, log: ctx.log });
  return { app, ...ctx };
}

export function jsonRequest(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: typeof body === "string" ? body : JSON.stringify(body),
  };
}
