/**
 * Main server entry point
 */

import { serve, type ServerType } from "@hono/node-server";
import type { Logger } from "pino";
import type { VaultConfig } from "@credvault/shared";
import { createApp } from "./app.js";
import { AccountService } from "./services/account-service.js";
import { CredentialCipher, loadEncryptionKey, type KeySource } from "./services/crypto.js";
import { TokenIssuer } from "./services/token-issuer.js";
import { UserStore, openDatabase } from "./services/user-store.js";

export { createApp, type AppEnv, type AppDeps } from "./app.js";
export { AccountService } from "./services/account-service.js";
export { CredentialCipher } from "./services/crypto.js";
export { TokenIssuer } from "./services/token-issuer.js";
export { UserStore } from "./services/user-store.js";
export { authGate, resolveBearer, type AuthEnv } from "./middleware/auth-gate.js";
export * from "./errors.js";

export interface VaultServices {
  store: UserStore;
  cipher: CredentialCipher;
  tokens: TokenIssuer;
  accounts: AccountService;
  keySource: KeySource;
}

/**
 * Build the service graph from a resolved config. The encryption key and
 * signing secret are handed to their owners here and nowhere else.
 */
export async function createServices(config: VaultConfig, log: Logger): Promise<VaultServices> {
  const { key, source } = await loadEncryptionKey({
    configured: config.encryptionKey,
    keyPath: config.encryptionKeyPath,
    log,
  });
  const cipher = new CredentialCipher(key);

  const store = new UserStore(openDatabase(config.databasePath));
  store.migrate();
  log.info({ databasePath: config.databasePath }, "Account store ready");

  const tokens = new TokenIssuer({
    signingSecret: config.signingSecret,
    ttlSeconds: config.tokenTtlSeconds,
    log,
  });
  const accounts = new AccountService({ store, cipher, tokens, log });

  return { store, cipher, tokens, accounts, keySource: source };
}

export interface RunningServer {
  server: ServerType;
  services: VaultServices;
  close(): Promise<void>;
}

export async function startServer(config: VaultConfig, log: Logger): Promise<RunningServer> {
  const services = await createServices(config, log);
  const app = createApp({ accounts: services.accounts, tokens: services.tokens, log });

  const server = serve(
    {
      fetch: app.fetch,
      port: config.port,
      hostname: config.bindAddress,
    },
    (info) => {
      log.info(`Server listening on http://${info.address}:${info.port}`);
    }
  );

  const close = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => {
        services.store.close();
        if (err) {
          reject(err);
          return;
        }
        log.info("Server closed");
        resolve();
      });
    });

  return { server, services, close };
}
