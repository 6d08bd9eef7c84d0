/**
 * HTTP application: middleware pipeline, error mapping and routes
 */

import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { logger as requestLogger } from "hono/logger";
import { nanoid } from "nanoid";
import type { Logger } from "pino";
import { ERROR_MESSAGES, HEADERS } from "@credvault/shared";
import type { ErrorResponse } from "@credvault/shared";
import { VaultError } from "./errors.js";
import { setupAuthEndpoints } from "./endpoints/auth.js";
import { setupAccountEndpoints } from "./endpoints/account.js";
import { setupHealthEndpoint } from "./endpoints/health.js";
import type { AccountService } from "./services/account-service.js";
import type { TokenIssuer } from "./services/token-issuer.js";

/**
 * Variables every request carries
 */
export interface AppEnv {
  Variables: {
    requestId: string;
    log: Logger;
  };
}

export interface AppDeps {
  accounts: AccountService;
  tokens: TokenIssuer;
  log: Logger;
}

export function createApp({ accounts, tokens, log }: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // Request-scoped id and child logger
  app.use("*", async (c, next) => {
    const requestId = nanoid();
    c.set("requestId", requestId);
    c.set("log", log.child({ requestId }));
    c.header(HEADERS.REQUEST_ID, requestId);
    await next();
  });

  // Request logging (method, path, status, duration)
  app.use("*", requestLogger((message) => log.debug(message)));

  setupHealthEndpoint(app);
  setupAuthEndpoints(app, accounts);
  setupAccountEndpoints(app, accounts, tokens);

  app.notFound((c) => c.json({ error: "Not found" } satisfies ErrorResponse, 404));

  app.onError((err, c) => {
    const reqLog = c.get("log") ?? log;

    if (err instanceof VaultError && !err.isInternal) {
      return c.json({ error: err.message } satisfies ErrorResponse, err.statusCode);
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    // Detail for operators only
    reqLog.error({ err, path: c.req.path }, "Request failed");
    return c.json({ error: ERROR_MESSAGES.INTERNAL } satisfies ErrorResponse, 500);
  });

  return app;
}
