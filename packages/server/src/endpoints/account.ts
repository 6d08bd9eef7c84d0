/**
 * Endpoints for the authenticated account
 */

import type { Hono } from "hono";
import { ENDPOINTS, ERROR_MESSAGES } from "@credvault/shared";
import type { ProfileResponse } from "@credvault/shared";
import { InvalidOrExpiredTokenError } from "../errors.js";
import { authGate } from "../middleware/auth-gate.js";
import type { AccountService } from "../services/account-service.js";
import type { TokenIssuer } from "../services/token-issuer.js";
import type { AppEnv } from "../app.js";

export function setupAccountEndpoints(
  app: Hono<AppEnv>,
  accounts: AccountService,
  tokens: TokenIssuer
) {
  app.get(ENDPOINTS.ME, authGate(tokens), (c) => {
    const profile = accounts.getProfile(c.get("userId"));
    // A valid token for an account that no longer resolves
    if (!profile) {
      c.get("log").warn({ userId: c.get("userId") }, ERROR_MESSAGES.INVALID_TOKEN);
      throw new InvalidOrExpiredTokenError();
    }

    const body: ProfileResponse = {
      user_id: profile.userId,
      username: profile.username,
      external_identity: profile.externalIdentity,
      created_at: profile.createdAt,
    };
    return c.json(body);
  });
}
