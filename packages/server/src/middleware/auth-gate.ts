/**
 * Bearer-token gate for protected routes.
 *
 * Resolves `Authorization: Bearer <token>` to an account id and stores it
 * on the request context as `userId`. It authenticates only; scoping data to
 * that account is up to the handlers.
 */

import type { MiddlewareHandler } from "hono";
import { ERROR_MESSAGES, HEADERS } from "@credvault/shared";
import { InvalidOrExpiredTokenError, MissingOrMalformedAuthError } from "../errors.js";
import type { TokenIssuer } from "../services/token-issuer.js";

/**
 * Hono environment for routes behind the gate; `c.get("userId")` is typed.
 */
export interface AuthEnv {
  Variables: {
    userId: number;
  };
}

/**
 * Extract the token from an Authorization header value.
 * @throws MissingOrMalformedAuthError
 */
export function extractBearerToken(header: string | undefined): string {
  if (!header) {
    throw new MissingOrMalformedAuthError(ERROR_MESSAGES.AUTH_HEADER_MISSING);
  }

  const parts = header.split(" ");
  if (parts.length !== 2 || parts[0] !== HEADERS.BEARER_SCHEME || parts[1] === "") {
    throw new MissingOrMalformedAuthError();
  }
  return parts[1];
}

/**
 * Resolve an Authorization header to an account id.
 * @throws MissingOrMalformedAuthError | InvalidOrExpiredTokenError
 */
export async function resolveBearer(
  header: string | undefined,
  tokens: TokenIssuer
): Promise<number> {
  const token = extractBearerToken(header);
  const userId = await tokens.verify(token);
  if (userId === null) {
    throw new InvalidOrExpiredTokenError();
  }
  return userId;
}

export function authGate(tokens: TokenIssuer): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const userId = await resolveBearer(c.req.header(HEADERS.AUTHORIZATION), tokens);
    c.set("userId", userId);
    await next();
  };
}
