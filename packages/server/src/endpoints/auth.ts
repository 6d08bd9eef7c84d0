/**
 * Registration and login endpoints
 */

import type { Context, Hono } from "hono";
import { ENDPOINTS, ERROR_MESSAGES } from "@credvault/shared";
import type { AuthResult, AuthSuccessResponse } from "@credvault/shared";
import { InvalidCredentialsError, ValidationError } from "../errors.js";
import { AuthRequestSchema, parseOrThrow } from "../schemas/account.schemas.js";
import type { AccountService } from "../services/account-service.js";
import type { AppEnv } from "../app.js";

export function setupAuthEndpoints(app: Hono<AppEnv>, accounts: AccountService) {
  const register = async (c: Context<AppEnv>) => {
    const input = parseOrThrow(AuthRequestSchema, await readJsonBody(c));
    const result = await accounts.register(input);
    return c.json(toResponse(result), 201);
  };

  const login = async (c: Context<AppEnv>) => {
    const input = parseOrThrow(AuthRequestSchema, await readJsonBody(c));
    try {
      const result = await accounts.login(input);
      return c.json(toResponse(result), 200);
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        c.get("log").info({ username: input.username }, "Login rejected");
      }
      throw error;
    }
  };

  app.post(ENDPOINTS.REGISTER, register);
  app.post(ENDPOINTS.REGISTER_SHORT, register);
  app.post(ENDPOINTS.LOGIN, login);
  app.post(ENDPOINTS.LOGIN_SHORT, login);
}

async function readJsonBody(c: Context<AppEnv>): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw new ValidationError(ERROR_MESSAGES.INVALID_JSON);
  }
}

function toResponse(result: AuthResult): AuthSuccessResponse {
  return {
    success: true,
    token: result.token,
    user_id: result.userId,
  };
}
