/**
 * Session tokens: stateless HS256 JWTs carrying the account id
 */

import { SignJWT, jwtVerify, errors } from "jose";
import type { Logger } from "pino";
import { SESSION_CONFIG } from "@credvault/shared";
import type { TokenInspection } from "@credvault/shared";
import { ConfigError } from "../errors.js";

export interface TokenIssuerOptions {
  signingSecret: string;
  ttlSeconds: number;
  log?: Logger;
  /** Current time in epoch seconds */
  now?: () => number;
}

export class TokenIssuer {
  private readonly key: Uint8Array;
  private readonly ttlSeconds: number;
  private readonly log?: Logger;
  private readonly now: () => number;

  constructor(options: TokenIssuerOptions) {
    if (options.signingSecret.length < SESSION_CONFIG.MIN_SECRET_LENGTH) {
      throw new ConfigError(
        `Signing secret must be at least ${SESSION_CONFIG.MIN_SECRET_LENGTH} characters`
      );
    }
    if (!Number.isInteger(options.ttlSeconds) || options.ttlSeconds <= 0) {
      throw new ConfigError("Token TTL must be a positive number of seconds");
    }
    this.key = new TextEncoder().encode(options.signingSecret);
    this.ttlSeconds = options.ttlSeconds;
    this.log = options.log;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  async issue(userId: number): Promise<string> {
    const issuedAt = this.now();
    return new SignJWT({ user_id: userId })
      .setProtectedHeader({ alg: SESSION_CONFIG.ALGORITHM, typ: "JWT" })
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + this.ttlSeconds)
      .sign(this.key);
  }

  /**
   * Resolve a token to its account id, or null. Never throws.
   */
  async verify(token: string): Promise<number | null> {
    const result = await this.inspect(token);
    if (result.ok) {
      return result.userId;
    }
    this.log?.warn({ reason: result.reason }, "Session token rejected");
    return null;
  }

  /**
   * Like verify, but reports why a token was rejected
   */
  async inspect(token: string): Promise<TokenInspection> {
    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: [SESSION_CONFIG.ALGORITHM],
        currentDate: new Date(this.now() * 1000),
      });

      const userId = payload.user_id;
      if (typeof userId !== "number" || !Number.isInteger(userId) || payload.exp === undefined) {
        return { ok: false, reason: "invalid" };
      }
      return { ok: true, userId, expiresAt: payload.exp };
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        return { ok: false, reason: "expired" };
      }
      return { ok: false, reason: "invalid" };
    }
  }
}
