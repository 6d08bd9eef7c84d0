/**
 * Session token types
 */

export type TokenFailure = "expired" | "invalid";

export type TokenInspection =
  | { ok: true; userId: number; expiresAt: number }
  | { ok: false; reason: TokenFailure };

/**
 * Session configuration
 */
export const SESSION_CONFIG = {
  ALGORITHM: "HS256",
  MIN_SECRET_LENGTH: 32,
} as const;
