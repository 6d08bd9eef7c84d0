/**
 * Shared constants
 */

/**
 * Error codes and their HTTP status
 */
export const ERROR_CODES = {
  VALIDATION_ERROR: 400,
  DUPLICATE_USERNAME: 400,
  INVALID_CREDENTIALS: 401,
  AUTH_REQUIRED: 401,
  INVALID_TOKEN: 401,
  DECRYPTION_FAILED: 500,
  STORAGE_UNAVAILABLE: 500,
  CONFIG_ERROR: 500,
  INTERNAL: 500,
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

export type ErrorStatus = (typeof ERROR_CODES)[ErrorCode];

/**
 * Client-facing error messages
 */
export const ERROR_MESSAGES = {
  MISSING_FIELDS: "username, external_identity, and secret are required",
  INVALID_USERNAME:
    "Username must be 3-30 characters of letters, digits, underscores or hyphens",
  INVALID_IDENTITY: "external_identity must be a valid email address",
  SHORT_SECRET: "secret must be at least 8 characters",
  DUPLICATE_USERNAME: "Username already exists",
  INVALID_JSON: "Request body must be valid JSON",
  INVALID_CREDENTIALS: "Invalid credentials",
  AUTH_HEADER_MISSING: "Authorization header missing",
  AUTH_HEADER_MALFORMED: "Invalid authorization header format",
  INVALID_TOKEN: "Invalid or expired token",
  INTERNAL: "Internal server error",
} as const;

/**
 * Account field rules
 */
export const ACCOUNT_RULES = {
  USERNAME_PATTERN: /^[A-Za-z0-9_-]{3,30}$/,
  SECRET_MIN_LENGTH: 8,
  IDENTITY_MAX_LENGTH: 255,
} as const;

/**
 * HTTP headers
 */
export const HEADERS = {
  AUTHORIZATION: "Authorization",
  BEARER_SCHEME: "Bearer",
  REQUEST_ID: "X-Request-Id",
} as const;

/**
 * Endpoints
 */
export const ENDPOINTS = {
  REGISTER: "/api/auth/register",
  LOGIN: "/api/auth/login",
  REGISTER_SHORT: "/register",
  LOGIN_SHORT: "/login",
  ME: "/api/me",
  HEALTH: "/health",
} as const;
