/**
 * Account Schemas
 *
 * Zod schemas for account input. Request bodies are parsed into typed
 * structs at the HTTP boundary before any service code runs.
 */

import { z } from "zod";
import { ACCOUNT_RULES, ERROR_MESSAGES } from "@credvault/shared";
import type { AccountInput } from "@credvault/shared";
import { ValidationError } from "../errors.js";

const MISSING = ERROR_MESSAGES.MISSING_FIELDS;

const requiredString = () =>
  z
    .string({ required_error: MISSING, invalid_type_error: MISSING })
    .min(1, MISSING);

// =============================================================================
// FIELD SCHEMAS
// =============================================================================

export const UsernameSchema = requiredString().regex(
  ACCOUNT_RULES.USERNAME_PATTERN,
  ERROR_MESSAGES.INVALID_USERNAME
);

export const ExternalIdentitySchema = requiredString()
  .max(ACCOUNT_RULES.IDENTITY_MAX_LENGTH, ERROR_MESSAGES.INVALID_IDENTITY)
  .email(ERROR_MESSAGES.INVALID_IDENTITY);

export const SecretSchema = requiredString().min(
  ACCOUNT_RULES.SECRET_MIN_LENGTH,
  ERROR_MESSAGES.SHORT_SECRET
);

/**
 * Account input as the service validates it
 */
export const AccountInputSchema = z.object({
  username: UsernameSchema,
  externalIdentity: ExternalIdentitySchema,
  secret: SecretSchema,
});

// =============================================================================
// REQUEST BODY SCHEMAS
// =============================================================================

/**
 * Body of POST /api/auth/register and POST /api/auth/login.
 * Only presence is checked here; shape rules live in AccountInputSchema.
 */
export const AuthRequestSchema = z
  .object(
    {
      username: requiredString(),
      external_identity: requiredString(),
      secret: requiredString(),
    },
    { required_error: MISSING, invalid_type_error: MISSING }
  )
  .transform(
    (body): AccountInput => ({
      username: body.username,
      externalIdentity: body.external_identity,
      secret: body.secret,
    })
  );

export type AuthRequest = z.infer<typeof AuthRequestSchema>;

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Parse `data` or throw a ValidationError carrying one client-facing message.
 * A missing field outranks every shape complaint.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const parsed = schema.safeParse(data);
  if (parsed.success) {
    return parsed.data;
  }

  const { issues } = parsed.error;
  const missing = issues.some((issue) => issue.message === MISSING);
  throw new ValidationError(missing ? MISSING : (issues[0]?.message ?? MISSING));
}
