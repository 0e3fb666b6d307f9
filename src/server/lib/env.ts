/**
 * Zod-based environment variable validation.
 *
 * The Node entry point loads `.env` with dotenv and passes `process.env`
 * through this schema once at startup, so configuration problems fail with
 * field-level messages before the server binds its port rather than deep
 * inside a request.
 */

import { z } from "zod";

export const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  // HS256 signing key for access and refresh tokens
  JWT_SECRET: z.string().min(32),
  // Appended to every password before hashing; never stored with the hash
  PASSWORD_PEPPER: z.string().min(16),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(15 * 60),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(30 * 24 * 60 * 60),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  CORS_ORIGIN: z.string().min(1).optional(),
  ENVIRONMENT: z
    .enum(["development", "production", "test"])
    .default("development"),
  // New Relic — optional; omitted in local dev
  NEW_RELIC_LICENSE_KEY: z.string().min(1).optional(),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

/**
 * Parse and validate a raw env object. Throws a ZodError with detailed
 * field-level messages if validation fails.
 */
export function validateEnv(env: Record<string, unknown>): ValidatedEnv {
  return envSchema.parse(env);
}
