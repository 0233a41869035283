import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== '' ? value : undefined)),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 1000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
});

export interface RateLimitConfig {
  windowMs: number;
  max: number;
  loginMax: number;
}

export interface AppConfig {
  port: number;
  /** Unset means the in-memory user store. */
  databaseUrl?: string;
  rateLimit: RateLimitConfig;
}

/**
 * Reads configuration from the environment (after loading `.env`).
 * Throws with the list of offending variables when a value is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = loadDotenv()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    rateLimit: {
      windowMs: vars.RATE_LIMIT_WINDOW_MS,
      max: vars.RATE_LIMIT_MAX,
      loginMax: vars.LOGIN_RATE_LIMIT_MAX,
    },
  };
}

function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}
