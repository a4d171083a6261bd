import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  SECRET_KEY: z.string().min(1, 'SECRET_KEY environment variable is required'),
  DATABASE_URL: z.string().optional(),
  ADMIN_USERNAME: z.string().min(1).default('admin'),
  ADMIN_PASSWORD: z.string().min(1).optional(),
  EXPORT_FILE_PREFIX: z.string().min(1).default('finance'),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  LOGIN_RATE_LIMIT: z.coerce.number().int().positive().default(10),
  NODE_ENV: z.string().default('development'),
  COOKIE_SECURE: z.enum(['true', 'false']).optional(),
});

export interface AppConfig {
  port: number;
  secretKey: string;
  databaseUrl?: string;
  adminUsername: string;
  adminPassword?: string;
  exportFilePrefix: string;
  sessionTtlSeconds: number;
  loginRateLimit: number;
  /** Send the session cookie over HTTPS only. Defaults to on in production. */
  secureCookies: boolean;
}

/**
 * Read configuration from the environment. Call once at startup; `.env` is
 * loaded first when present.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    secretKey: parsed.SECRET_KEY,
    databaseUrl: parsed.DATABASE_URL,
    adminUsername: parsed.ADMIN_USERNAME,
    adminPassword: parsed.ADMIN_PASSWORD,
    exportFilePrefix: parsed.EXPORT_FILE_PREFIX,
    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,
    loginRateLimit: parsed.LOGIN_RATE_LIMIT,
    secureCookies: parsed.COOKIE_SECURE
      ? parsed.COOKIE_SECURE === 'true'
      : parsed.NODE_ENV === 'production',
  };
}
