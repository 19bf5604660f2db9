/**
 * Environment configuration
 *
 * process.env validated once at startup. Entry points import 'dotenv/config'
 * before this module so .env values are visible here.
 */

import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  POOL_API_BASE_URL: z.string().url().default('http://wynnextras.com'),
  CATEGORY_API_BASE_URL: z.string().url().default('https://api.wynncraft.com/v3'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  POOL_CACHE_TTL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  CATEGORY_CACHE_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();
