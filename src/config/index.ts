import dotenv from 'dotenv';
import { z } from 'zod';
import type { EnvConfig } from '../types';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(120),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // Persistence
  STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().default('postgres://localhost:5432/tabkeeper'),
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(10),

  // Redis (OPTIONAL - only notifications go through it)
  REDIS_ENABLED: booleanFlag,
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),

  // Matching
  MATCH_THRESHOLD: z.coerce.number().int().min(0).max(100).default(60),
  LINK_MATCH_THRESHOLD: z.coerce.number().int().min(0).max(100).default(80),
  PENDING_DECISION_TTL_SECONDS: z.coerce.number().int().positive().default(900),

  NOTIFY_WEBHOOK_URL: z
    .string()
    .url()
    .optional()
    .or(z.literal('').transform(() => undefined)),
});

/**
 * Parses and validates process.env.
 * Exported for tests; the app reads the `env` singleton.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${problems}`);
  }

  return parsed.data;
}

export const env: EnvConfig = loadEnv();

export default env;
