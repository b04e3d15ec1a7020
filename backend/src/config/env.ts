/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a value is malformed.
 * Provides typed access to all config values.
 */
import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  API_BASE: z.string().default('/api'),
  ALLOWED_ORIGINS: z.string().optional(),

  // ── Remote listing service ──
  LISTING_SERVICE_URL: z.string().url().default('http://localhost:8083'),
  LISTING_SERVICE_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
  // Status the listing service answers with when it hits its known data-shape defect
  KNOWN_DEFECT_STATUS: z.coerce.number().int().min(400).max(599).default(500),

  // ── Reference data (cities, property types) ──
  REFERENCE_DATA_PATH: z.string().default('backend/data/reference.json'),

  // ── Cache ──
  ENABLE_REDIS_CACHE: flag,
  REDIS_URL: z.string().default('redis://localhost:6379'),
  REDIS_KEY_PREFIX: z.string().default('listings:'),
  CACHE_TTL_SEC: z.coerce.number().int().min(0).default(0),   // 0 = evict on write only

  // ── Rate Limiting ──
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),

  // ── Admin ──
  ADMIN_KEY: z.string().min(1).optional(),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // ── Error Tracking ──
  SENTRY_DSN: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment.
 * Blank values are treated as unset so `FOO=` in a .env file falls back to the default.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') raw[key] = value;
  }

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
