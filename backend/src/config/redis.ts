/**
 * config/redis.ts — Redis connection via ioredis
 *
 * Only used when ENABLE_REDIS_CACHE=true, as the shared backend for the listing cache.
 * Auto-reconnects with exponential backoff.
 */
import { Redis } from 'ioredis';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';

const log = childLogger({ module: 'redis' });

let redis: Redis | null = null;

/**
 * Get or create Redis client. Safe to call multiple times.
 */
export function getRedis(): Redis {
  if (redis) return redis;

  redis = new Redis(env.REDIS_URL, {
    keyPrefix: env.REDIS_KEY_PREFIX,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => {
      if (times > 10) return null; // Stop after 10 retries
      return Math.min(times * 200, 5000);
    },
    lazyConnect: true,
    enableReadyCheck: true,
  });

  redis.on('error', (err: Error) => {
    log.error({ err }, 'Redis connection error');
  });

  redis.on('ready', () => {
    log.info('Redis ready');
  });

  return redis;
}

/**
 * Check Redis connectivity. Returns latency in ms.
 */
export async function pingRedis(): Promise<number> {
  const start = Date.now();
  await getRedis().ping();
  return Date.now() - start;
}

/**
 * Gracefully close Redis. Call on shutdown.
 */
export async function closeRedis(): Promise<void> {
  if (redis) {
    await redis.quit();
    redis = null;
    log.info('Redis connection closed');
  }
}
