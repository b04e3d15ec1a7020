/**
 * server.ts — Process entry point
 *
 * Feature-flagged infrastructure:
 *   ENABLE_REDIS_CACHE=true → listing snapshots and name lists in Redis
 *   SENTRY_DSN=…            → error tracking
 *
 * Everything works with flags unset (in-memory cache, no tracking).
 */
import 'dotenv/config';
import { env } from './config/env.ts';
import { closeRedis, getRedis } from './config/redis.ts';
import { initSentry, flushSentry, captureException } from './config/sentry.ts';
import { logger } from './shared/logger.ts';
import { createApp } from './app.ts';
import { getListingServices } from './services/index.ts';

const BOOT_TIME = Date.now();

const services = getListingServices();
const app = createApp(services);

// ─── Infrastructure init ───

async function initInfrastructure(): Promise<void> {
  await initSentry();

  if (env.ENABLE_REDIS_CACHE) {
    try {
      await getRedis().connect();
      logger.info('Redis connected');
    } catch (err) {
      logger.warn({ err }, 'Redis connect failed; cache reads will miss until it recovers');
    }
  } else {
    logger.info('Redis disabled (ENABLE_REDIS_CACHE=false)');
  }

  // Warm the snapshot; an empty result is not cached, so a cold remote is retried on first read
  const listings = await services.aggregator.getAll();
  const cities = await services.reference.cityNames();
  logger.info({ listings: listings.length, cities: cities.length, remote: env.LISTING_SERVICE_URL }, 'Caches warmed');
}

// ─── Graceful shutdown ───

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down...');
  server.close(() => logger.info('HTTP server closed'));

  setTimeout(() => { logger.warn('Forced exit (10s timeout)'); process.exit(1); }, 10000).unref();

  try {
    await flushSentry(2000);
    if (env.ENABLE_REDIS_CACHE) await closeRedis();
  } catch (err) {
    logger.warn({ err }, 'Cleanup error');
  }
  process.exit(0);
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
  captureException(reason);
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  captureException(err);
  setTimeout(() => process.exit(1), 1000).unref();
});

// ─── Start ───

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, env: env.NODE_ENV, apiBase: env.API_BASE, bootMs: Date.now() - BOOT_TIME }, 'Server started');
  initInfrastructure().catch((err: unknown) => {
    logger.error({ err }, 'Infrastructure init failed');
    captureException(err, { context: 'init' });
  });
});
