/**
 * routes/health.ts — Health check endpoints
 *
 * GET /api/health         — Quick liveness check
 * GET /api/health/ready   — Readiness check (Redis + cache + reference data)
 */
import { Router, type Request, type Response } from 'express';
import { env } from '../config/env.ts';
import { pingRedis } from '../config/redis.ts';
import { getCacheStats } from '../services/cache-service.ts';
import type { ListingServices } from '../services/index.ts';
import { errorMessage } from '../services/helpers.ts';

interface Check {
  status: 'ok' | 'error' | 'disabled';
  latencyMs?: number;
  error?: string;
  details?: Record<string, unknown>;
}

export function createHealthRouter(services: Pick<ListingServices, 'cacheBackend' | 'reference'>): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const checks: Record<string, Check> = {};

    // Redis check
    if (services.cacheBackend.type === 'redis') {
      try {
        checks.redis = { status: 'ok', latencyMs: await pingRedis() };
      } catch (err) {
        checks.redis = { status: 'error', error: errorMessage(err) };
      }
    } else {
      checks.redis = { status: 'disabled' };
    }

    // Cache stats
    try {
      const stats = await getCacheStats(services.cacheBackend);
      checks.cache = { status: 'ok', details: { ...stats } };
    } catch (err) {
      checks.cache = { status: 'error', error: errorMessage(err) };
    }

    // Reference data (an empty table leaves every city/type filter unresolved)
    const cities = await services.reference.cityNames();
    checks.reference = cities.length
      ? { status: 'ok', details: { cities: cities.length } }
      : { status: 'error', error: 'No cities loaded' };

    // Memory
    const mem = process.memoryUsage();
    checks.memory = {
      status: 'ok',
      details: {
        heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
        rssMB: Math.round(mem.rss / 1024 / 1024),
      },
    };

    const hasError = Object.values(checks).some(c => c.status === 'error');
    res.status(hasError ? 503 : 200).json({
      status: hasError ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      checks,
      config: {
        nodeEnv: env.NODE_ENV,
        enableRedis: env.ENABLE_REDIS_CACHE,
        knownDefectStatus: env.KNOWN_DEFECT_STATUS,
      },
    });
  });

  return router;
}
