/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: <API_BASE>/metrics
 *
 * Metrics:
 *   listing_http_requests_total           — Counter by method/route/status
 *   listing_http_request_duration_seconds — Histogram by method/route/status
 *   listing_cache_operations_total        — Counter by operation (hit/miss/set/del)
 *   listing_remote_calls_total            — Counter by endpoint/outcome
 *   listing_search_paths_total            — Counter by entry point and path taken
 */
import {
  Registry, Counter, Histogram,
  collectDefaultMetrics,
} from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'listing_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'listing_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'listing_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

// ── Cache Metrics ──

export const cacheOperations = new Counter({
  name: 'listing_cache_operations_total',
  help: 'Cache operations by type',
  labelNames: ['operation', 'cache_key'] as const, // hit, miss, set, del
  registers: [registry],
});

// ── Remote listing service ──

export const remoteCalls = new Counter({
  name: 'listing_remote_calls_total',
  help: 'Calls to the remote listing service by outcome',
  labelNames: ['endpoint', 'outcome'] as const, // ok, unreachable, status_<code>, other
  registers: [registry],
});

export const searchPaths = new Counter({
  name: 'listing_search_paths_total',
  help: 'Resolved read paths (remote, fallback, snapshot, unavailable, failed)',
  labelNames: ['entry', 'path'] as const,
  registers: [registry],
});

// ── Express Middleware ──

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Normalize route for metric labels.
 * Collapses ids: <base>/listings/4f0c… → <base>/listings/:id
 */
export function routeNormalizer(apiBase: string): (url: string) => string {
  const idSegment = new RegExp(`^${escapeRegExp(apiBase)}/(listings|cities|agents|types)/(?!(?:featured|stats)(?:[/?]|$))[^/?]+`);
  return url => {
    const path = url.split('?')[0] ?? url;
    return path.replace(idSegment, `${apiBase}/$1/:id`);
  };
}

/**
 * Metrics collection middleware. Place early in the middleware chain.
 */
export function metricsMiddleware(apiBase = '/api') {
  const normalize = routeNormalizer(apiBase);
  const metricsPath = `${apiBase}/metrics`;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path === metricsPath) return next();

    const end = httpRequestDuration.startTimer();
    res.on('finish', () => {
      const labels = { method: req.method, route: normalize(req.originalUrl || req.url), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch {
    res.status(500).end('Error collecting metrics');
  }
}
