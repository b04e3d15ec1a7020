/**
 * app.ts — Express application factory
 *
 * Services are injected so tests can mount the full middleware stack over
 * in-process stand-ins for the listing service.
 */
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import { ZodError } from 'zod';
import { env } from './config/env.ts';
import { captureException } from './config/sentry.ts';
import { requestContext, requestLogger } from './shared/logger.ts';
import { metricsMiddleware, metricsEndpoint } from './shared/metrics.ts';
import { createListingRouter } from './routes/listings.ts';
import { createHealthRouter } from './routes/health.ts';
import type { ListingServices } from './services/index.ts';
import { errorMessage } from './services/helpers.ts';

export interface AppOptions {
  apiBase?: string;
  adminKey?: string;
  allowedOrigins?: string;
  rateLimitMax?: number;
  rateLimitWindowMs?: number;
  now?: () => number;
}

/** Per-IP GET counter, reset once per window. */
function rateLimiter(max: number, windowMs: number, now: () => number) {
  const ipHits = new Map<string, number>();
  let windowStart = now();

  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.method !== 'GET') return next();
    if (now() - windowStart >= windowMs) {
      ipHits.clear();
      windowStart = now();
    }
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const hits = (ipHits.get(ip) ?? 0) + 1;
    ipHits.set(ip, hits);
    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - hits)));
    if (hits > max) {
      res.status(429).json({ success: false, error: 'Rate limited', retryAfter: Math.ceil(windowMs / 1000) });
      return;
    }
    next();
  };
}

/** Status carried by body-parser and http-errors style errors. */
function errorStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function createApp(services: ListingServices, opts: AppOptions = {}): Express {
  const apiBase = opts.apiBase ?? env.API_BASE;
  const origins = (opts.allowedOrigins ?? env.ALLOWED_ORIGINS ?? '*').split(',').map(s => s.trim());

  const app = express();
  app.set('trust proxy', 1);

  // ─── Security & Performance ───

  app.use(cors({
    origin: origins.includes('*') ? true : origins,
    credentials: true,
  }));
  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: '100kb' }));

  // ─── Metrics, then structured request logging ───

  app.use(metricsMiddleware(apiBase));
  app.use(requestLogger());

  // ─── Security headers ───

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (env.NODE_ENV === 'production') {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  app.use(apiBase, rateLimiter(
    opts.rateLimitMax ?? env.RATE_LIMIT_MAX,
    opts.rateLimitWindowMs ?? env.RATE_LIMIT_WINDOW_MS,
    opts.now ?? Date.now,
  ));

  // ─── API Routes ───

  app.get(`${apiBase}/metrics`, metricsEndpoint);
  app.use(`${apiBase}/health`, createHealthRouter(services));
  app.use(apiBase, createListingRouter(services, { adminKey: opts.adminKey ?? env.ADMIN_KEY }));

  app.use(apiBase, (_req, res) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // ─── Error handling ───

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { reqId, log } = requestContext(res);

    if (err instanceof ZodError) {
      const details = err.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      res.status(400).json({ success: false, error: 'Validation failed', details });
      return;
    }

    const status = errorStatus(err);
    if (status >= 400 && status < 500) {
      res.status(status).json({ success: false, error: errorMessage(err), requestId: reqId });
      return;
    }

    log.error({ err, method: req.method, url: req.originalUrl }, `Unhandled error [${reqId}]`);
    captureException(err, { requestId: reqId, url: req.originalUrl });
    res.status(500).json({
      success: false,
      error: env.NODE_ENV === 'production' ? 'Internal server error' : errorMessage(err),
      requestId: reqId,
    });
  });

  return app;
}
