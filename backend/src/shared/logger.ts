/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines
 * Test:        silent unless LOG_LEVEL is set
 *
 * Features:
 *   - Redacts sensitive headers (authorization, cookie) and admin keys
 *   - Child loggers per module and per request
 *   - Express middleware for request logging with request-id correlation
 */
import { pino, stdSerializers, type Logger } from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { env } from '../config/env.ts';

function defaultLevel(): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export const logger: Logger = pino({
  level: defaultLevel(),
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined,
  base: {
    service: 'listing-gateway',
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
  },
  serializers: {
    err: stdSerializers.err,
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie', 'req.query.key', '*.adminKey'],
    censor: '[REDACTED]',
  },
});

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ module: 'search' });
 */
export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}

/** Per-request data the request logger leaves on `res.locals`. */
export interface RequestContext {
  reqId: string;
  log: Logger;
}

/** Read the request context set by `requestLogger`, creating a detached one if absent. */
export function requestContext(res: Response): RequestContext {
  const { reqId, log } = res.locals;
  if (typeof reqId === 'string' && isLogger(log)) return { reqId, log };
  const id = randomUUID().slice(0, 8);
  return { reqId: id, log: logger.child({ reqId: id }) };
}

function isLogger(value: unknown): value is Logger {
  return typeof value === 'object' && value !== null && 'child' in value && 'info' in value;
}

/**
 * Express middleware: logs every API request with duration and status.
 * Attaches a child logger to res.locals.log for per-request context.
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();
    const header = req.headers['x-request-id'];
    const reqId = typeof header === 'string' && header ? header : randomUUID().slice(0, 8);
    const log = logger.child({ reqId });

    res.locals.reqId = reqId;
    res.locals.log = log;
    res.setHeader('X-Request-Id', reqId);

    res.on('finish', () => {
      const duration = Date.now() - start;
      const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`;
      const fields = {
        req: { method: req.method, url: req.originalUrl, ip: req.ip },
        res: { statusCode: res.statusCode },
        duration,
      };
      if (res.statusCode >= 500) log.error(fields, line);
      else if (res.statusCode >= 400) log.warn(fields, line);
      else log.info(fields, line);
    });

    next();
  };
}
