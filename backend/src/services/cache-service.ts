/**
 * services/cache-service.ts — Process-wide cache for bulk listing snapshots and name lists
 *
 * Redis-backed when ENABLE_REDIS_CACHE=true, in-memory Map otherwise.
 * Values are stored as JSON and validated against a zod schema on read, so a
 * stale or foreign entry reads as a miss instead of leaking a bad shape.
 *
 * Key naming convention (fixed logical names, never per-criteria):
 *   all-listings          — unfiltered listing snapshot
 *   featured-listings     — featured listing snapshot
 *   city-names            — sorted city names
 *   property-type-names   — sorted property type names
 *
 * Entries never expire unless CACHE_TTL_SEC > 0; writers evict explicitly.
 */
import type { ZodType } from 'zod';
import type { Logger } from 'pino';
import { env } from '../config/env.ts';
import { getRedis } from '../config/redis.ts';
import { childLogger } from '../shared/logger.ts';
import { cacheOperations } from '../shared/metrics.ts';
import { errorMessage } from './helpers.ts';

export const CACHE_KEYS = {
  allListings: 'all-listings',
  featuredListings: 'featured-listings',
  cityNames: 'city-names',
  propertyTypeNames: 'property-type-names',
} as const;

export type CacheKey = (typeof CACHE_KEYS)[keyof typeof CACHE_KEYS];

/** Typed view over one kind of cached value. */
export interface Cache<V> {
  get(key: CacheKey): Promise<V | null>;
  put(key: CacheKey, value: V): Promise<void>;
  evict(key: CacheKey): Promise<void>;
}

export interface CacheStats {
  type: 'memory' | 'redis';
  keys: number;
}

/** String-level storage the typed caches share. */
export interface CacheBackend {
  readonly type: CacheStats['type'];
  read(key: string): Promise<string | null>;
  write(key: string, data: string, ttlSec: number): Promise<void>;
  remove(key: string): Promise<void>;
  size(): Promise<number>;
}

// ── In-memory backend ──

export class MemoryBackend implements CacheBackend {
  readonly type = 'memory' as const;
  private readonly entries = new Map<string, { data: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async read(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.now() > entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.data;
  }

  async write(key: string, data: string, ttlSec: number): Promise<void> {
    const expiresAt = ttlSec > 0 ? this.now() + ttlSec * 1000 : Infinity;
    this.entries.set(key, { data, expiresAt });
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}

// ── Redis backend ──

/** The ioredis commands the Redis backend uses. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  dbsize(): Promise<number>;
}

export class RedisBackend implements CacheBackend {
  readonly type = 'redis' as const;

  constructor(private readonly redis: RedisLike) {}

  async read(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async write(key: string, data: string, ttlSec: number): Promise<void> {
    if (ttlSec > 0) await this.redis.setex(key, ttlSec, data);
    else await this.redis.set(key, data);
  }

  async remove(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async size(): Promise<number> {
    return this.redis.dbsize();
  }
}

// ── Typed cache ──

export interface TypedCacheOptions {
  ttlSec?: number;
  log?: Logger;
}

export class TypedCache<V> implements Cache<V> {
  private readonly ttlSec: number;
  private readonly log: Logger;

  constructor(
    private readonly backend: CacheBackend,
    private readonly schema: ZodType<V>,
    opts: TypedCacheOptions = {},
  ) {
    this.ttlSec = opts.ttlSec ?? 0;
    this.log = opts.log ?? childLogger({ module: 'cache' });
  }

  /**
   * Get cached value by key. Returns null on miss, on a backend failure,
   * or when the stored value no longer matches the schema.
   */
  async get(key: CacheKey): Promise<V | null> {
    let raw: string | null;
    try {
      raw = await this.backend.read(key);
    } catch (err) {
      this.log.warn({ key, error: errorMessage(err) }, 'Cache read failed');
      return null;
    }

    if (raw === null) {
      cacheOperations.inc({ operation: 'miss', cache_key: key });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = undefined;
    }
    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      this.log.warn({ key }, 'Discarding cache entry with unexpected shape');
      cacheOperations.inc({ operation: 'miss', cache_key: key });
      await this.evict(key);
      return null;
    }

    cacheOperations.inc({ operation: 'hit', cache_key: key });
    return result.data;
  }

  async put(key: CacheKey, value: V): Promise<void> {
    try {
      await this.backend.write(key, JSON.stringify(value), this.ttlSec);
      cacheOperations.inc({ operation: 'set', cache_key: key });
    } catch (err) {
      this.log.warn({ key, error: errorMessage(err) }, 'Cache write failed');
    }
  }

  async evict(key: CacheKey): Promise<void> {
    try {
      await this.backend.remove(key);
      cacheOperations.inc({ operation: 'del', cache_key: key });
    } catch (err) {
      this.log.warn({ key, error: errorMessage(err) }, 'Cache evict failed');
    }
  }
}

// ── Singleton backend ──

let _backend: CacheBackend | null = null;

export function getCacheBackend(): CacheBackend {
  if (_backend) return _backend;
  _backend = env.ENABLE_REDIS_CACHE ? new RedisBackend(getRedis()) : new MemoryBackend();
  return _backend;
}

/** Cache stats for the readiness endpoint. */
export async function getCacheStats(backend: CacheBackend = getCacheBackend()): Promise<CacheStats> {
  return { type: backend.type, keys: await backend.size() };
}

export function createCache<V>(schema: ZodType<V>, backend: CacheBackend = getCacheBackend()): Cache<V> {
  return new TypedCache(backend, schema, { ttlSec: env.CACHE_TTL_SEC });
}
