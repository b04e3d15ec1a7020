import { describe, it, expect, vi } from 'vitest';
import {
  CACHE_KEYS, MemoryBackend, RedisBackend, TypedCache, getCacheStats, type RedisLike,
} from '../services/cache-service.ts';
import { ListingListSchema, NameListSchema } from '../schemas.ts';
import { listing, quietLogger } from './fixtures.ts';

describe('MemoryBackend', () => {
  it('keeps entries without a TTL until removed', async () => {
    let now = 0;
    const backend = new MemoryBackend(() => now);
    await backend.write('k', 'v', 0);
    now = 10 ** 12;
    expect(await backend.read('k')).toBe('v');
    await backend.remove('k');
    expect(await backend.read('k')).toBeNull();
  });

  it('expires entries after their TTL', async () => {
    let now = 1_000;
    const backend = new MemoryBackend(() => now);
    await backend.write('k', 'v', 60);
    now += 60_000;
    expect(await backend.read('k')).toBe('v');
    now += 1;
    expect(await backend.read('k')).toBeNull();
    expect(await backend.size()).toBe(0);
  });
});

describe('RedisBackend', () => {
  function fakeRedis() {
    return {
      get: vi.fn<RedisLike['get']>().mockResolvedValue(null),
      set: vi.fn<RedisLike['set']>().mockResolvedValue('OK'),
      setex: vi.fn<RedisLike['setex']>().mockResolvedValue('OK'),
      del: vi.fn<RedisLike['del']>().mockResolvedValue(1),
      dbsize: vi.fn<RedisLike['dbsize']>().mockResolvedValue(4),
    } satisfies RedisLike;
  }

  it('uses SET without a TTL and SETEX with one', async () => {
    const redis = fakeRedis();
    const backend = new RedisBackend(redis);
    await backend.write('a', '1', 0);
    await backend.write('b', '2', 30);
    expect(redis.set).toHaveBeenCalledWith('a', '1');
    expect(redis.setex).toHaveBeenCalledWith('b', 30, '2');
  });

  it('reports size from DBSIZE', async () => {
    expect(await getCacheStats(new RedisBackend(fakeRedis()))).toEqual({ type: 'redis', keys: 4 });
  });
});

describe('TypedCache', () => {
  it('round-trips a listing snapshot', async () => {
    const cache = new TypedCache(new MemoryBackend(), ListingListSchema, { log: quietLogger() });
    const value = [listing({ id: 'A', price: 100000 })];

    expect(await cache.get(CACHE_KEYS.allListings)).toBeNull();
    await cache.put(CACHE_KEYS.allListings, value);
    expect(await cache.get(CACHE_KEYS.allListings)).toEqual(value);

    await cache.evict(CACHE_KEYS.allListings);
    expect(await cache.get(CACHE_KEYS.allListings)).toBeNull();
  });

  it('keeps keys independent', async () => {
    const cache = new TypedCache(new MemoryBackend(), NameListSchema, { log: quietLogger() });
    await cache.put(CACHE_KEYS.cityNames, ['Springfield']);
    expect(await cache.get(CACHE_KEYS.propertyTypeNames)).toBeNull();
  });

  it('discards and evicts an entry of the wrong shape', async () => {
    const backend = new MemoryBackend();
    await backend.write(CACHE_KEYS.allListings, '{"not":"a list"}', 0);
    const cache = new TypedCache(backend, ListingListSchema, { log: quietLogger() });

    expect(await cache.get(CACHE_KEYS.allListings)).toBeNull();
    expect(await backend.read(CACHE_KEYS.allListings)).toBeNull();
  });

  it('reads a backend failure as a miss', async () => {
    const backend = new MemoryBackend();
    vi.spyOn(backend, 'read').mockRejectedValue(new Error('connection lost'));
    const log = quietLogger();
    const warn = vi.spyOn(log, 'warn');
    const cache = new TypedCache(backend, NameListSchema, { log });

    expect(await cache.get(CACHE_KEYS.cityNames)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('does not throw when a write fails', async () => {
    const backend = new MemoryBackend();
    vi.spyOn(backend, 'write').mockRejectedValue(new Error('read only'));
    const cache = new TypedCache(backend, NameListSchema, { log: quietLogger() });

    await expect(cache.put(CACHE_KEYS.cityNames, ['x'])).resolves.toBeUndefined();
  });

  it('passes the TTL to the backend', async () => {
    const backend = new MemoryBackend();
    const write = vi.spyOn(backend, 'write');
    const cache = new TypedCache(backend, NameListSchema, { ttlSec: 300, log: quietLogger() });

    await cache.put(CACHE_KEYS.cityNames, ['x']);

    expect(write).toHaveBeenCalledWith('city-names', '["x"]', 300);
  });
});
