/**
 * aggregator.ts — Bulk listing snapshot and the views derived from it
 *
 * The unfiltered snapshot is fetched once, cached under `all-listings`, and
 * every per-city/agent/type view, count and existence check is computed from
 * it without further remote calls. Mutations call `evictAll()`.
 */
import type { Logger } from 'pino';
import { childLogger } from '../shared/logger.ts';
import { CACHE_KEYS, type Cache, type CacheKey } from './cache-service.ts';
import type { ListingClient } from './listing-client.ts';
import { filterActive, hasText, isActive, relationId, remoteOutcome } from './helpers.ts';
import type { ListingSummary, Relation, RemoteError, RemoteResult } from '../types.ts';

export interface AggregatorOptions {
  knownDefectStatus: number;
  log?: Logger;
}

/** True for the remote status that routes a read onto the snapshot. */
export function isKnownDefect(error: RemoteError, knownDefectStatus: number): boolean {
  return error.kind === 'status' && error.status === knownDefectStatus;
}

function requireId(id: string, what: string): void {
  if (!hasText(id)) throw new TypeError(`${what} is required`);
}

export class ListingAggregator {
  private readonly knownDefectStatus: number;
  private readonly log: Logger;

  constructor(
    private readonly client: ListingClient,
    private readonly cache: Cache<ListingSummary[]>,
    opts: AggregatorOptions,
  ) {
    this.knownDefectStatus = opts.knownDefectStatus;
    this.log = opts.log ?? childLogger({ module: 'aggregator' });
  }

  /** Cached unfiltered snapshot; an empty or failed fetch yields [] and is not cached. */
  getAll(): Promise<ListingSummary[]> {
    return this.snapshot(CACHE_KEYS.allListings, () => this.client.fetchAll());
  }

  /** Cached featured listings, same rules as `getAll`. */
  getFeatured(): Promise<ListingSummary[]> {
    return this.snapshot(CACHE_KEYS.featuredListings, () => this.client.fetchFeatured());
  }

  async getByCity(cityId: string): Promise<ListingSummary[]> {
    requireId(cityId, 'cityId');
    return this.activeBy('city', cityId);
  }

  async getByAgent(agentId: string): Promise<ListingSummary[]> {
    requireId(agentId, 'agentId');
    return this.activeBy('agent', agentId);
  }

  async getByType(propertyTypeId: string): Promise<ListingSummary[]> {
    requireId(propertyTypeId, 'propertyTypeId');
    return this.activeBy('type', propertyTypeId);
  }

  /**
   * Agent listings from the dedicated endpoint (every status). On the
   * known-defect status the same set is derived from the snapshot.
   */
  async getByAgentDirect(agentId: string): Promise<ListingSummary[]> {
    requireId(agentId, 'agentId');
    const res = await this.client.fetchByAgent(agentId);
    if (res.ok) return res.value;

    if (isKnownDefect(res.error, this.knownDefectStatus)) {
      this.log.warn({ agentId, outcome: remoteOutcome(res.error) }, 'Agent endpoint failed; deriving from snapshot');
      const all = await this.getAll();
      return all.filter(l => l.agentId === agentId);
    }

    this.logFailure(res.error, 'fetchByAgent');
    return [];
  }

  async hasActive(id: string, relation: Relation = 'city'): Promise<boolean> {
    return (await this.countActive(id, relation)) > 0;
  }

  async countActive(id: string, relation: Relation = 'city'): Promise<number> {
    requireId(id, `${relation} id`);
    return (await this.activeBy(relation, id)).length;
  }

  /** Single listing straight from the service; not cached. `null` when not found or on failure. */
  async getById(id: string): Promise<ListingSummary | null> {
    const res = await this.lookupById(id);
    return res.ok ? res.value : null;
  }

  /** Like `getById`, but a remote failure stays visible to the caller. */
  async lookupById(id: string): Promise<RemoteResult<ListingSummary | null>> {
    requireId(id, 'id');
    const res = await this.client.fetchById(id);
    if (!res.ok) this.logFailure(res.error, 'fetchById');
    return res;
  }

  /** Drop the bulk snapshots so the next read refetches. */
  async evictAll(): Promise<void> {
    await this.cache.evict(CACHE_KEYS.allListings);
    await this.cache.evict(CACHE_KEYS.featuredListings);
    this.log.debug('Listing snapshots evicted');
  }

  // ── internals ──

  private async activeBy(relation: Relation, id: string): Promise<ListingSummary[]> {
    const all = await this.getAll();
    return filterActive(all.filter(l => relationId(l, relation) === id));
  }

  private async snapshot(
    key: CacheKey,
    load: () => Promise<RemoteResult<ListingSummary[]>>,
  ): Promise<ListingSummary[]> {
    const cached = await this.cache.get(key);
    if (cached) return cached;

    const res = await load();
    if (!res.ok) {
      this.logFailure(res.error, key);
      return [];
    }
    if (res.value.length === 0) {
      this.log.info({ key }, 'Listing service returned no rows; not caching');
      return [];
    }

    await this.cache.put(key, res.value);
    this.log.debug({ key, count: res.value.length, active: res.value.filter(isActive).length }, 'Snapshot cached');
    return res.value;
  }

  private logFailure(error: RemoteError, operation: string): void {
    const fields = { operation, outcome: remoteOutcome(error), error: error.message };
    if (error.kind === 'unreachable') this.log.warn(fields, 'Listing service unreachable');
    else this.log.error(fields, 'Listing service call failed');
  }
}
