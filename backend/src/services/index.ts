// ═══════════════════════════════════════════════════════
// services/index.ts — Wiring for the listing services
// ═══════════════════════════════════════════════════════
import { env } from '../config/env.ts';
import { ListingListSchema, NameListSchema } from '../schemas.ts';
import { createCache, getCacheBackend, type CacheBackend } from './cache-service.ts';
import { HttpListingClient, type ListingClient } from './listing-client.ts';
import { ListingAggregator } from './aggregator.ts';
import { SearchOrchestrator } from './search.ts';
import { ListingMutations } from './mutations.ts';
import { JsonFileReferenceSource, ReferenceDirectory, type ReferenceSource } from './reference.ts';

export interface ListingServices {
  client: ListingClient;
  aggregator: ListingAggregator;
  search: SearchOrchestrator;
  mutations: ListingMutations;
  reference: ReferenceDirectory;
  cacheBackend: CacheBackend;
}

/** Every collaborator is replaceable; unset ones come from env. */
export interface ListingServicesOptions {
  client?: ListingClient;
  cacheBackend?: CacheBackend;
  referenceSource?: ReferenceSource;
  knownDefectStatus?: number;
}

export function createListingServices(opts: ListingServicesOptions = {}): ListingServices {
  const client = opts.client ?? new HttpListingClient({
    baseUrl: env.LISTING_SERVICE_URL,
    timeoutMs: env.LISTING_SERVICE_TIMEOUT_MS,
  });
  const cacheBackend = opts.cacheBackend ?? getCacheBackend();
  const knownDefectStatus = opts.knownDefectStatus ?? env.KNOWN_DEFECT_STATUS;

  const reference = new ReferenceDirectory(
    opts.referenceSource ?? new JsonFileReferenceSource(env.REFERENCE_DATA_PATH),
    createCache(NameListSchema, cacheBackend),
  );
  const aggregator = new ListingAggregator(client, createCache(ListingListSchema, cacheBackend), { knownDefectStatus });
  const search = new SearchOrchestrator(client, aggregator, reference, { knownDefectStatus });
  const mutations = new ListingMutations(client, aggregator);

  return { client, aggregator, search, mutations, reference, cacheBackend };
}

let _services: ListingServices | null = null;

export function getListingServices(): ListingServices {
  if (!_services) _services = createListingServices();
  return _services;
}
