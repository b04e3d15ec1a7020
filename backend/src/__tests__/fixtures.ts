import { vi } from 'vitest';
import { pino, type Logger } from 'pino';
import { ok } from '../services/listing-client.ts';
import type { ListingClient } from '../services/listing-client.ts';
import type { ListingSummary } from '../types.ts';

export function listing(overrides: Partial<ListingSummary> & { id: string }): ListingSummary {
  return {
    title: `Listing ${overrides.id}`,
    description: null,
    price: null,
    cityId: null,
    propertyTypeId: null,
    agentId: null,
    bedrooms: null,
    bathrooms: null,
    area: null,
    featured: null,
    status: 'ACTIVE',
    ...overrides,
  };
}

/** ListingClient double; every call succeeds with an empty payload until told otherwise. */
export function fakeClient() {
  return {
    fetchAll: vi.fn<ListingClient['fetchAll']>().mockResolvedValue(ok([])),
    search: vi.fn<ListingClient['search']>().mockResolvedValue(ok([])),
    fetchByAgent: vi.fn<ListingClient['fetchByAgent']>().mockResolvedValue(ok([])),
    fetchByCity: vi.fn<ListingClient['fetchByCity']>().mockResolvedValue(ok([])),
    fetchFeatured: vi.fn<ListingClient['fetchFeatured']>().mockResolvedValue(ok([])),
    fetchById: vi.fn<ListingClient['fetchById']>().mockResolvedValue(ok(null)),
    create: vi.fn<ListingClient['create']>(),
    update: vi.fn<ListingClient['update']>().mockResolvedValue(ok(undefined)),
    delete: vi.fn<ListingClient['delete']>().mockResolvedValue(ok(undefined)),
  } satisfies ListingClient;
}

export type FakeClient = ReturnType<typeof fakeClient>;

/** Silent logger whose methods tests can spy on. */
export function quietLogger(): Logger {
  return pino({ level: 'silent' });
}

export const REFERENCE = {
  cities: [
    { id: 'c1', name: 'Springfield' },
    { id: 'c2', name: 'Shelbyville' },
  ],
  propertyTypes: [
    { id: 't1', name: 'Loft' },
    { id: 't2', name: 'House' },
  ],
};
