import { describe, it, expect } from 'vitest';
import { buildListingStats } from '../services/stats.ts';
import { listing } from './fixtures.ts';

describe('buildListingStats', () => {
  it('counts active listings and summarizes their prices', () => {
    const stats = buildListingStats([
      listing({ id: '1', price: 100000, cityId: 'c1', agentId: 'g1', propertyTypeId: 't1', featured: true }),
      listing({ id: '2', price: 300000, cityId: 'c1', agentId: 'g2', propertyTypeId: 't1', status: null }),
      listing({ id: '3', price: 200000, cityId: 'c2', agentId: 'g1', propertyTypeId: 't2' }),
      listing({ id: '4', price: 900000, cityId: 'c2', agentId: 'g1', status: 'SOLD', featured: true }),
      listing({ id: '5', price: null, cityId: null, agentId: 'g2' }),
    ]);

    expect(stats).toEqual({
      total: 5,
      active: 4,
      featured: 1,
      price: { min: 100000, max: 300000, avg: 200000, median: 200000 },
      activeByCity: { c1: 2, c2: 1 },
      activeByAgent: { g1: 2, g2: 2 },
      activeByType: { t1: 2, t2: 1 },
    });
  });

  it('has no price summary without priced active listings', () => {
    const stats = buildListingStats([listing({ id: '1', status: 'SOLD', price: 5 })]);
    expect(stats.price).toBeNull();
    expect(stats.active).toBe(0);
  });
});
