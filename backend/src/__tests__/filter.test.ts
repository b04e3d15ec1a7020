import { describe, it, expect } from 'vitest';
import {
  FULL_MODE, RESIDUAL_APPLIED, filterListings, matches,
  matchesArea, matchesCity, matchesFeatured, matchesMaxPrice, matchesMinBaths,
  matchesMinBeds, matchesMinPrice, matchesText, matchesType,
} from '../services/filter.ts';
import type { Dimension, SearchCriteria, TranslatedCriteria } from '../types.ts';
import { listing } from './fixtures.ts';

function translated(criteria: SearchCriteria, cityId: string | null = null, propertyTypeId: string | null = null): TranslatedCriteria {
  return { criteria, cityId, propertyTypeId, remote: {}, applied: new Set<Dimension>() };
}

describe('predicates', () => {
  const item = listing({
    id: 'a', title: 'Sunny Loft', description: 'Exposed brick', price: 250000,
    cityId: 'c1', propertyTypeId: 't1', bedrooms: 2, bathrooms: 1, area: 80.5, featured: true,
  });
  const bare = listing({ id: 'b' });

  it('city and type compare resolved ids', () => {
    expect(matchesCity(item, 'c1')).toBe(true);
    expect(matchesCity(item, 'c2')).toBe(false);
    expect(matchesCity(item, null)).toBe(false);
    expect(matchesType(item, 't1')).toBe(true);
    expect(matchesType(item, null)).toBe(false);
  });

  it('price bounds are inclusive', () => {
    expect(matchesMinPrice(item, 250000)).toBe(true);
    expect(matchesMinPrice(item, 250000.01)).toBe(false);
    expect(matchesMaxPrice(item, 250000)).toBe(true);
    expect(matchesMaxPrice(item, 249999.99)).toBe(false);
  });

  it('bed and bath floors', () => {
    expect(matchesMinBeds(item, 2)).toBe(true);
    expect(matchesMinBeds(item, 3)).toBe(false);
    expect(matchesMinBaths(item, 1)).toBe(true);
    expect(matchesMinBaths(item, 2)).toBe(false);
  });

  it('area floor and ceiling', () => {
    expect(matchesArea(item, 80, 81)).toBe(true);
    expect(matchesArea(item, 80.6, undefined)).toBe(false);
    expect(matchesArea(item, undefined, 80.4)).toBe(false);
    expect(matchesArea(bare, undefined, undefined)).toBe(true);
  });

  it('featured equality', () => {
    expect(matchesFeatured(item, true)).toBe(true);
    expect(matchesFeatured(item, false)).toBe(false);
  });

  it('text is a case-insensitive substring of title or description', () => {
    expect(matchesText(item, 'LOFT')).toBe(true);
    expect(matchesText(item, 'brick')).toBe(true);
    expect(matchesText(item, 'garden')).toBe(false);
    expect(matchesText(bare, 'listing b')).toBe(true);
  });

  it('null values never satisfy a constrained dimension', () => {
    expect(matchesMinPrice(bare, 0)).toBe(false);
    expect(matchesMaxPrice(bare, 1e9)).toBe(false);
    expect(matchesMinBeds(bare, 0)).toBe(false);
    expect(matchesMinBaths(bare, 0)).toBe(false);
    expect(matchesArea(bare, 0, undefined)).toBe(false);
    expect(matchesFeatured(bare, false)).toBe(false);
    expect(matchesCity(bare, 'c1')).toBe(false);
  });
});

describe('matches', () => {
  const item = listing({ id: 'a', title: 'Loft', price: 300000, cityId: 'c1', bedrooms: 1 });

  it('skips dimensions already applied', () => {
    const t = translated({ cityName: 'Springfield', maxPrice: 100000, searchTerm: 'garden' }, 'c2');
    expect(matches(item, t, FULL_MODE)).toBe(false);
    expect(matches(item, t, RESIDUAL_APPLIED)).toBe(true);
  });

  it('residual mode still checks floors and featured', () => {
    const t = translated({ minPrice: 400000 });
    expect(matches(item, t, RESIDUAL_APPLIED)).toBe(false);
    expect(matches(item, translated({ minBeds: 2 }), RESIDUAL_APPLIED)).toBe(false);
    expect(matches(item, translated({ featured: true }), RESIDUAL_APPLIED)).toBe(false);
  });

  it('an unresolved city name matches nothing when checked locally', () => {
    const t = translated({ cityName: 'Atlantis' }, null);
    expect(matches(item, t, FULL_MODE)).toBe(false);
  });

  it('status is not a filter dimension', () => {
    const sold = listing({ id: 's', status: 'SOLD', price: 10 });
    expect(matches(sold, translated({ maxPrice: 100 }), FULL_MODE)).toBe(true);
  });

  it('empty criteria match everything', () => {
    expect(matches(listing({ id: 'x' }), translated({}), FULL_MODE)).toBe(true);
  });
});

describe('fallback equivalence', () => {
  const snapshot = [
    listing({ id: '1', title: 'Loft downtown', price: 200000, cityId: 'c1', propertyTypeId: 't1', bedrooms: 2, area: 70, featured: true }),
    listing({ id: '2', title: 'Big house', price: 450000, cityId: 'c1', propertyTypeId: 't2', bedrooms: 4, area: 200, featured: false }),
    listing({ id: '3', title: 'Tiny loft', price: 120000, cityId: 'c2', propertyTypeId: 't1', bedrooms: 1, area: 35, featured: null }),
    listing({ id: '4', title: 'Loft with view', description: 'river', price: 380000, cityId: 'c1', propertyTypeId: 't1', bedrooms: 3, area: null }),
    listing({ id: '5', title: 'Unpriced loft', price: null, cityId: 'c1', propertyTypeId: 't1', bedrooms: 2, area: 60 }),
  ];

  // What the remote search would return: city, type, price ceiling and text applied
  function remoteSearch(t: TranslatedCriteria) {
    return filterListings(snapshot, t, new Set<Dimension>(['minPrice', 'beds', 'baths', 'area', 'featured']));
  }

  const cases: [string, TranslatedCriteria][] = [
    ['city + text + floors', translated({ cityName: 'Springfield', searchTerm: 'loft', minBeds: 2, minPrice: 150000 }, 'c1')],
    ['type + price band', translated({ propertyTypeName: 'Loft', minPrice: 100000, maxPrice: 300000 }, null, 't1')],
    ['area band + featured', translated({ minArea: 50, maxArea: 250, featured: false })],
    ['text only', translated({ searchTerm: 'RIVER' })],
  ];

  it.each(cases)('%s: full mode over snapshot equals residual mode over remote result', (_name, t) => {
    const residual = filterListings(remoteSearch(t), t, RESIDUAL_APPLIED).map(l => l.id);
    const full = filterListings(snapshot, t, FULL_MODE).map(l => l.id);
    expect(full).toEqual(residual);
  });

  it('city + text + floors resolves to the expected listings', () => {
    const t = cases[0]?.[1] ?? translated({});
    expect(filterListings(snapshot, t, FULL_MODE).map(l => l.id)).toEqual(['1', '4']);
  });
});
