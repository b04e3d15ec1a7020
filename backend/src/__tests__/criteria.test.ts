import { describe, it, expect, vi } from 'vitest';
import { isUnconstrained, parseSearchCriteria, translateCriteria } from '../services/criteria.ts';
import { ReferenceDirectory, StaticReferenceSource } from '../services/reference.ts';
import { MemoryBackend, TypedCache } from '../services/cache-service.ts';
import { NameListSchema } from '../schemas.ts';
import { REFERENCE, quietLogger } from './fixtures.ts';

function directory() {
  return new ReferenceDirectory(
    new StaticReferenceSource(REFERENCE),
    new TypedCache(new MemoryBackend(), NameListSchema, { log: quietLogger() }),
    quietLogger(),
  );
}

describe('parseSearchCriteria', () => {
  it('parses every dimension', () => {
    const criteria = parseSearchCriteria({
      search: ' loft ', city: 'Springfield', type: 'Loft',
      minPrice: '100000', maxPrice: '250,000.50', minBeds: '2', minBaths: '1',
      minArea: '40.5', maxArea: '120', featured: 'true',
    }, quietLogger());

    expect(criteria).toEqual({
      searchTerm: 'loft', cityName: 'Springfield', propertyTypeName: 'Loft',
      minPrice: 100000, maxPrice: 250000.5, minBeds: 2, minBaths: 1,
      minArea: 40.5, maxArea: 120, featured: true,
    });
    expect(Object.isFrozen(criteria)).toBe(true);
  });

  it('treats blank values as unconstrained', () => {
    const criteria = parseSearchCriteria({ search: '   ', city: '', maxPrice: '' }, quietLogger());
    expect(criteria).toEqual({});
    expect(isUnconstrained(criteria)).toBe(true);
  });

  it('drops malformed numbers and booleans with a warning, keeping the rest', () => {
    const log = quietLogger();
    const warn = vi.spyOn(log, 'warn');

    const criteria = parseSearchCriteria({ maxPrice: 'cheap', minBeds: '2.5', minPrice: '1e5', featured: 'maybe', city: 'Springfield' }, log);

    expect(criteria).toEqual({ cityName: 'Springfield' });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatchObject({ dropped: ['minPrice', 'maxPrice', 'minBeds', 'featured'] });
  });

  it('accepts commas only as thousands separators', () => {
    const log = quietLogger();
    const warn = vi.spyOn(log, 'warn');

    const criteria = parseSearchCriteria({ maxPrice: '1,5', minPrice: ',,,9', minArea: '1,234,567', maxArea: '12,34' }, log);

    expect(criteria).toEqual({ minArea: 1234567 });
    expect(warn.mock.calls[0]?.[0]).toMatchObject({ dropped: ['minPrice', 'maxPrice', 'maxArea'] });
  });

  it('accepts 0/1 and yes/no for featured', () => {
    expect(parseSearchCriteria({ featured: '0' }, quietLogger())).toEqual({ featured: false });
    expect(parseSearchCriteria({ featured: 'YES' }, quietLogger())).toEqual({ featured: true });
  });
});

describe('translateCriteria', () => {
  it('resolves names case-insensitively and passes maxPrice through', async () => {
    const t = await translateCriteria({ cityName: 'springFIELD', propertyTypeName: ' loft ', maxPrice: 300000, minBeds: 2 }, directory());

    expect(t.cityId).toBe('c1');
    expect(t.propertyTypeId).toBe('t1');
    expect(t.remote).toEqual({ cityId: 'c1', propertyTypeId: 't1', maxPrice: 300000 });
    expect([...t.applied].sort()).toEqual(['city', 'maxPrice', 'type']);
  });

  it('leaves an unresolved name off the remote query without failing', async () => {
    const t = await translateCriteria({ cityName: 'Atlantis', searchTerm: 'loft' }, directory());

    expect(t.cityId).toBeNull();
    expect(t.remote).toEqual({ search: 'loft' });
    expect(t.applied.has('city')).toBe(false);
    expect(t.applied.has('text')).toBe(true);
  });

  it('does not consult the name index for absent names', async () => {
    const names = { cityIdByName: vi.fn(), propertyTypeIdByName: vi.fn() };
    const t = await translateCriteria({ minPrice: 5 }, names);
    expect(names.cityIdByName).not.toHaveBeenCalled();
    expect(names.propertyTypeIdByName).not.toHaveBeenCalled();
    expect(t.remote).toEqual({});
  });
});
