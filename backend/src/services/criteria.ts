/**
 * criteria.ts — Search criteria parsing and translation
 *
 * parseSearchCriteria: raw query strings → SearchCriteria (bad values drop one dimension)
 * translateCriteria:   SearchCriteria → remote query with city/type names resolved to ids
 */
import type { Logger } from 'pino';
import { childLogger } from '../shared/logger.ts';
import { hasText } from './helpers.ts';
import type { NameIndex } from './reference.ts';
import type { ListingSearchQuery } from '../schemas.ts';
import type { Dimension, RemoteQuery, SearchCriteria, TranslatedCriteria } from '../types.ts';

const defaultLog = childLogger({ module: 'criteria' });

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/** Finite decimal: "250000", "250,000.50", "-3"; rejects "", "1e5", "1,5", "12abc". */
const DECIMAL_RE = /^-?(\d{1,3}(,\d{3})+|\d+)(\.\d+)?$/;
const INTEGER_RE = /^-?\d+$/;

function parseDecimal(value: string): number | undefined {
  const v = value.trim();
  return DECIMAL_RE.test(v) ? Number(v.replace(/,/g, '')) : undefined;
}

function parseInteger(value: string): number | undefined {
  const v = value.trim();
  return INTEGER_RE.test(v) ? Number(v) : undefined;
}

function parseBoolean(value: string): boolean | undefined {
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === '1' || v === 'yes') return true;
  if (v === 'false' || v === '0' || v === 'no') return false;
  return undefined;
}

/**
 * Build criteria from raw query values. Blank values mean "no constraint";
 * a value that does not parse is dropped with a warning, the rest still apply.
 */
export function parseSearchCriteria(raw: ListingSearchQuery, log: Logger = defaultLog): SearchCriteria {
  const criteria: Mutable<SearchCriteria> = {};
  const dropped: string[] = [];

  if (hasText(raw.search)) criteria.searchTerm = raw.search.trim();
  if (hasText(raw.city)) criteria.cityName = raw.city.trim();
  if (hasText(raw.type)) criteria.propertyTypeName = raw.type.trim();

  const numeric = [
    ['minPrice', raw.minPrice, parseDecimal],
    ['maxPrice', raw.maxPrice, parseDecimal],
    ['minBeds', raw.minBeds, parseInteger],
    ['minBaths', raw.minBaths, parseInteger],
    ['minArea', raw.minArea, parseDecimal],
    ['maxArea', raw.maxArea, parseDecimal],
  ] as const;

  for (const [field, value, parse] of numeric) {
    if (!hasText(value)) continue;
    const n = parse(value);
    if (n === undefined) dropped.push(field);
    else criteria[field] = n;
  }

  if (hasText(raw.featured)) {
    const featured = parseBoolean(raw.featured);
    if (featured === undefined) dropped.push('featured');
    else criteria.featured = featured;
  }

  if (dropped.length) {
    log.warn({ dropped, raw }, 'Ignoring malformed search filters');
  }

  return Object.freeze(criteria);
}

/** True when no dimension is constrained. */
export function isUnconstrained(criteria: SearchCriteria): boolean {
  return Object.values(criteria).every(v => v === undefined);
}

/**
 * Resolve names to ids for the remote query. An unknown name is not an error:
 * it is left off the remote query, and since the remote then did not apply that
 * dimension the local re-check finds no match for it.
 */
export async function translateCriteria(criteria: SearchCriteria, names: NameIndex): Promise<TranslatedCriteria> {
  const cityId = hasText(criteria.cityName) ? await names.cityIdByName(criteria.cityName) : null;
  const propertyTypeId = hasText(criteria.propertyTypeName) ? await names.propertyTypeIdByName(criteria.propertyTypeName) : null;

  const remote: RemoteQuery = {};
  const applied = new Set<Dimension>();

  if (hasText(criteria.searchTerm)) {
    remote.search = criteria.searchTerm.trim();
    applied.add('text');
  }
  if (cityId !== null) {
    remote.cityId = cityId;
    applied.add('city');
  }
  if (propertyTypeId !== null) {
    remote.propertyTypeId = propertyTypeId;
    applied.add('type');
  }
  if (criteria.maxPrice !== undefined) {
    remote.maxPrice = criteria.maxPrice;
    applied.add('maxPrice');
  }

  return { criteria, cityId, propertyTypeId, remote, applied };
}
