// ═══════════════════════════════════════════════════════
// filter.ts — Listing predicate engine
//
// One predicate per dimension, composed by `matches`. The same composition
// runs in two modes:
//   residual — after a remote search that already applied some dimensions
//   full     — over the unfiltered snapshot when the remote search failed
// A null value on a constrained dimension never matches.
// ═══════════════════════════════════════════════════════
import type { Dimension, ListingSummary, SearchCriteria, TranslatedCriteria } from '../types.ts';
import { hasText } from './helpers.ts';

/** Dimensions a successful remote search can apply. */
export const RESIDUAL_APPLIED: ReadonlySet<Dimension> = new Set<Dimension>(['city', 'type', 'maxPrice', 'text']);

export const FULL_MODE: ReadonlySet<Dimension> = new Set<Dimension>();

// ── Predicates ──

/** `cityId` null means the requested name did not resolve, so nothing matches. */
export function matchesCity(item: ListingSummary, cityId: string | null): boolean {
  return cityId !== null && item.cityId === cityId;
}

export function matchesType(item: ListingSummary, propertyTypeId: string | null): boolean {
  return propertyTypeId !== null && item.propertyTypeId === propertyTypeId;
}

export function matchesMinPrice(item: ListingSummary, min: number): boolean {
  return item.price !== null && item.price >= min;
}

export function matchesMaxPrice(item: ListingSummary, max: number): boolean {
  return item.price !== null && item.price <= max;
}

export function matchesMinBeds(item: ListingSummary, min: number): boolean {
  return item.bedrooms !== null && item.bedrooms >= min;
}

export function matchesMinBaths(item: ListingSummary, min: number): boolean {
  return item.bathrooms !== null && item.bathrooms >= min;
}

export function matchesArea(item: ListingSummary, min: number | undefined, max: number | undefined): boolean {
  if (min === undefined && max === undefined) return true;
  if (item.area === null) return false;
  if (min !== undefined && item.area < min) return false;
  if (max !== undefined && item.area > max) return false;
  return true;
}

export function matchesFeatured(item: ListingSummary, featured: boolean): boolean {
  return item.featured !== null && item.featured === featured;
}

/** Case-insensitive substring of title or description. */
export function matchesText(item: ListingSummary, term: string): boolean {
  const needle = term.trim().toLowerCase();
  if (!needle) return true;
  return item.title.toLowerCase().includes(needle)
    || (item.description !== null && item.description.toLowerCase().includes(needle));
}

// ── Composition ──

/**
 * Check every constrained dimension not in `applied`.
 * City and type compare against the ids resolved in `translated`.
 */
export function matches(item: ListingSummary, translated: TranslatedCriteria, applied: ReadonlySet<Dimension>): boolean {
  const c: SearchCriteria = translated.criteria;
  const check = (dim: Dimension) => !applied.has(dim);

  if (check('city') && hasText(c.cityName) && !matchesCity(item, translated.cityId)) return false;
  if (check('type') && hasText(c.propertyTypeName) && !matchesType(item, translated.propertyTypeId)) return false;
  if (check('minPrice') && c.minPrice !== undefined && !matchesMinPrice(item, c.minPrice)) return false;
  if (check('maxPrice') && c.maxPrice !== undefined && !matchesMaxPrice(item, c.maxPrice)) return false;
  if (check('beds') && c.minBeds !== undefined && !matchesMinBeds(item, c.minBeds)) return false;
  if (check('baths') && c.minBaths !== undefined && !matchesMinBaths(item, c.minBaths)) return false;
  if (check('area') && !matchesArea(item, c.minArea, c.maxArea)) return false;
  if (check('featured') && c.featured !== undefined && !matchesFeatured(item, c.featured)) return false;
  if (check('text') && hasText(c.searchTerm) && !matchesText(item, c.searchTerm)) return false;
  return true;
}

export function filterListings(
  items: ListingSummary[],
  translated: TranslatedCriteria,
  applied: ReadonlySet<Dimension>,
): ListingSummary[] {
  return items.filter(item => matches(item, translated, applied));
}
