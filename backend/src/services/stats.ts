/**
 * stats.ts — Dashboard counters over the listing snapshot
 */
import { avg, isActive, med, relationId } from './helpers.ts';
import type { ListingStats, ListingSummary, PriceStats, Relation } from '../types.ts';

function countBy(listings: ListingSummary[], relation: Relation): Record<string, number> {
  const out: Record<string, number> = {};
  for (const l of listings) {
    const key = relationId(l, relation);
    if (key === null) continue;
    out[key] = (out[key] ?? 0) + 1;
  }
  return out;
}

function priceStats(prices: number[]): PriceStats | null {
  if (!prices.length) return null;
  let sum = 0, min = Infinity, max = -Infinity;
  for (const p of prices) {
    sum += p;
    if (p < min) min = p;
    if (p > max) max = p;
  }
  return { min, max, avg: avg(sum, prices.length), median: med(prices) };
}

export function buildListingStats(listings: ListingSummary[]): ListingStats {
  const active = listings.filter(isActive);
  const prices = active.flatMap(l => (l.price === null ? [] : [l.price]));

  return {
    total: listings.length,
    active: active.length,
    featured: active.filter(l => l.featured === true).length,
    price: priceStats(prices),
    activeByCity: countBy(active, 'city'),
    activeByAgent: countBy(active, 'agent'),
    activeByType: countBy(active, 'type'),
  };
}
