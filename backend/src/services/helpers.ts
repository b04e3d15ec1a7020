// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════
import type { ListingSummary, RemoteError, Relation } from '../types.ts';

export const ACTIVE_STATUS = 'ACTIVE';

/** A listing with no status is active. */
export function isActive(listing: ListingSummary): boolean {
  return listing.status === null || listing.status === ACTIVE_STATUS;
}

export function filterActive(listings: ListingSummary[]): ListingSummary[] {
  return listings.filter(isActive);
}

/** Reference id of a listing for the given relation. */
export function relationId(listing: ListingSummary, relation: Relation): string | null {
  if (relation === 'city') return listing.cityId;
  if (relation === 'agent') return listing.agentId;
  return listing.propertyTypeId;
}

/** Trimmed, lower-cased key for case-insensitive name lookups. */
export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** True for a string with at least one non-blank character. */
export function hasText(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Short label for logs and metric outcomes: "unreachable", "status_500", … */
export function remoteOutcome(error: RemoteError): string {
  return error.kind === 'status' ? `status_${error.status}` : error.kind;
}

/** Safe average (returns 0 for n ≤ 0) */
export const avg = (sum: number, n: number): number => n > 0 ? Math.round(sum / n) : 0;

/** Median of numeric array (returns 0 for empty) */
export function med(arr: number[]): number {
  if (!arr.length) return 0;
  const s = [...arr].sort((a, b) => a - b);
  const m = Math.floor(s.length / 2);
  const hi = s[m] ?? 0;
  return s.length % 2 ? hi : Math.round(((s[m - 1] ?? 0) + hi) / 2);
}
