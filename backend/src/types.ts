// ═══════════════════════════════════════════════════════
// Listing Gateway — Core Type Definitions
// ═══════════════════════════════════════════════════════
import type { ListingSummary } from './schemas.ts';

export type { ListingSummary, ListingCreateInput, ListingUpdateInput } from './schemas.ts';

// ── Search ──

/** Caller-facing filter. Every field optional; absent means unconstrained. */
export interface SearchCriteria {
  readonly searchTerm?: string;
  readonly cityName?: string;
  readonly propertyTypeName?: string;
  readonly minPrice?: number;
  readonly maxPrice?: number;
  readonly minBeds?: number;
  readonly minBaths?: number;
  readonly minArea?: number;
  readonly maxArea?: number;
  readonly featured?: boolean;
}

/** Filterable dimensions of the predicate engine. */
export type Dimension =
  | 'city'
  | 'type'
  | 'minPrice'
  | 'maxPrice'
  | 'beds'
  | 'baths'
  | 'area'
  | 'featured'
  | 'text';

/** Query shape the remote service understands. */
export interface RemoteQuery {
  search?: string;
  cityId?: string;
  propertyTypeId?: string;
  maxPrice?: number;
}

/** Criteria with names resolved to ids; `null` id means the name did not resolve. */
export interface TranslatedCriteria {
  criteria: SearchCriteria;
  cityId: string | null;
  propertyTypeId: string | null;
  remote: RemoteQuery;
  /** Dimensions `remote` actually constrains. */
  applied: ReadonlySet<Dimension>;
}

/** How a read was resolved. */
export type SearchPath = 'remote' | 'fallback' | 'snapshot' | 'unavailable' | 'failed';

export interface SearchOutcome {
  listings: ListingSummary[];
  path: SearchPath;
}

// ── Remote results ──

export type RemoteError =
  | { kind: 'unreachable'; message: string }
  | { kind: 'status'; status: number; message: string }
  | { kind: 'other'; message: string };

export type RemoteResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RemoteError };

/** Reference field a derived view groups by. */
export type Relation = 'city' | 'agent' | 'type';

// ── Stats ──

export interface PriceStats {
  min: number;
  max: number;
  avg: number;
  median: number;
}

export interface ListingStats {
  total: number;
  active: number;
  featured: number;
  price: PriceStats | null;
  activeByCity: Record<string, number>;
  activeByAgent: Record<string, number>;
  activeByType: Record<string, number>;
}

// ── API response wrapper ──

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
  details?: string[];
}
