// ═══════════════════════════════════════════════════════
// Zod Schemas — listing shapes, remote payloads and API input
// ═══════════════════════════════════════════════════════
import { z } from 'zod';

// ── Shared ──

/** Identifiers of listings, cities, types and agents (UUIDs upstream). */
export const IdSchema = z.string().regex(/^[a-zA-Z0-9-]{1,64}$/, 'Invalid id');

export const IdParamSchema = z.object({ id: IdSchema });

const nullableString = z.string().nullish().transform(v => v ?? null);
const nullableInt = z.number().int().nullish().transform(v => v ?? null);

/** Decimals may arrive as JSON numbers or as numeric strings. */
const decimal = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v): number | null => {
    if (v === null || v === undefined) return null;
    if (typeof v === 'number') return Number.isFinite(v) ? v : null;
    const trimmed = v.trim();
    if (!trimmed) return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  });

// ── Listing (normalized shape, also what the cache stores) ──

export const ListingSummarySchema = z.object({
  id: IdSchema,
  title: z.string(),
  description: z.string().nullable(),
  price: z.number().nullable(),
  cityId: z.string().nullable(),
  propertyTypeId: z.string().nullable(),
  agentId: z.string().nullable(),
  bedrooms: z.number().int().nullable(),
  bathrooms: z.number().int().nullable(),
  area: z.number().nullable(),
  featured: z.boolean().nullable(),
  status: z.string().nullable(),
  address: z.string().nullable().optional(),
  imageUrls: z.array(z.string()).optional(),
  features: z.array(z.string()).optional(),
  createdAt: z.string().nullable().optional(),
  updatedAt: z.string().nullable().optional(),
});

export type ListingSummary = z.infer<typeof ListingSummarySchema>;

export const ListingListSchema = z.array(ListingSummarySchema);
export const NameListSchema = z.array(z.string());

// ── Listing as the remote service sends it ──

export const RemoteListingSchema = z
  .object({
    id: IdSchema,
    title: nullableString,
    description: nullableString,
    price: decimal,
    cityId: nullableString,
    propertyTypeId: nullableString,
    agentId: nullableString,
    bedrooms: nullableInt,
    bathrooms: nullableInt,
    squareFeet: decimal,
    isFeatured: z.boolean().nullish(),
    featured: z.boolean().nullish(),
    status: nullableString,
    address: nullableString,
    imageUrls: z.array(z.string()).nullish(),
    features: z.array(z.string()).nullish(),
    createdAt: nullableString,
    updatedAt: nullableString,
  })
  .transform((r): ListingSummary => ({
    id: r.id,
    title: r.title ?? '',
    description: r.description,
    price: r.price,
    cityId: r.cityId,
    propertyTypeId: r.propertyTypeId,
    agentId: r.agentId,
    bedrooms: r.bedrooms,
    bathrooms: r.bathrooms,
    area: r.squareFeet,
    featured: r.isFeatured ?? r.featured ?? null,
    status: r.status,
    address: r.address,
    imageUrls: r.imageUrls ?? [],
    features: r.features ?? [],
    createdAt: r.createdAt,
    updatedAt: r.updatedAt,
  }));


// ── Mutation payloads (forwarded to the listing service) ──

export const ListingCreateSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(255),
  description: z.string().max(2000).optional(),
  price: z.coerce.number().positive('Price must be greater than 0'),
  agentId: IdSchema,
  cityId: IdSchema,
  propertyTypeId: IdSchema,
  status: z.string().max(20).default('DRAFT'),
  bedrooms: z.coerce.number().int().min(0).optional(),
  bathrooms: z.coerce.number().int().min(0).optional(),
  squareFeet: z.coerce.number().int().min(0).optional(),
  address: z.string().max(500).optional(),
  features: z.array(z.string().max(100)).max(50).optional(),
  imageUrls: z.array(z.string().url()).max(30).optional(),
});

export type ListingCreateInput = z.infer<typeof ListingCreateSchema>;

export const ListingUpdateSchema = ListingCreateSchema.partial();

export type ListingUpdateInput = z.infer<typeof ListingUpdateSchema>;

// ── GET /api/listings ──

const queryValue = z.string().max(200).optional();

/** Raw strings only: numeric parsing happens in parseSearchCriteria so a bad value drops one filter, not the request. */
export const ListingSearchQuerySchema = z.object({
  search: queryValue,
  city: queryValue,
  type: queryValue,
  minPrice: queryValue,
  maxPrice: queryValue,
  minBeds: queryValue,
  minBaths: queryValue,
  minArea: queryValue,
  maxArea: queryValue,
  featured: queryValue,
});

export type ListingSearchQuery = z.infer<typeof ListingSearchQuerySchema>;

// ── POST /api/cache/evict ──

export const AdminAuthSchema = z.object({
  key: z.string().min(1).optional(),
});

// ── Reference data file ──

const ReferenceEntrySchema = z.object({ id: IdSchema, name: z.string().min(1) });

export const ReferenceDataSchema = z.object({
  cities: z.array(ReferenceEntrySchema).default([]),
  propertyTypes: z.array(ReferenceEntrySchema).default([]),
});

export type ReferenceData = z.infer<typeof ReferenceDataSchema>;
