/**
 * reference.ts — City and property-type name index
 *
 * The surrounding application owns these tables; this layer only needs
 * name → id lookups (case-insensitive) and the sorted name lists used to
 * populate filter dropdowns.
 */
import { readFile } from 'fs/promises';
import type { Logger } from 'pino';
import { ReferenceDataSchema, type ReferenceData } from '../schemas.ts';
import { childLogger } from '../shared/logger.ts';
import { CACHE_KEYS, type Cache } from './cache-service.ts';
import { normalizeName } from './helpers.ts';

/** Lookup capability the criteria translator consumes. */
export interface NameIndex {
  cityIdByName(name: string): Promise<string | null>;
  propertyTypeIdByName(name: string): Promise<string | null>;
}

/** Where reference rows come from. */
export interface ReferenceSource {
  load(): Promise<ReferenceData>;
}

/** Reads `{ cities: [...], propertyTypes: [...] }` from a JSON file. */
export class JsonFileReferenceSource implements ReferenceSource {
  constructor(private readonly path: string) {}

  async load(): Promise<ReferenceData> {
    const raw = await readFile(this.path, 'utf8');
    return ReferenceDataSchema.parse(JSON.parse(raw));
  }
}

export class StaticReferenceSource implements ReferenceSource {
  constructor(private readonly data: ReferenceData) {}

  async load(): Promise<ReferenceData> {
    return this.data;
  }
}

interface Indexes {
  cities: Map<string, string>;
  propertyTypes: Map<string, string>;
}

export class ReferenceDirectory implements NameIndex {
  private indexes: Promise<Indexes> | null = null;
  private readonly log: Logger;

  constructor(
    private readonly source: ReferenceSource,
    private readonly names: Cache<string[]>,
    log?: Logger,
  ) {
    this.log = log ?? childLogger({ module: 'reference' });
  }

  async cityIdByName(name: string): Promise<string | null> {
    const { cities } = await this.load();
    return cities.get(normalizeName(name)) ?? null;
  }

  async propertyTypeIdByName(name: string): Promise<string | null> {
    const { propertyTypes } = await this.load();
    return propertyTypes.get(normalizeName(name)) ?? null;
  }

  /** Sorted city names, cached under `city-names`. */
  async cityNames(): Promise<string[]> {
    const cached = await this.names.get(CACHE_KEYS.cityNames);
    if (cached) return cached;
    const data = await this.loadSource();
    const sorted = sortNames(data.cities.map(c => c.name));
    if (sorted.length) await this.names.put(CACHE_KEYS.cityNames, sorted);
    return sorted;
  }

  /** Sorted property type names, cached under `property-type-names`. */
  async propertyTypeNames(): Promise<string[]> {
    const cached = await this.names.get(CACHE_KEYS.propertyTypeNames);
    if (cached) return cached;
    const data = await this.loadSource();
    const sorted = sortNames(data.propertyTypes.map(t => t.name));
    if (sorted.length) await this.names.put(CACHE_KEYS.propertyTypeNames, sorted);
    return sorted;
  }

  /** Drop cached names and lookup tables (after the reference tables change). */
  async evictNames(): Promise<void> {
    this.indexes = null;
    await this.names.evict(CACHE_KEYS.cityNames);
    await this.names.evict(CACHE_KEYS.propertyTypeNames);
  }

  private load(): Promise<Indexes> {
    if (!this.indexes) {
      this.indexes = this.loadSource().then(data => ({
        cities: indexByName(data.cities),
        propertyTypes: indexByName(data.propertyTypes),
      }));
    }
    return this.indexes;
  }

  private async loadSource(): Promise<ReferenceData> {
    try {
      return await this.source.load();
    } catch (err) {
      // Without reference rows every name is unresolved; searches still run
      this.log.error({ err }, 'Failed to load reference data');
      this.indexes = null;
      return { cities: [], propertyTypes: [] };
    }
  }
}

function indexByName(rows: { id: string; name: string }[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const row of rows) {
    const key = normalizeName(row.name);
    if (!index.has(key)) index.set(key, row.id);
  }
  return index;
}

function sortNames(names: string[]): string[] {
  return [...new Set(names)].sort((a, b) => a.localeCompare(b));
}
