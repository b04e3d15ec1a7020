// ═══════════════════════════════════════════════════════
// listing-client.ts — HTTP client for the remote listing service
// Every call resolves to a tagged RemoteResult; nothing throws for
// remote failures, so callers switch on the error kind.
// ═══════════════════════════════════════════════════════
import axios, { isAxiosError, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { Logger } from 'pino';
import { childLogger } from '../shared/logger.ts';
import { remoteCalls } from '../shared/metrics.ts';
import { RemoteListingSchema } from '../schemas.ts';
import { remoteOutcome } from './helpers.ts';
import type {
  ListingCreateInput, ListingSummary, ListingUpdateInput,
  RemoteError, RemoteQuery, RemoteResult,
} from '../types.ts';

const BASE_PATH = '/api/v1/properties';

/** Call surface of the remote listing service. */
export interface ListingClient {
  fetchAll(query?: RemoteQuery): Promise<RemoteResult<ListingSummary[]>>;
  search(query?: RemoteQuery): Promise<RemoteResult<ListingSummary[]>>;
  fetchByAgent(agentId: string): Promise<RemoteResult<ListingSummary[]>>;
  fetchByCity(cityId: string): Promise<RemoteResult<ListingSummary[]>>;
  fetchFeatured(): Promise<RemoteResult<ListingSummary[]>>;
  /** `null` when the service answers 404. */
  fetchById(id: string): Promise<RemoteResult<ListingSummary | null>>;
  create(payload: ListingCreateInput): Promise<RemoteResult<ListingSummary>>;
  update(id: string, payload: ListingUpdateInput): Promise<RemoteResult<void>>;
  delete(id: string): Promise<RemoteResult<void>>;
}

export const ok = <T>(value: T): RemoteResult<T> => ({ ok: true, value });
export const fail = <T>(error: RemoteError): RemoteResult<T> => ({ ok: false, error });

// Codes axios/node report when the service could not be reached at all
const CONNECTION_CODES = new Set([
  'ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH',
  'ENETUNREACH', 'ETIMEDOUT', 'ECONNABORTED', 'EPIPE', 'ERR_NETWORK',
]);

/** Map a thrown axios (or other) error onto the remote error taxonomy. */
export function classifyError(err: unknown): RemoteError {
  if (isAxiosError(err)) {
    if (err.response) {
      return { kind: 'status', status: err.response.status, message: `Listing service responded ${err.response.status}: ${err.message}` };
    }
    if ((err.code && CONNECTION_CODES.has(err.code)) || err.request) {
      return { kind: 'unreachable', message: err.code ? `${err.code}: ${err.message}` : err.message };
    }
    return { kind: 'other', message: err.message };
  }
  return { kind: 'other', message: err instanceof Error ? err.message : String(err) };
}

export interface HttpListingClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Pre-built axios instance (tests pass one with a stand-in adapter). */
  http?: AxiosInstance;
  log?: Logger;
}

export class HttpListingClient implements ListingClient {
  private readonly http: AxiosInstance;
  private readonly log: Logger;

  constructor(opts: HttpListingClientOptions) {
    this.http = opts.http ?? axios.create({
      baseURL: opts.baseUrl,
      timeout: opts.timeoutMs,
      headers: { Accept: 'application/json' },
    });
    this.log = opts.log ?? childLogger({ module: 'listing-client' });
  }

  fetchAll(query: RemoteQuery = {}): Promise<RemoteResult<ListingSummary[]>> {
    return this.list('fetchAll', { url: BASE_PATH, params: toParams(query) });
  }

  search(query: RemoteQuery = {}): Promise<RemoteResult<ListingSummary[]>> {
    return this.list('search', { url: `${BASE_PATH}/search`, params: toParams(query) });
  }

  fetchByAgent(agentId: string): Promise<RemoteResult<ListingSummary[]>> {
    return this.list('fetchByAgent', { url: `${BASE_PATH}/agent/${encodeURIComponent(agentId)}` });
  }

  fetchByCity(cityId: string): Promise<RemoteResult<ListingSummary[]>> {
    return this.list('fetchByCity', { url: `${BASE_PATH}/city/${encodeURIComponent(cityId)}` });
  }

  fetchFeatured(): Promise<RemoteResult<ListingSummary[]>> {
    return this.list('fetchFeatured', { url: `${BASE_PATH}/featured` });
  }

  fetchById(id: string): Promise<RemoteResult<ListingSummary | null>> {
    return this.tracked('fetchById', async () => {
      const res = await this.send('fetchById', { url: `${BASE_PATH}/${encodeURIComponent(id)}` });
      if (!res.ok) {
        if (res.error.kind === 'status' && res.error.status === 404) return ok(null);
        return res;
      }
      if (res.value === null || res.value === '') return ok(null);
      return this.parse('fetchById', res.value, RemoteListingSchema.safeParse(res.value));
    });
  }

  create(payload: ListingCreateInput): Promise<RemoteResult<ListingSummary>> {
    return this.tracked('create', async () => {
      const res = await this.send('create', { url: BASE_PATH, method: 'POST', data: payload });
      if (!res.ok) return res;
      return this.parse('create', res.value, RemoteListingSchema.safeParse(res.value));
    });
  }

  update(id: string, payload: ListingUpdateInput): Promise<RemoteResult<void>> {
    return this.tracked('update', async () => {
      const res = await this.send('update', { url: `${BASE_PATH}/${encodeURIComponent(id)}`, method: 'PUT', data: payload });
      return res.ok ? ok(undefined) : res;
    });
  }

  delete(id: string): Promise<RemoteResult<void>> {
    return this.tracked('delete', async () => {
      const res = await this.send('delete', { url: `${BASE_PATH}/${encodeURIComponent(id)}`, method: 'DELETE' });
      return res.ok ? ok(undefined) : res;
    });
  }

  // ── internals ──

  /** One metric sample per call, labelled with the final outcome. */
  private async tracked<T>(endpoint: string, call: () => Promise<RemoteResult<T>>): Promise<RemoteResult<T>> {
    const result = await call();
    remoteCalls.inc({ endpoint, outcome: result.ok ? 'ok' : remoteOutcome(result.error) });
    return result;
  }

  /** Rows that fail validation are dropped; only a non-array body fails the call. */
  private list(endpoint: string, config: AxiosRequestConfig): Promise<RemoteResult<ListingSummary[]>> {
    return this.tracked(endpoint, async () => {
      const res = await this.send(endpoint, config);
      if (!res.ok) return res;
      // A missing body is an empty list, as the service sends for no matches
      const body = res.value ?? [];
      if (!Array.isArray(body)) {
        this.log.debug({ endpoint, bodyType: typeof body }, 'Listing service payload rejected');
        return fail({ kind: 'other', message: `Unexpected ${endpoint} payload ((root): Expected array, received ${typeof body})` });
      }

      const rows: unknown[] = body;
      const listings: ListingSummary[] = [];
      const dropped: string[] = [];
      rows.forEach((row, index) => {
        const parsed = RemoteListingSchema.safeParse(row);
        if (parsed.success) listings.push(parsed.data);
        else dropped.push(rowLabel(row, index));
      });
      if (dropped.length) {
        this.log.warn({ endpoint, count: dropped.length, ids: dropped }, 'Dropping malformed listing rows');
      }
      return ok(listings);
    });
  }

  private async send(endpoint: string, config: AxiosRequestConfig): Promise<RemoteResult<unknown>> {
    this.log.debug({ endpoint, url: config.url, params: config.params }, 'Calling listing service');
    try {
      const res = await this.http.request<unknown>({ method: 'GET', ...config });
      return ok(res.data);
    } catch (err) {
      return fail(classifyError(err));
    }
  }

  private parse<T>(
    endpoint: string,
    body: unknown,
    result: { success: true; data: T } | { success: false; error: { issues: { path: (string | number)[]; message: string }[] } },
  ): RemoteResult<T> {
    if (result.success) return ok(result.data);
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown';
    this.log.debug({ endpoint, bodyType: Array.isArray(body) ? 'array' : typeof body }, 'Listing service payload rejected');
    return fail({ kind: 'other', message: `Unexpected ${endpoint} payload (${where})` });
  }
}

/** The row's id when it has one, else its position. */
function rowLabel(row: unknown, index: number): string {
  if (typeof row === 'object' && row !== null && 'id' in row && (typeof row.id === 'string' || typeof row.id === 'number')) {
    return String(row.id);
  }
  return `#${index}`;
}

function toParams(query: RemoteQuery): Record<string, string | number> {
  const params: Record<string, string | number> = {};
  if (query.search !== undefined) params.search = query.search;
  if (query.cityId !== undefined) params.cityId = query.cityId;
  if (query.propertyTypeId !== undefined) params.propertyTypeId = query.propertyTypeId;
  if (query.maxPrice !== undefined) params.maxPrice = query.maxPrice;
  return params;
}
