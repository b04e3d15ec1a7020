import { Router, type Request, type Response, type NextFunction, type RequestHandler } from 'express';
import { z } from 'zod';
import type { ListingServices } from '../services/index.ts';
import { parseSearchCriteria } from '../services/criteria.ts';
import { buildListingStats } from '../services/stats.ts';
import { requestContext } from '../shared/logger.ts';
import {
  AdminAuthSchema, IdParamSchema, ListingCreateSchema,
  ListingSearchQuerySchema, ListingUpdateSchema,
} from '../schemas.ts';
import type { ApiResponse, Relation, RemoteError, SearchCriteria } from '../types.ts';

// ── Zod validation wrapper ──

type Source = 'query' | 'params' | 'body' | ((req: Request) => unknown);

/**
 * Parse the request part with `schema`; 400 on failure, otherwise hand the
 * parsed value to `handler`. Thrown errors go to the error handler.
 */
function validate<T extends z.ZodTypeAny>(
  schema: T,
  source: Source,
  handler: (data: z.output<T>, req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const input = typeof source === 'function' ? source(req) : req[source];
    const result = schema.safeParse(input);
    if (!result.success) {
      const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      const body: ApiResponse = { success: false, error: 'Validation failed', details };
      res.status(400).json(body);
      return;
    }
    try {
      await handler(result.data, req, res);
    } catch (err) { next(err); }
  };
}

function wrap(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return async (req, res, next) => {
    try {
      await handler(req, res);
    } catch (err) { next(err); }
  };
}

/** Remote failures: a 404 stays 404, everything else is a bad gateway. */
function sendRemoteFailure(res: Response, error: RemoteError): void {
  if (error.kind === 'status' && error.status === 404) {
    res.status(404).json({ success: false, error: 'Listing not found' });
    return;
  }
  res.status(502).json({ success: false, error: 'Listing service error', message: error.message });
}

function isTextOnly(criteria: SearchCriteria): criteria is SearchCriteria & { searchTerm: string } {
  return criteria.searchTerm !== undefined && Object.keys(criteria).length === 1;
}

const AgentListingsSchema = IdParamSchema.extend({
  active: z.enum(['true', 'false']).optional(),
});

const UpdateRequestSchema = IdParamSchema.extend({ payload: ListingUpdateSchema });

const SUMMARY_ROUTES: [string, Relation][] = [['cities', 'city'], ['agents', 'agent'], ['types', 'type']];

export interface ListingRouterOptions {
  adminKey?: string;
}

export function createListingRouter(services: ListingServices, opts: ListingRouterOptions = {}): Router {
  const { aggregator, search, mutations, reference } = services;
  const router = Router();

  /**
   * GET /api/listings — Criteria search
   * Query: search, city, type, minPrice, maxPrice, minBeds, minBaths, minArea, maxArea, featured
   */
  router.get('/listings', validate(ListingSearchQuerySchema, 'query', async (query, _req, res) => {
    const { log } = requestContext(res);
    const criteria = parseSearchCriteria(query, log);
    const { listings, path } = isTextOnly(criteria)
      ? await search.searchByText(criteria.searchTerm)
      : await search.searchDetailed(criteria);
    res.setHeader('X-Search-Path', path);
    res.json({ success: true, data: listings, meta: { count: listings.length, path } });
  }));

  router.get('/listings/featured', wrap(async (_req, res) => {
    res.json({ success: true, data: await aggregator.getFeatured() });
  }));

  router.get('/listings/stats', wrap(async (_req, res) => {
    res.json({ success: true, data: buildListingStats(await aggregator.getAll()) });
  }));

  router.get('/listings/:id', validate(IdParamSchema, 'params', async ({ id }, _req, res) => {
    const result = await aggregator.lookupById(id);
    if (!result.ok) return sendRemoteFailure(res, result.error);
    const listing = result.value;
    if (!listing) {
      res.status(404).json({ success: false, error: 'Listing not found' });
      return;
    }
    res.json({ success: true, data: listing });
  }));

  // ── Mutations ──

  router.post('/listings', validate(ListingCreateSchema, 'body', async (payload, _req, res) => {
    const result = await mutations.create(payload);
    if (!result.ok) return sendRemoteFailure(res, result.error);
    res.status(201).json({ success: true, data: result.value });
  }));

  router.put('/listings/:id', validate(UpdateRequestSchema, req => ({ ...req.params, payload: req.body }), async ({ id, payload }, _req, res) => {
    const result = await mutations.update(id, payload);
    if (!result.ok) return sendRemoteFailure(res, result.error);
    res.json({ success: true, message: 'Listing updated' });
  }));

  router.delete('/listings/:id', validate(IdParamSchema, 'params', async ({ id }, _req, res) => {
    const result = await mutations.delete(id);
    if (!result.ok) return sendRemoteFailure(res, result.error);
    res.status(204).end();
  }));

  // ── Derived views ──

  router.get('/cities/:id/listings', validate(IdParamSchema, 'params', async ({ id }, _req, res) => {
    res.json({ success: true, data: await aggregator.getByCity(id) });
  }));

  router.get('/types/:id/listings', validate(IdParamSchema, 'params', async ({ id }, _req, res) => {
    res.json({ success: true, data: await aggregator.getByType(id) });
  }));

  /**
   * GET /api/agents/:id/listings — Every listing of the agent (any status)
   * ?active=true restricts to active listings from the snapshot.
   */
  router.get('/agents/:id/listings', validate(AgentListingsSchema, req => ({ ...req.params, ...req.query }), async ({ id, active }, _req, res) => {
    const data = active === 'true' ? await aggregator.getByAgent(id) : await aggregator.getByAgentDirect(id);
    res.json({ success: true, data });
  }));

  for (const [collection, relation] of SUMMARY_ROUTES) {
    router.get(`/${collection}/:id/summary`, validate(IdParamSchema, 'params', async ({ id }, _req, res) => {
      const activeCount = await aggregator.countActive(id, relation);
      res.json({ success: true, data: { id, relation, activeCount, hasActive: activeCount > 0 } });
    }));
  }

  /**
   * GET /api/filters — City and property type names for filter dropdowns
   */
  router.get('/filters', wrap(async (_req, res) => {
    const [cities, propertyTypes] = await Promise.all([reference.cityNames(), reference.propertyTypeNames()]);
    res.json({ success: true, data: { cities, propertyTypes } });
  }));

  /**
   * POST /api/cache/evict — Drop cached snapshots and name lists (admin)
   * Key via ?key= or `Authorization: Bearer <key>`.
   */
  router.post('/cache/evict', validate(AdminAuthSchema, 'query', async ({ key }, req, res) => {
    if (!opts.adminKey) {
      res.status(403).json({ success: false, error: 'ADMIN_KEY not configured', code: 'NO_ADMIN_KEY' });
      return;
    }
    const provided = key ?? req.headers.authorization?.replace('Bearer ', '');
    if (provided !== opts.adminKey) {
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }
    await aggregator.evictAll();
    await reference.evictNames();
    requestContext(res).log.info('Caches evicted by admin');
    res.json({ success: true, message: 'Caches evicted' });
  }));

  return router;
}
