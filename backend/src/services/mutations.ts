// ═══════════════════════════════════════════════════════
// mutations.ts — Create/update/delete through the listing service
// A successful write evicts the bulk snapshots; a failed one leaves them.
// ═══════════════════════════════════════════════════════
import type { Logger } from 'pino';
import { childLogger } from '../shared/logger.ts';
import { ListingCreateSchema, ListingUpdateSchema } from '../schemas.ts';
import type { ListingClient } from './listing-client.ts';
import type { ListingAggregator } from './aggregator.ts';
import { hasText, remoteOutcome } from './helpers.ts';
import type { ListingCreateInput, ListingSummary, ListingUpdateInput, RemoteResult } from '../types.ts';

export class ListingMutations {
  private readonly log: Logger;

  constructor(
    private readonly client: ListingClient,
    private readonly aggregator: ListingAggregator,
    log?: Logger,
  ) {
    this.log = log ?? childLogger({ module: 'mutations' });
  }

  /** Payload is re-validated here; a ZodError is a caller bug, not a remote failure. */
  async create(payload: ListingCreateInput): Promise<RemoteResult<ListingSummary>> {
    const body = ListingCreateSchema.parse(payload);
    const res = await this.client.create(body);
    return this.settle('create', res, res.ok ? res.value.id : undefined);
  }

  async update(id: string, payload: ListingUpdateInput): Promise<RemoteResult<void>> {
    if (!hasText(id)) throw new TypeError('id is required');
    const body = ListingUpdateSchema.parse(payload);
    return this.settle('update', await this.client.update(id, body), id);
  }

  async delete(id: string): Promise<RemoteResult<void>> {
    if (!hasText(id)) throw new TypeError('id is required');
    return this.settle('delete', await this.client.delete(id), id);
  }

  private async settle<T>(operation: string, res: RemoteResult<T>, id: string | undefined): Promise<RemoteResult<T>> {
    if (!res.ok) {
      const fields = { operation, id, outcome: remoteOutcome(res.error), error: res.error.message };
      if (res.error.kind === 'status' && res.error.status < 500) this.log.warn(fields, 'Listing mutation rejected');
      else this.log.error(fields, 'Listing mutation failed');
      return res;
    }
    await this.aggregator.evictAll();
    this.log.info({ operation, id }, 'Listing mutated; snapshots evicted');
    return res;
  }
}
