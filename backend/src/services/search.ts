/**
 * search.ts — Criteria search with a snapshot fallback
 *
 *   remote search ok            → residual filter          (path: remote)
 *   unreachable                 → []                       (path: unavailable)
 *   known-defect status         → snapshot + full filter   (path: fallback)
 *   anything else               → []                       (path: failed)
 *   no criteria at all          → snapshot                 (path: snapshot)
 *
 * At most two remote calls per search; searches are never cached.
 */
import type { Logger } from 'pino';
import { childLogger } from '../shared/logger.ts';
import { searchPaths } from '../shared/metrics.ts';
import { isUnconstrained, translateCriteria } from './criteria.ts';
import { FULL_MODE, filterListings } from './filter.ts';
import { isKnownDefect, type ListingAggregator } from './aggregator.ts';
import type { ListingClient } from './listing-client.ts';
import type { NameIndex } from './reference.ts';
import { hasText, remoteOutcome } from './helpers.ts';
import type { ListingSummary, SearchCriteria, SearchOutcome, SearchPath } from '../types.ts';

export interface SearchOrchestratorOptions {
  knownDefectStatus: number;
  log?: Logger;
}

export class SearchOrchestrator {
  private readonly knownDefectStatus: number;
  private readonly log: Logger;

  constructor(
    private readonly client: ListingClient,
    private readonly aggregator: ListingAggregator,
    private readonly names: NameIndex,
    opts: SearchOrchestratorOptions,
  ) {
    this.knownDefectStatus = opts.knownDefectStatus;
    this.log = opts.log ?? childLogger({ module: 'search' });
  }

  async search(criteria: SearchCriteria): Promise<ListingSummary[]> {
    return (await this.searchDetailed(criteria)).listings;
  }

  /** Listings whose title or description contains `term`. */
  searchByText(term: string): Promise<SearchOutcome> {
    const criteria: SearchCriteria = hasText(term) ? { searchTerm: term.trim() } : {};
    return this.resolve(Object.freeze(criteria), 'text');
  }

  searchDetailed(criteria: SearchCriteria): Promise<SearchOutcome> {
    return this.resolve(criteria, 'criteria');
  }

  private async resolve(criteria: SearchCriteria, entry: string): Promise<SearchOutcome> {
    if (isUnconstrained(criteria)) {
      return this.done(entry, 'snapshot', await this.aggregator.getAll());
    }

    const translated = await translateCriteria(criteria, this.names);
    const res = await this.client.search(translated.remote);

    if (res.ok) {
      return this.done(entry, 'remote', filterListings(res.value, translated, translated.applied));
    }

    const { error } = res;
    const fields = { remote: translated.remote, outcome: remoteOutcome(error), error: error.message };

    if (error.kind === 'unreachable') {
      this.log.warn(fields, 'Listing service unreachable; returning no results');
      return this.done(entry, 'unavailable', []);
    }

    if (isKnownDefect(error, this.knownDefectStatus)) {
      this.log.warn(fields, 'Remote search hit known defect; filtering snapshot locally');
      const all = await this.aggregator.getAll();
      return this.done(entry, 'fallback', filterListings(all, translated, FULL_MODE));
    }

    this.log.error(fields, 'Remote search failed');
    return this.done(entry, 'failed', []);
  }

  private done(entry: string, path: SearchPath, listings: ListingSummary[]): SearchOutcome {
    searchPaths.inc({ entry, path });
    this.log.debug({ entry, path, count: listings.length }, 'Search resolved');
    return { listings, path };
  }
}
