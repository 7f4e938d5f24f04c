/**
 * ListingSync: Concurrent Paginator
 *
 * Assembles every listing of a category newer than a cutoff ("full window").
 *
 * 1. Fetch page 0; empty means nothing to do
 * 2. If page 0 already reaches past the cutoff, stop there
 * 3. Otherwise fetch a fixed number of further pages, a few at a time
 *
 * Pages complete in any order; the store re-sorts on ingestion.
 */

import type { Listing, PageSource } from '../types';
import { runTaskGroup } from '../lib/concurrency';
import { logger, errorMessage } from '../lib/logger';

export interface PaginatorOptions {
  /** Offset stride between pages */
  pageSize?: number;
  /** Extra pages scheduled after page 0 */
  estimatedPages?: number;
  /** Pages in flight at once */
  concurrency?: number;
}

export interface WindowFetchResult {
  listings: Listing[];
  /** Page requests issued, page 0 included */
  pagesRequested: number;
  /** Page 0 yielded nothing: the category is empty or the source is unreachable */
  firstPageEmpty: boolean;
}

export class ConcurrentPaginator {
  private readonly log = logger.child({ component: 'ConcurrentPaginator' });
  private readonly pageSize: number;
  private readonly estimatedPages: number;
  private readonly concurrency: number;

  constructor(
    private readonly source: PageSource,
    options: PaginatorOptions = {}
  ) {
    this.pageSize = options.pageSize ?? 50;
    this.estimatedPages = options.estimatedPages ?? 10;
    this.concurrency = options.concurrency ?? 3;
  }

  async fetchWindow(category: string, cutoff: Date): Promise<Listing[]> {
    const { listings } = await this.fetchWindowDetailed(category, cutoff);
    return listings;
  }

  async fetchWindowDetailed(category: string, cutoff: Date): Promise<WindowFetchResult> {
    const cutoffMs = cutoff.getTime();
    const firstPage = await this.source.fetch(category, 0);

    if (firstPage.length === 0) {
      this.log.info('No listings on first page', { category });
      return { listings: [], pagesRequested: 1, firstPageEmpty: true };
    }

    const inWindow = (listing: Listing) => listing.timestamp.getTime() >= cutoffMs;
    const listings = firstPage.filter(inWindow);

    const oldestMs = Math.min(...firstPage.map(l => l.timestamp.getTime()));
    if (oldestMs < cutoffMs) {
      this.log.debug('Window satisfied by first page', { category, listings: listings.length });
      return { listings, pagesRequested: 1, firstPageEmpty: false };
    }

    const offsets = Array.from({ length: this.estimatedPages }, (_, i) => (i + 1) * this.pageSize);

    const { results, failures } = await runTaskGroup(offsets, this.concurrency, offset =>
      this.source.fetch(category, offset)
    );

    for (const { value } of results) {
      listings.push(...value.filter(inWindow));
    }

    for (const failure of failures) {
      this.log.warn('Page task failed', {
        category,
        offset: failure.key,
        error: errorMessage(failure.error),
      });
    }

    this.log.info('Window fetched', {
      category,
      pages: offsets.length + 1,
      listings: listings.length,
      failedPages: failures.length,
    });

    return { listings, pagesRequested: offsets.length + 1, firstPageEmpty: false };
  }
}
