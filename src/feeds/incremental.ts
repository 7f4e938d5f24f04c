/**
 * ListingSync: Incremental Walker
 *
 * Walks a category's pages newest-first and collects listings newer than
 * the category's watermark. The feed is reverse-chronological, so the
 * first listing at or before the watermark ends the whole walk.
 */

import type { Listing, PageSource } from '../types';
import { logger } from '../lib/logger';

export interface IncrementalWalkerOptions {
  pageSize?: number;
  /** Upper bound on pages walked when no stale listing shows up */
  maxPages?: number;
}

export class IncrementalWalker {
  private readonly log = logger.child({ component: 'IncrementalWalker' });
  private readonly pageSize: number;
  private readonly maxPages: number;

  constructor(
    private readonly source: PageSource,
    options: IncrementalWalkerOptions = {}
  ) {
    this.pageSize = options.pageSize ?? 50;
    this.maxPages = options.maxPages ?? 5;
  }

  /**
   * Listings strictly newer than `watermark`, in discovery order.
   * Without a watermark only the first page is fetched and all of it is new.
   */
  async fetchSince(category: string, watermark?: Date): Promise<Listing[]> {
    if (!watermark) {
      const firstPage = await this.source.fetch(category, 0);
      this.log.info('No watermark, took first page', { category, listings: firstPage.length });
      return firstPage;
    }

    const watermarkMs = watermark.getTime();
    const found: Listing[] = [];

    for (let page = 0; page < this.maxPages; page++) {
      const listings = await this.source.fetch(category, page * this.pageSize);
      if (listings.length === 0) break;

      for (const listing of listings) {
        if (listing.timestamp.getTime() <= watermarkMs) {
          this.log.info('Reached watermark', {
            category,
            pages: page + 1,
            newListings: found.length,
          });
          return found;
        }
        found.push(listing);
      }
    }

    this.log.info('Walk ended without reaching watermark', {
      category,
      newListings: found.length,
      maxPages: this.maxPages,
    });

    return found;
  }
}
