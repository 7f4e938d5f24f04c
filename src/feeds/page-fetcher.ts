/**
 * ListingSync: Page Fetcher
 *
 * Fetches one browse page of one category and hands the body to the parser.
 * Failures of any kind are logged and yield an empty page: no retry, no throw.
 */

import type { Listing, ListingParser, PageSource } from '../types';
import { getCategoryId } from './categories';
import { logger, errorMessage } from '../lib/logger';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface PageFetcherOptions {
  baseUrl: string;
  parser: ListingParser;
  /** Raw cookie header, e.g. "uid=...; pass=..." */
  cookie?: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
  now?: () => Date;
}

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

export class PageFetcher implements PageSource {
  private readonly log = logger.child({ component: 'PageFetcher' });
  private readonly baseUrl: string;
  private readonly parser: ListingParser;
  private readonly cookie?: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => Date;

  constructor(options: PageFetcherOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.parser = options.parser;
    this.cookie = options.cookie;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Browse URL for a category page. Offset 0 has no offset parameter.
   */
  buildPageUrl(category: string, offset: number): string {
    const categoryId = getCategoryId(category);
    return offset > 0
      ? `${this.baseUrl}/t?${categoryId};o=${offset}`
      : `${this.baseUrl}/t?${categoryId}`;
  }

  async fetch(category: string, offset: number): Promise<Listing[]> {
    const startTime = Date.now();
    let url: string | undefined;

    try {
      url = this.buildPageUrl(category, offset);
      const html = await this.request(url);
      const listings = this.parser.parse(html, category, this.now());

      this.log.debug('Page fetched', {
        category,
        offset,
        listings: listings.length,
        durationMs: Date.now() - startTime,
      });

      return listings;
    } catch (error) {
      this.log.error('Page fetch failed', {
        category,
        offset,
        url,
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      });
      return [];
    }
  }

  private async request(url: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
    if (this.cookie) {
      headers['Cookie'] = this.cookie;
    }

    try {
      const res = await this.fetchFn(url, { headers, signal: controller.signal });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}`);
      }
      return await res.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Timeout after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
