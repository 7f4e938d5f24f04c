/**
 * ListingSync: Composition Root
 *
 * Builds the single store, fetchers and orchestrator for a process.
 */

import type { ListingParser, PageSource, RefreshOptions, RefreshResult } from './types';
import { loadConfig, type ListingSyncConfig } from './lib/config';
import { CacheStore } from './cache/store';
import { PageFetcher, type FetchFn } from './feeds/page-fetcher';
import { HtmlListingParser } from './feeds/html-parser';
import { ConcurrentPaginator } from './feeds/paginator';
import { IncrementalWalker } from './feeds/incremental';
import { RefreshOrchestrator } from './feeds/orchestrator';

export interface ListingSync {
  config: ListingSyncConfig;
  store: CacheStore;
  orchestrator: RefreshOrchestrator;
  refresh(options: RefreshOptions): Promise<RefreshResult>;
}

export interface CreateListingSyncOptions {
  config?: ListingSyncConfig;
  /** Replaces the HTTP page fetcher entirely */
  pageSource?: PageSource;
  parser?: ListingParser;
  fetchFn?: FetchFn;
  now?: () => Date;
}

/**
 * Wire everything together and load the persisted cache.
 */
export async function createListingSync(options: CreateListingSyncOptions = {}): Promise<ListingSync> {
  const config = options.config ?? loadConfig();
  const now = options.now ?? (() => new Date());

  const store = new CacheStore({
    filePath: config.cacheFile,
    defaultWindowDays: config.defaultWindowDays,
    now,
  });
  await store.load();

  const pageSource =
    options.pageSource ??
    new PageFetcher({
      baseUrl: config.baseUrl,
      parser: options.parser ?? new HtmlListingParser(config.baseUrl),
      cookie: config.cookie,
      timeoutMs: config.requestTimeoutMs,
      fetchFn: options.fetchFn,
      now,
    });

  const orchestrator = new RefreshOrchestrator(
    {
      store,
      paginator: new ConcurrentPaginator(pageSource, {
        pageSize: config.pageSize,
        estimatedPages: config.estimatedPages,
        concurrency: config.fetchConcurrency,
      }),
      walker: new IncrementalWalker(pageSource, {
        pageSize: config.pageSize,
        maxPages: config.incrementalMaxPages,
      }),
      now,
    },
    {
      defaultCategories: config.defaultCategories,
      cacheDurationMs: config.cacheDurationMs,
    }
  );

  return {
    config,
    store,
    orchestrator,
    refresh: refreshOptions => orchestrator.refresh(refreshOptions),
  };
}

export type { ListingSyncConfig } from './lib/config';
export { loadConfig } from './lib/config';
export * from './feeds';
export { CacheStore } from './cache/store';
export type * from './types';
