/**
 * ListingSync: Refresh Orchestrator
 *
 * Decides what a refresh request does:
 * - cache-only:  return the store as is, no network
 * - incremental: walk each category down to its watermark, add what is new
 * - full:        skip if the cache is fresh (unless forced), else refetch
 *                each category's day window and replace it
 *
 * Categories are processed one after another and only one incremental or
 * full cycle runs at a time. A cycle never throws; on failure the last
 * known cache is returned.
 */

import type { RefreshMode, RefreshOptions, RefreshResult } from '../types';
import type { CacheStore } from '../cache/store';
import type { ConcurrentPaginator, WindowFetchResult } from './paginator';
import type { IncrementalWalker } from './incremental';
import { partitionCategories } from './categories';
import { daysAgo } from '../lib/relative-time';
import { Semaphore } from '../lib/concurrency';
import { logger, errorMessage, timeOperation } from '../lib/logger';

export interface OrchestratorConfig {
  defaultCategories: string[];
  /** Max age of a cache that a non-forced full refresh will serve */
  cacheDurationMs: number;
}

export interface OrchestratorDeps {
  store: CacheStore;
  paginator: ConcurrentPaginator;
  walker: IncrementalWalker;
  now?: () => Date;
}

export class RefreshOrchestrator {
  private readonly log = logger.child({ component: 'RefreshOrchestrator' });
  private readonly store: CacheStore;
  private readonly paginator: ConcurrentPaginator;
  private readonly walker: IncrementalWalker;
  private readonly now: () => Date;
  private readonly cycleLock = new Semaphore(1);

  constructor(deps: OrchestratorDeps, private readonly config: OrchestratorConfig) {
    this.store = deps.store;
    this.paginator = deps.paginator;
    this.walker = deps.walker;
    this.now = deps.now ?? (() => new Date());
  }

  async refresh(options: RefreshOptions): Promise<RefreshResult> {
    if (options.mode === 'cache-only') {
      this.log.info('Serving cache (cache-only mode)');
      return this.result('cache-only');
    }

    if (this.cycleLock.activeCount > 0) {
      this.log.debug('Waiting for running refresh cycle', { mode: options.mode });
    }

    return this.cycleLock.run(() => this.runCycle(options));
  }

  private async runCycle(options: RefreshOptions): Promise<RefreshResult> {
    const categories = this.resolveCategories(options.categories);

    if (options.mode === 'incremental') {
      return this.guard('incremental', () => this.incremental(categories));
    }

    // Checked after taking the cycle slot: a cycle that just finished counts
    if (!options.force && this.store.isFresh(this.config.cacheDurationMs)) {
      this.log.info('Cache is fresh, skipping full refresh');
      return this.result('cache-only');
    }
    const days = options.days ?? this.store.defaultWindowDays;
    return this.guard('full', () => this.full(categories, days));
  }

  // ============================================================
  // MODES
  // ============================================================

  private async incremental(categories: string[]): Promise<RefreshResult> {
    let added = 0;

    for (const category of categories) {
      const watermark = this.store.watermark(category);
      const found = await timeOperation(
        `Incremental walk ${category}`,
        () => this.walker.fetchSince(category, watermark),
        this.log
      );

      if (found.length === 0) continue;
      added += await this.store.ingestIncremental(category, found);
    }

    this.log.info('Incremental refresh completed', { categories, added });
    return this.result('incremental', added);
  }

  private async full(categories: string[], days: number): Promise<RefreshResult> {
    const cutoff = daysAgo(days, this.now());
    const windows = new Map<string, WindowFetchResult>();

    for (const category of categories) {
      const window = await timeOperation(
        `Window fetch ${category}`,
        () => this.paginator.fetchWindowDetailed(category, cutoff),
        this.log
      );
      windows.set(category, window);
    }

    // An empty page 0 is how a failed fetch looks; only those keep old data
    const answered = [...windows.entries()].filter(([, window]) => !window.firstPageEmpty);
    if (answered.length === 0) {
      this.log.warn('No listings fetched for any category, serving last known cache', {
        categories,
      });
      return this.result('full');
    }

    let total = 0;
    for (const [category, window] of answered) {
      const { count } = await this.store.ingestFull(category, window.listings, days);
      total += count;
    }

    for (const [category, window] of windows) {
      if (window.firstPageEmpty) {
        this.log.warn('Category returned nothing, keeping cached listings', { category });
      }
    }

    this.log.info('Full refresh completed', { categories, days, total });
    return this.result('full', total);
  }

  // ============================================================
  // HELPERS
  // ============================================================

  private resolveCategories(requested?: string[]): string[] {
    const names = requested && requested.length > 0 ? requested : this.config.defaultCategories;
    const { known, unknown } = partitionCategories(names);

    if (unknown.length > 0) {
      this.log.warn('Skipping unknown categories', { unknown });
    }

    return known;
  }

  private async guard(mode: RefreshMode, run: () => Promise<RefreshResult>): Promise<RefreshResult> {
    try {
      return await run();
    } catch (error) {
      this.log.error('Refresh failed, serving last known cache', {
        mode,
        error: errorMessage(error),
      });
      return this.result(mode);
    }
  }

  private result(modeUsed: RefreshMode, fetchedNew = 0): RefreshResult {
    return {
      listings: [...this.store.listings],
      metadata: this.store.metadataSnapshot(fetchedNew),
      modeUsed,
    };
  }
}
