/**
 * ListingSync: Cache Store
 *
 * Owns the in-memory listing set and its persisted copy. All mutation and
 * persistence runs through a single-slot semaphore, so at most one ingest
 * or write is in progress at a time.
 *
 * Invariants after every mutation:
 * - no two listings share an id
 * - listings are sorted by timestamp, newest first
 * - category metadata equals rebuildCategoryMetadata(listings)
 */

import type { CacheSnapshot, CacheState, CategoryMetadata, Listing } from '../types';
import { dedupeListings, mergeUnique } from '../feeds/dedup';
import { rebuildCategoryMetadata, sortByTimestampDesc } from './metadata';
import { emptyCacheState, loadCacheFile, writeCacheFile, type LoadResult } from './persistence';
import { Semaphore } from '../lib/concurrency';
import { formatCacheAge } from '../lib/relative-time';
import { logger, errorMessage } from '../lib/logger';

export interface CacheStoreOptions {
  /** Path of cache.json */
  filePath: string;
  defaultWindowDays?: number;
  now?: () => Date;
}

export interface FullIngestResult {
  /** Listings held for the category after the ingest */
  count: number;
  duplicatesDropped: number;
}

export class CacheStore {
  private readonly log = logger.child({ component: 'CacheStore' });
  private readonly filePath: string;
  private readonly now: () => Date;
  private readonly writeLock = new Semaphore(1);
  private state: CacheState;
  // A corrupt canonical file must not replace a good backup
  private backupSafe = true;

  constructor(options: CacheStoreOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? (() => new Date());
    this.state = emptyCacheState(options.defaultWindowDays ?? 30);
  }

  // ============================================================
  // READS
  // ============================================================

  get listings(): readonly Listing[] {
    return this.state.listings;
  }

  get createdAt(): Date | null {
    return this.state.metadata.createdAt;
  }

  get updatedAt(): Date | null {
    return this.state.metadata.updatedAt;
  }

  get defaultWindowDays(): number {
    return this.state.metadata.defaultWindowDays;
  }

  categoryMetadata(category: string): CategoryMetadata | undefined {
    return this.state.metadata.categories[category];
  }

  categoryNames(): string[] {
    return Object.keys(this.state.metadata.categories);
  }

  /**
   * Newest known timestamp for a category, if it has any listings.
   */
  watermark(category: string): Date | undefined {
    return this.state.metadata.categories[category]?.newestTimestamp;
  }

  isFresh(maxAgeMs: number): boolean {
    const updatedAt = this.state.metadata.updatedAt;
    if (!updatedAt) return false;
    return this.now().getTime() - updatedAt.getTime() < maxAgeMs;
  }

  metadataSnapshot(fetchedNew = 0): CacheSnapshot {
    const categories: CacheSnapshot['categories'] = {};
    for (const [name, meta] of Object.entries(this.state.metadata.categories)) {
      categories[name] = { count: meta.count };
    }

    return {
      cacheAge: formatCacheAge(this.state.metadata.updatedAt, this.now()),
      categories,
      fetchedNew,
      totalListings: this.state.listings.length,
    };
  }

  // ============================================================
  // LOAD
  // ============================================================

  /**
   * Replace in-memory state with the persisted cache. Never throws.
   * A migrated legacy file is written back in the current format.
   */
  async load(): Promise<LoadResult['source']> {
    return this.writeLock.run(async () => {
      const result = await loadCacheFile(this.filePath, this.state.metadata.defaultWindowDays);
      this.state = result.state;
      this.backupSafe = result.source !== 'backup';

      this.log.info('Cache loaded', {
        source: result.source,
        listings: result.state.listings.length,
        migrated: result.migrated,
      });

      if (result.migrated) {
        await this.persist();
      }

      return result.source;
    });
  }

  // ============================================================
  // INGEST
  // ============================================================

  /**
   * Replace everything held for `category` with `listings`.
   */
  async ingestFull(category: string, listings: readonly Listing[], windowDays: number): Promise<FullIngestResult> {
    return this.writeLock.run(async () => {
      const batch = dedupeListings(listings.filter(l => l.category === category));
      const others = this.state.listings.filter(l => l.category !== category);
      // An id already held under another category stays where it is
      const merged = mergeUnique(others, batch.listings);
      const crossCategory = batch.listings.length - (merged.length - others.length);

      const now = this.now();
      this.commit(
        merged,
        {
          createdAt: this.state.metadata.createdAt ?? now,
          updatedAt: now,
          defaultWindowDays: windowDays,
        }
      );

      const duplicatesDropped = batch.duplicateCount + crossCategory;
      if (duplicatesDropped > 0) {
        this.log.info('Dropped duplicate listings before caching', { category, duplicatesDropped });
      }

      await this.persist();

      return { count: this.state.metadata.categories[category]?.count ?? 0, duplicatesDropped };
    });
  }

  /**
   * Add listings not already in the store. Returns how many were added.
   */
  async ingestIncremental(category: string, newListings: readonly Listing[]): Promise<number> {
    return this.writeLock.run(async () => {
      const before = this.state.listings.length;
      const merged = mergeUnique(this.state.listings, newListings);
      const added = merged.length - before;
      const now = this.now();

      this.commit(merged, {
        createdAt: this.state.metadata.createdAt ?? now,
        updatedAt: now,
        defaultWindowDays: this.state.metadata.defaultWindowDays,
      });

      this.log.info('Incremental ingest', {
        category,
        received: newListings.length,
        added,
      });

      await this.persist();
      return added;
    });
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private commit(
    listings: Listing[],
    metadata: Omit<CacheState['metadata'], 'categories'>
  ): void {
    const sorted = sortByTimestampDesc(listings);
    this.state = {
      metadata: { ...metadata, categories: rebuildCategoryMetadata(sorted) },
      listings: sorted,
    };
  }

  /**
   * Write the current state. Failures are logged; memory stays authoritative.
   * Callers must hold writeLock.
   */
  private async persist(): Promise<boolean> {
    try {
      await writeCacheFile(this.filePath, this.state, { keepBackup: this.backupSafe });
      this.backupSafe = true;
      this.log.debug('Cache saved', { listings: this.state.listings.length });
      return true;
    } catch (error) {
      this.log.error('Cache save failed, keeping in-memory state', {
        path: this.filePath,
        error: errorMessage(error),
      });
      return false;
    }
  }

  /**
   * Wait for any in-flight ingest or write to finish.
   */
  async flush(): Promise<void> {
    await this.writeLock.run(async () => undefined);
  }
}
