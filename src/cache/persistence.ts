/**
 * ListingSync: Cache Persistence
 *
 * Reads and writes cache.json.
 * - Writes go to <file>.tmp and are renamed over the canonical file
 * - The previous canonical file is kept as <file>.backup
 * - Reads fall back to the backup, then to an empty cache
 * - The flat legacy format is migrated on read
 */

import { copyFile, mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { CacheState, Listing } from '../types';
import {
  CacheFileSchema,
  LegacyCacheFileSchema,
  ListingRowSchema,
  type ListingRow,
} from '../types/cache-file';
import { rebuildCategoryMetadata, sortByTimestampDesc } from './metadata';
import { dedupeListings } from '../feeds/dedup';
import { CachePersistenceError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'CachePersistence' });

// ============================================================
// ROW MAPPING
// ============================================================

export function listingToRow(listing: Listing): ListingRow {
  const row: ListingRow = {
    id: listing.id,
    name: listing.name,
    category: listing.category,
    size: listing.size,
    seeders: listing.seeders,
    leechers: listing.leechers,
    snatched: listing.snatched,
    upload_time: listing.uploadTime,
    timestamp: listing.timestamp.toISOString(),
    download_link: listing.downloadLink,
    is_freeleech: listing.isFreeleech,
    url: listing.url,
  };

  if (listing.rating !== undefined) row.rating = listing.rating;
  if (listing.year !== undefined) row.year = listing.year;
  if (listing.genres !== undefined) row.genres = listing.genres;
  if (listing.quality !== undefined) row.quality = listing.quality;
  if (listing.uploader !== undefined) row.uploader = listing.uploader;

  return row;
}

function decodeRows(rows: unknown[]): { listings: Listing[]; skipped: number } {
  const listings: Listing[] = [];
  let skipped = 0;

  for (const raw of rows) {
    const parsed = ListingRowSchema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      continue;
    }

    const { upload_time, download_link, is_freeleech, ...rest } = parsed.data;
    listings.push({
      ...rest,
      uploadTime: upload_time,
      downloadLink: download_link,
      isFreeleech: is_freeleech,
    });
  }

  return { listings, skipped };
}

// ============================================================
// DECODE / ENCODE
// ============================================================

export interface DecodedCache {
  state: CacheState;
  migrated: boolean;
  skippedRows: number;
}

function isLegacyShape(raw: unknown): boolean {
  return (
    typeof raw === 'object' &&
    raw !== null &&
    'timestamp' in raw &&
    !('metadata' in raw)
  );
}

/**
 * Decode parsed JSON into cache state. Returns null if it is neither
 * the current nor the legacy format.
 *
 * Category metadata is rebuilt from the listings rather than trusted.
 */
export function decodeCache(raw: unknown, defaultWindowDays: number): DecodedCache | null {
  if (isLegacyShape(raw)) {
    const legacy = LegacyCacheFileSchema.safeParse(raw);
    if (!legacy.success) return null;

    const { listings, skipped } = decodeRows(legacy.data.data);
    const unique = sortByTimestampDesc(dedupeListings(listings).listings);

    return {
      state: {
        metadata: {
          createdAt: legacy.data.timestamp,
          updatedAt: legacy.data.timestamp,
          defaultWindowDays,
          categories: rebuildCategoryMetadata(unique),
        },
        listings: unique,
      },
      migrated: true,
      skippedRows: skipped,
    };
  }

  const current = CacheFileSchema.safeParse(raw);
  if (!current.success) return null;

  const { listings, skipped } = decodeRows(current.data.data);
  const unique = sortByTimestampDesc(dedupeListings(listings).listings);

  return {
    state: {
      metadata: {
        createdAt: current.data.metadata.created_at,
        updatedAt: current.data.metadata.updated_at,
        defaultWindowDays: current.data.metadata.default_window_days ?? defaultWindowDays,
        categories: rebuildCategoryMetadata(unique),
      },
      listings: unique,
    },
    migrated: false,
    skippedRows: skipped,
  };
}

export function encodeCache(state: CacheState): unknown {
  const categories: Record<string, { newest_timestamp: string; oldest_timestamp: string; count: number }> = {};
  for (const [name, meta] of Object.entries(state.metadata.categories)) {
    categories[name] = {
      newest_timestamp: meta.newestTimestamp.toISOString(),
      oldest_timestamp: meta.oldestTimestamp.toISOString(),
      count: meta.count,
    };
  }

  return {
    metadata: {
      created_at: state.metadata.createdAt?.toISOString() ?? null,
      updated_at: state.metadata.updatedAt?.toISOString() ?? null,
      default_window_days: state.metadata.defaultWindowDays,
      categories,
    },
    data: state.listings.map(listingToRow),
  };
}

export function emptyCacheState(defaultWindowDays: number): CacheState {
  return {
    metadata: {
      createdAt: null,
      updatedAt: null,
      defaultWindowDays,
      categories: {},
    },
    listings: [],
  };
}

// ============================================================
// FILE IO
// ============================================================

export function backupPath(path: string): string {
  return `${path}.backup`;
}

export type LoadSource = 'file' | 'backup' | 'empty';

export interface LoadResult {
  state: CacheState;
  source: LoadSource;
  migrated: boolean;
}

async function readDecoded(path: string, defaultWindowDays: number): Promise<DecodedCache | 'missing' | 'invalid'> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return 'missing';
    }
    log.error('Cache file unreadable', { path, error: errorMessage(error) });
    return 'invalid';
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    log.error('Cache file is not valid JSON', { path, error: errorMessage(error) });
    return 'invalid';
  }

  const decoded = decodeCache(raw, defaultWindowDays);
  if (!decoded) {
    log.error('Cache file has an unrecognized structure', { path });
    return 'invalid';
  }

  if (decoded.skippedRows > 0) {
    log.warn('Skipped invalid cache rows', { path, skipped: decoded.skippedRows });
  }

  return decoded;
}

/**
 * Load the cache, falling back to the backup and then to an empty state.
 * Never throws.
 */
export async function loadCacheFile(path: string, defaultWindowDays: number): Promise<LoadResult> {
  const primary = await readDecoded(path, defaultWindowDays);
  if (typeof primary !== 'string') {
    return { state: primary.state, source: 'file', migrated: primary.migrated };
  }

  if (primary === 'invalid') {
    const backup = await readDecoded(backupPath(path), defaultWindowDays);
    if (typeof backup !== 'string') {
      log.warn('Restored cache from backup', { path, listings: backup.state.listings.length });
      return { state: backup.state, source: 'backup', migrated: backup.migrated };
    }
  }

  return { state: emptyCacheState(defaultWindowDays), source: 'empty', migrated: false };
}

export interface WriteOptions {
  /** Copy the current canonical file to <file>.backup first */
  keepBackup?: boolean;
}

/**
 * Write state atomically: temp file, then rename over the canonical file.
 */
export async function writeCacheFile(
  path: string,
  state: CacheState,
  options: WriteOptions = {}
): Promise<void> {
  const tmpPath = `${path}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });

    if (options.keepBackup ?? true) {
      await copyFile(path, backupPath(path)).catch((error: unknown) => {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
          throw error;
        }
      });
    }

    await writeFile(tmpPath, JSON.stringify(encodeCache(state), null, 2), 'utf-8');
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
      log.warn('Failed to remove temp cache file', { tmpPath, error: errorMessage(cleanupError) });
    });
    throw new CachePersistenceError(path, error);
  }
}
