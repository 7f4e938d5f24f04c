/**
 * ListingSync: Listing Types v1.0
 *
 * A listing is one torrent row scraped from a category browse page.
 * Listings are identified by the tracker's torrent id.
 */

import { z } from 'zod';

// ============================================================
// LISTING
// ============================================================

export interface ListingExtras {
  rating?: number;
  year?: number;
  genres?: string[];
  quality?: string;
  uploader?: string;
}

export interface Listing extends ListingExtras {
  id: string;
  category: string;
  name: string;
  /** Free-form size as shown on the page, e.g. "3.5 GB" */
  size: string;
  seeders: number;
  leechers: number;
  snatched: number;
  /** Relative age as shown on the page, e.g. "10.9 hours ago" */
  uploadTime: string;
  /** Absolute upload time derived from uploadTime at fetch time */
  timestamp: Date;
  downloadLink: string | null;
  isFreeleech: boolean;
  url: string | null;
}

// ============================================================
// CACHE METADATA
// ============================================================

export interface CategoryMetadata {
  newestTimestamp: Date;
  oldestTimestamp: Date;
  count: number;
}

export type CategoryMetadataMap = Record<string, CategoryMetadata>;

export interface CacheMetadata {
  createdAt: Date | null;
  updatedAt: Date | null;
  defaultWindowDays: number;
  categories: CategoryMetadataMap;
}

export interface CacheState {
  metadata: CacheMetadata;
  listings: Listing[];
}

/**
 * Read-only summary returned alongside listings.
 */
export interface CacheSnapshot {
  cacheAge: string | null;
  categories: Record<string, { count: number }>;
  fetchedNew: number;
  totalListings: number;
}

// ============================================================
// REFRESH
// ============================================================

export const RefreshModeSchema = z.enum(['cache-only', 'incremental', 'full']);
export type RefreshMode = z.infer<typeof RefreshModeSchema>;

export interface RefreshOptions {
  mode: RefreshMode;
  categories?: string[];
  days?: number;
  force?: boolean;
}

export interface RefreshResult {
  listings: Listing[];
  metadata: CacheSnapshot;
  /** What actually ran: a fresh cache turns 'full' into 'cache-only' */
  modeUsed: RefreshMode;
}

// ============================================================
// PARSER CONTRACT
// ============================================================

/**
 * Turns one fetched browse page into listings.
 * Must skip malformed rows rather than throw.
 */
export interface ListingParser {
  parse(html: string, category: string, fetchedAt?: Date): Listing[];
}

/**
 * Source of single pages. PageFetcher is the production implementation;
 * tests substitute scripted pages.
 */
export interface PageSource {
  fetch(category: string, offset: number): Promise<Listing[]>;
}
