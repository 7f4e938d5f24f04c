/**
 * ListingSync: Listing Filters
 *
 * Query-time filtering and sorting over cached listings.
 */

import type { Listing } from '../types';
import { daysAgo } from '../lib/relative-time';

export interface ListingFilters {
  categories?: string[];
  /** Only listings uploaded within the last N days */
  days?: number;
  minSnatched?: number;
  /** Comma-separated keywords; a listing whose name contains any is dropped */
  exclude?: string;
  /** Case-insensitive substring of the name */
  search?: string;
}

export const SORT_FIELDS = ['snatched', 'date', 'seeders', 'name', 'size'] as const;
export type SortField = (typeof SORT_FIELDS)[number];
export type SortOrder = 'asc' | 'desc';

/**
 * Single pass over listings; every given filter must match.
 */
export function filterListings(
  listings: readonly Listing[],
  filters: ListingFilters,
  now: Date = new Date()
): Listing[] {
  const categorySet = filters.categories?.length ? new Set(filters.categories) : null;
  const cutoffMs = filters.days ? daysAgo(filters.days, now).getTime() : null;
  const excludeKeywords = (filters.exclude ?? '')
    .split(',')
    .map(k => k.trim().toLowerCase())
    .filter(Boolean);
  const search = filters.search?.toLowerCase();

  return listings.filter(listing => {
    if (categorySet && !categorySet.has(listing.category)) return false;
    if (cutoffMs !== null && listing.timestamp.getTime() < cutoffMs) return false;
    if (filters.minSnatched !== undefined && listing.snatched < filters.minSnatched) return false;

    const name = listing.name.toLowerCase();
    if (excludeKeywords.some(keyword => name.includes(keyword))) return false;
    if (search && !name.includes(search)) return false;

    return true;
  });
}

/**
 * Size string to megabytes ("1.5 GB" → 1536). Unparseable sizes are 0.
 */
export function sizeToMb(size: string): number {
  const match = /([\d.]+)\s*(GB|MB|TB)/i.exec(size);
  if (!match) return 0;

  const value = Number.parseFloat(match[1]);
  if (!Number.isFinite(value)) return 0;

  switch (match[2].toUpperCase()) {
    case 'TB':
      return value * 1024 * 1024;
    case 'GB':
      return value * 1024;
    default:
      return value;
  }
}

const SORT_KEYS: Record<SortField, (listing: Listing) => number | string> = {
  snatched: l => l.snatched,
  date: l => l.timestamp.getTime(),
  seeders: l => l.seeders,
  name: l => l.name.toLowerCase(),
  size: l => sizeToMb(l.size),
};

export function sortListings(
  listings: readonly Listing[],
  sortBy: SortField = 'snatched',
  order: SortOrder = 'desc'
): Listing[] {
  const key = SORT_KEYS[sortBy];
  const direction = order === 'desc' ? -1 : 1;

  return [...listings].sort((a, b) => {
    const ka = key(a);
    const kb = key(b);
    if (ka < kb) return -direction;
    if (ka > kb) return direction;
    return 0;
  });
}
