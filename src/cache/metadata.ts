/**
 * ListingSync: Cache Metadata
 *
 * Per-category metadata is always derived from the listings themselves.
 */

import type { CategoryMetadataMap, Listing } from '../types';

export function rebuildCategoryMetadata(listings: readonly Listing[]): CategoryMetadataMap {
  const categories: CategoryMetadataMap = {};

  for (const listing of listings) {
    if (!listing.category) continue;

    const meta = categories[listing.category];
    if (!meta) {
      categories[listing.category] = {
        newestTimestamp: listing.timestamp,
        oldestTimestamp: listing.timestamp,
        count: 1,
      };
      continue;
    }

    meta.count++;
    if (listing.timestamp.getTime() > meta.newestTimestamp.getTime()) {
      meta.newestTimestamp = listing.timestamp;
    }
    if (listing.timestamp.getTime() < meta.oldestTimestamp.getTime()) {
      meta.oldestTimestamp = listing.timestamp;
    }
  }

  return categories;
}

/**
 * Newest first. Stable, so equal timestamps keep their relative order.
 */
export function sortByTimestampDesc(listings: readonly Listing[]): Listing[] {
  return [...listings].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
}
