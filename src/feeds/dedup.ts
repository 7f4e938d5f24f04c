/**
 * ListingSync: Listing Deduplication
 *
 * Listings are identified by tracker id. The first copy seen wins;
 * later copies are dropped, never merged or overwritten.
 */

import type { Listing } from '../types';

/**
 * Result of deduplication process.
 */
export interface DedupResult {
  listings: Listing[];
  duplicateCount: number;
}

/**
 * Remove repeated ids from a single batch, keeping first occurrences in order.
 */
export function dedupeListings(listings: readonly Listing[]): DedupResult {
  const seen = new Map<string, Listing>();

  for (const listing of listings) {
    if (!seen.has(listing.id)) {
      seen.set(listing.id, listing);
    }
  }

  return {
    listings: Array.from(seen.values()),
    duplicateCount: listings.length - seen.size,
  };
}

/**
 * Merge `incoming` into `existing`. Existing listings keep their position;
 * incoming listings with an unseen id are appended in order.
 */
export function mergeUnique(existing: readonly Listing[], incoming: readonly Listing[]): Listing[] {
  return dedupeListings([...existing, ...incoming]).listings;
}
