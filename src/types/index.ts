/**
 * ListingSync: Type Exports
 *
 * Re-exports all types from the types module.
 * Import from './types' in other modules.
 */

// Listings and cache state
export type {
  Listing,
  ListingExtras,
  CategoryMetadata,
  CategoryMetadataMap,
  CacheMetadata,
  CacheState,
  CacheSnapshot,
  RefreshMode,
  RefreshOptions,
  RefreshResult,
  ListingParser,
  PageSource,
} from './listing';
export { RefreshModeSchema } from './listing';

// Cache file
export type { ListingRow, CacheFile, LegacyCacheFile } from './cache-file';
export {
  CacheFileSchema,
  LegacyCacheFileSchema,
  ListingRowSchema,
  IsoDateSchema,
  parseIsoTimestamp,
} from './cache-file';
