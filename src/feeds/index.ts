/**
 * ListingSync: Feeds Module
 *
 * Fetching, pagination, incremental walks and refresh orchestration.
 */

export { CATEGORIES, isKnownCategory, getCategoryId, partitionCategories, type CategoryName } from './categories';

export { PageFetcher, type PageFetcherOptions, type FetchFn } from './page-fetcher';

export { HtmlListingParser } from './html-parser';

export { ConcurrentPaginator, type PaginatorOptions, type WindowFetchResult } from './paginator';

export { IncrementalWalker, type IncrementalWalkerOptions } from './incremental';

export { dedupeListings, mergeUnique, type DedupResult } from './dedup';

export {
  filterListings,
  sortListings,
  sizeToMb,
  SORT_FIELDS,
  type ListingFilters,
  type SortField,
  type SortOrder,
} from './filter';

export { RefreshOrchestrator, type OrchestratorConfig, type OrchestratorDeps } from './orchestrator';
