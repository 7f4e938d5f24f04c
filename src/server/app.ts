/**
 * ListingSync: HTTP Server
 *
 * Express app exposing refresh operations over the cache.
 *
 * Endpoints:
 * - GET /health  Health check for monitoring
 * - GET /api/listings  Listings for a refresh mode, optionally filtered
 * - GET /api/refresh  Incremental refresh, or forced full with force=true
 * - GET /api/stats  Cache statistics
 */

import express, { type Request, type Response, type NextFunction, type Express } from 'express';
import { z } from 'zod';
import type { ListingSync } from '../index';
import type { Listing } from '../types';
import { RefreshModeSchema } from '../types';
import { filterListings, sortListings, SORT_FIELDS } from '../feeds/filter';
import { listingToRow } from '../cache/persistence';
import { splitList } from '../lib/config';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'http' });

// ============================================================
// QUERY SCHEMAS
// ============================================================

const optionalInt = z.coerce.number().int().positive().optional();
const categoryList = z.string().transform(splitList).optional();

const ListingsQuerySchema = z.object({
  mode: RefreshModeSchema.default('full'),
  categories: categoryList,
  days: optionalInt,
  search: z.string().optional(),
  exclude: z.string().optional(),
  min_snatched: z.coerce.number().int().nonnegative().optional(),
  sort: z.enum(SORT_FIELDS).optional(),
  order: z.enum(['asc', 'desc']).default('desc'),
});

const RefreshQuerySchema = z.object({
  force: z
    .enum(['true', 'false'])
    .default('false')
    .transform(v => v === 'true'),
  categories: categoryList,
  days: optionalInt,
});

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: 'Invalid query',
    issues: error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
  });
}

function serialize(listings: readonly Listing[]) {
  return listings.map(listingToRow);
}

// ============================================================
// APP
// ============================================================

export function createApp(sync: ListingSync): Express {
  const app = express();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'listing-sync',
      version: '1.0.0',
    });
  });

  app.get('/api/listings', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = ListingsQuerySchema.safeParse(req.query);
      if (!query.success) {
        badRequest(res, query.error);
        return;
      }

      const q = query.data;
      const result = await sync.refresh({ mode: q.mode, categories: q.categories, days: q.days });

      let listings = filterListings(result.listings, {
        categories: q.categories,
        search: q.search,
        exclude: q.exclude,
        minSnatched: q.min_snatched,
      });
      if (q.sort) {
        listings = sortListings(listings, q.sort, q.order);
      }

      res.json({
        listings: serialize(listings),
        metadata: result.metadata,
        modeUsed: result.modeUsed,
        count: listings.length,
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/refresh', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = RefreshQuerySchema.safeParse(req.query);
      if (!query.success) {
        badRequest(res, query.error);
        return;
      }

      const { force, categories, days } = query.data;
      const mode = force ? 'full' : 'incremental';
      const result = await sync.refresh({ mode, categories, days, force });
      const newListings = result.metadata.fetchedNew;

      res.json({
        success: true,
        count: result.listings.length,
        newListings,
        modeUsed: result.modeUsed,
        message: `${mode === 'full' ? 'Full refresh' : 'Incremental refresh'}: ${newListings} new listings`,
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/stats', (_req: Request, res: Response) => {
    const snapshot = sync.store.metadataSnapshot();

    res.json({
      total: snapshot.totalListings,
      cacheAge: snapshot.cacheAge,
      categories: Object.fromEntries(
        Object.entries(snapshot.categories).map(([name, meta]) => [name, meta.count])
      ),
      cacheValid: sync.store.isFresh(sync.config.cacheDurationMs),
      defaultWindowDays: sync.store.defaultWindowDays,
    });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    log.error('Unhandled error in HTTP server', { error: errorMessage(err) });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
