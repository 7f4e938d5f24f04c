/**
 * ListingSync: Server Script
 *
 * Loads the cache and serves the HTTP API.
 *
 * Usage:
 *   npm run server
 */

import 'dotenv/config';
import { logger, errorMessage } from '../src/lib/logger';
import { createListingSync } from '../src/index';
import { createApp } from '../src/server/app';

async function main(): Promise<void> {
  const sync = await createListingSync();
  const app = createApp(sync);
  const port = sync.config.serverPort;

  app.listen(port, () => {
    logger.info(`Server listening on port ${port}`, {
      cacheFile: sync.config.cacheFile,
      listings: sync.store.listings.length,
    });
    console.log(`ListingSync started on http://localhost:${port}`);
    console.log('Endpoints:');
    console.log('  GET /health        - Health check');
    console.log('  GET /api/listings  - Listings (mode, categories, days, filters)');
    console.log('  GET /api/refresh   - Refresh (force, categories, days)');
    console.log('  GET /api/stats     - Cache statistics');
  });
}

main().catch((error: unknown) => {
  logger.error('Server failed to start', { error: errorMessage(error) });
  process.exit(1);
});
