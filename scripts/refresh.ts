/**
 * ListingSync: Refresh Script
 *
 * Runs one refresh cycle against the configured tracker and cache file.
 * Designed to be called by cron between server restarts.
 *
 * Usage:
 *   npm run refresh                                  # Incremental, default categories
 *   npm run refresh -- --mode full --days 7          # Full 7-day window
 *   npm run refresh -- --mode full --force           # Ignore cache freshness
 *   npm run refresh -- --categories PC-ISO,Nintendo  # Specific categories
 *
 * Cron Setup (every 15 minutes):
 *   0,15,30,45 * * * * cd /path/to/listing-sync && npm run refresh >> /var/log/listing-sync.log 2>&1
 */

import 'dotenv/config';
import { logger, errorMessage } from '../src/lib/logger';
import { splitList } from '../src/lib/config';
import { createListingSync } from '../src/index';
import { RefreshModeSchema, type RefreshOptions } from '../src/types';

// ============================================================
// CONFIGURATION
// ============================================================

function parseArgs(): RefreshOptions {
  const args = process.argv.slice(2);
  const options: RefreshOptions = { mode: 'incremental' };

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];

    if (args[i] === '--mode' && value) {
      const mode = RefreshModeSchema.safeParse(value);
      if (!mode.success) {
        throw new Error(`Unknown mode: ${value} (expected cache-only, incremental or full)`);
      }
      options.mode = mode.data;
    }

    if (args[i] === '--categories' && value) {
      options.categories = splitList(value);
    }

    if (args[i] === '--days' && value) {
      const days = Number.parseInt(value, 10);
      if (!Number.isInteger(days) || days < 1) {
        throw new Error(`Invalid --days: ${value}`);
      }
      options.days = days;
    }

    if (args[i] === '--force') {
      options.force = true;
    }
  }

  return options;
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const startTime = Date.now();
  const options = parseArgs();

  const sync = await createListingSync();
  const result = await sync.refresh(options);
  await sync.store.flush();

  const duration = ((Date.now() - startTime) / 1000).toFixed(2);

  console.log('\n' + '='.repeat(60));
  console.log('REFRESH COMPLETE');
  console.log('='.repeat(60));
  console.log(`Mode: ${options.mode} (used: ${result.modeUsed})`);
  console.log(`Duration: ${duration}s`);
  console.log(`New listings: ${result.metadata.fetchedNew}`);
  console.log(`Total listings: ${result.metadata.totalListings}`);
  console.log(`Cache age: ${result.metadata.cacheAge ?? 'never updated'}`);
  for (const [category, meta] of Object.entries(result.metadata.categories)) {
    console.log(`  ${category}: ${meta.count}`);
  }
  console.log('='.repeat(60) + '\n');

  logger.info('Refresh script completed', {
    mode: options.mode,
    modeUsed: result.modeUsed,
    fetchedNew: result.metadata.fetchedNew,
    duration,
  });
}

main().catch((error: unknown) => {
  logger.error('Refresh script failed', { error: errorMessage(error) });
  console.error('\nRefresh failed:', errorMessage(error));
  process.exit(1);
});
