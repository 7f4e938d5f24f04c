/**
 * Shared fixtures for ListingSync tests.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Listing, PageSource } from '../src/types';
import type { ListingSyncConfig } from '../src/lib/config';

export const NOW = new Date('2026-03-10T12:00:00.000Z');

const DAY_MS = 24 * 60 * 60 * 1000;

export function daysBefore(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * DAY_MS);
}

export function makeListing(id: string, timestamp: Date, overrides: Partial<Listing> = {}): Listing {
  return {
    id,
    category: 'PC-ISO',
    name: `Listing ${id}`,
    size: '1.0 GB',
    seeders: 10,
    leechers: 2,
    snatched: 5,
    uploadTime: '1 day ago',
    timestamp,
    downloadLink: `http://tracker.test/download.php/${id}/file.torrent`,
    isFreeleech: false,
    url: `http://tracker.test/t/${id}`,
    ...overrides,
  };
}

/**
 * Mutable clock for stores and orchestrators.
 */
export function createClock(start: Date = NOW) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advanceMinutes(minutes: number) {
      current += minutes * 60 * 1000;
    },
  };
}

/**
 * Serves pre-arranged pages per category. Page index = offset / pageSize.
 * Records every call and the peak number of concurrent calls.
 */
export class ScriptedPageSource implements PageSource {
  readonly calls: Array<{ category: string; offset: number }> = [];
  maxInFlight = 0;
  private inFlight = 0;
  private readonly failing = new Set<string>();

  constructor(
    private readonly pages: Record<string, Listing[][]>,
    private readonly pageSize = 50,
    private readonly delayMs = 2
  ) {}

  failAt(category: string, offset: number): this {
    this.failing.add(`${category}:${offset}`);
    return this;
  }

  async fetch(category: string, offset: number): Promise<Listing[]> {
    this.calls.push({ category, offset });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
      if (this.failing.has(`${category}:${offset}`)) {
        throw new Error(`scripted failure at ${category}:${offset}`);
      }
      return this.pages[category]?.[offset / this.pageSize] ?? [];
    } finally {
      this.inFlight--;
    }
  }
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'listing-sync-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function testConfig(cacheFile: string, overrides: Partial<ListingSyncConfig> = {}): ListingSyncConfig {
  return {
    baseUrl: 'http://tracker.test',
    cacheFile,
    cacheDurationMs: 15 * 60 * 1000,
    defaultWindowDays: 30,
    pageSize: 50,
    estimatedPages: 3,
    fetchConcurrency: 2,
    incrementalMaxPages: 5,
    requestTimeoutMs: 1000,
    defaultCategories: ['PC-ISO', 'PC-Rip'],
    serverPort: 0,
    ...overrides,
  };
}

export function ids(listings: readonly Listing[]): string[] {
  return listings.map(l => l.id);
}
