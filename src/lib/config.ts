/**
 * ListingSync: Configuration
 *
 * Reads settings from the environment (.env via dotenv) and validates
 * them with zod. loadConfig() takes the env explicitly so tests can
 * pass their own.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors';

// ============================================================
// SCHEMA
// ============================================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  TRACKER_BASE_URL: z.string().url().default('http://www.iptorrents.com'),
  TRACKER_COOKIE: z.string().optional(),
  CACHE_FILE: z.string().min(1).default('cache.json'),
  CACHE_DURATION_MINUTES: positiveInt(15),
  DEFAULT_WINDOW_DAYS: positiveInt(30),
  PAGE_SIZE: positiveInt(50),
  ESTIMATED_PAGES: positiveInt(10),
  FETCH_CONCURRENCY: positiveInt(3),
  INCREMENTAL_MAX_PAGES: positiveInt(5),
  REQUEST_TIMEOUT_MS: positiveInt(30000),
  DEFAULT_CATEGORIES: z.string().default('PC-ISO,PC-Rip'),
  SERVER_PORT: positiveInt(5000),
});

export interface ListingSyncConfig {
  baseUrl: string;
  cookie?: string;
  cacheFile: string;
  cacheDurationMs: number;
  defaultWindowDays: number;
  pageSize: number;
  estimatedPages: number;
  fetchConcurrency: number;
  incrementalMaxPages: number;
  requestTimeoutMs: number;
  defaultCategories: string[];
  serverPort: number;
}

// ============================================================
// LOADING
// ============================================================

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

/**
 * Build the config from an environment map.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ListingSyncConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  const defaultCategories = splitList(e.DEFAULT_CATEGORIES);
  if (defaultCategories.length === 0) {
    throw new ConfigError('Invalid configuration: DEFAULT_CATEGORIES is empty');
  }

  return {
    baseUrl: e.TRACKER_BASE_URL.replace(/\/+$/, ''),
    cookie: e.TRACKER_COOKIE || undefined,
    cacheFile: e.CACHE_FILE,
    cacheDurationMs: e.CACHE_DURATION_MINUTES * 60 * 1000,
    defaultWindowDays: e.DEFAULT_WINDOW_DAYS,
    pageSize: e.PAGE_SIZE,
    estimatedPages: e.ESTIMATED_PAGES,
    fetchConcurrency: e.FETCH_CONCURRENCY,
    incrementalMaxPages: e.INCREMENTAL_MAX_PAGES,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    defaultCategories,
    serverPort: e.SERVER_PORT,
  };
}
