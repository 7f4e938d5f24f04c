/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, splitList } from '../../src/lib/config';
import { ConfigError } from '../../src/lib/errors';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      baseUrl: 'http://www.iptorrents.com',
      cookie: undefined,
      cacheFile: 'cache.json',
      cacheDurationMs: 900000,
      defaultWindowDays: 30,
      pageSize: 50,
      estimatedPages: 10,
      fetchConcurrency: 3,
      incrementalMaxPages: 5,
      requestTimeoutMs: 30000,
      defaultCategories: ['PC-ISO', 'PC-Rip'],
      serverPort: 5000,
    });
  });

  it('should coerce numeric strings and trim the base URL', () => {
    const config = loadConfig({
      TRACKER_BASE_URL: 'http://tracker.test/',
      TRACKER_COOKIE: 'uid=1; pass=test-secret',
      CACHE_DURATION_MINUTES: '5',
      FETCH_CONCURRENCY: '4',
      DEFAULT_CATEGORIES: ' Nintendo , Wii ,',
    });

    expect(config.baseUrl).toBe('http://tracker.test');
    expect(config.cookie).toBe('uid=1; pass=test-secret');
    expect(config.cacheDurationMs).toBe(300000);
    expect(config.fetchConcurrency).toBe(4);
    expect(config.defaultCategories).toEqual(['Nintendo', 'Wii']);
  });

  it('should reject invalid values with a ConfigError', () => {
    expect(() => loadConfig({ FETCH_CONCURRENCY: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ TRACKER_BASE_URL: 'not a url' })).toThrow(/TRACKER_BASE_URL/);
  });

  it('should reject an empty category list', () => {
    expect(() => loadConfig({ DEFAULT_CATEGORIES: ' , ' })).toThrow(
      'Invalid configuration: DEFAULT_CATEGORIES is empty'
    );
  });
});

describe('splitList', () => {
  it('should split, trim and drop blanks', () => {
    expect(splitList('a, b,,c ')).toEqual(['a', 'b', 'c']);
  });
});
