/**
 * Tests for single-page fetching
 */

import { describe, it, expect, vi } from 'vitest';
import { PageFetcher, type FetchFn } from '../../src/feeds/page-fetcher';
import type { Listing, ListingParser } from '../../src/types';
import { makeListing, NOW } from '../helpers';

function recordingParser(listings: Listing[] = []) {
  const calls: Array<{ html: string; category: string; fetchedAt?: Date }> = [];
  const parser: ListingParser = {
    parse(html, category, fetchedAt) {
      calls.push({ html, category, fetchedAt });
      return listings;
    },
  };
  return { parser, calls };
}

function fetcherWith(fetchFn: FetchFn, parser: ListingParser, timeoutMs = 1000) {
  return new PageFetcher({
    baseUrl: 'http://tracker.test/',
    parser,
    cookie: 'uid=1; pass=test-secret',
    timeoutMs,
    fetchFn,
    now: () => NOW,
  });
}

describe('PageFetcher', () => {
  describe('buildPageUrl', () => {
    const fetcher = fetcherWith(vi.fn(), recordingParser().parser);

    it('should omit the offset for the first page', () => {
      expect(fetcher.buildPageUrl('PC-ISO', 0)).toBe('http://tracker.test/t?43');
    });

    it('should append the offset for later pages', () => {
      expect(fetcher.buildPageUrl('PC-Rip', 100)).toBe('http://tracker.test/t?45;o=100');
    });

    it('should reject unknown categories', () => {
      expect(() => fetcher.buildPageUrl('Amiga', 0)).toThrow('Unknown category: Amiga');
    });
  });

  it('should pass the page body and category to the parser', async () => {
    const listing = makeListing('1', NOW);
    const { parser, calls } = recordingParser([listing]);
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('<html>page</html>', { status: 200 }));

    const result = await fetcherWith(fetchFn, parser).fetch('PC-ISO', 50);

    expect(result).toEqual([listing]);
    expect(calls).toEqual([{ html: '<html>page</html>', category: 'PC-ISO', fetchedAt: NOW }]);
    expect(fetchFn).toHaveBeenCalledTimes(1);

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('http://tracker.test/t?43;o=50');
    expect(init?.headers).toMatchObject({ Cookie: 'uid=1; pass=test-secret' });
  });

  it('should return an empty page on a non-2xx response', async () => {
    const { parser, calls } = recordingParser([makeListing('1', NOW)]);
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('nope', { status: 503 }));

    const result = await fetcherWith(fetchFn, parser).fetch('PC-ISO', 0);

    expect(result).toEqual([]);
    expect(calls).toHaveLength(0);
  });

  it('should return an empty page when the request fails', async () => {
    const fetchFn = vi.fn<FetchFn>().mockRejectedValue(new Error('ECONNREFUSED'));

    const result = await fetcherWith(fetchFn, recordingParser().parser).fetch('PC-ISO', 0);

    expect(result).toEqual([]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should abort and return an empty page after the timeout', async () => {
    const fetchFn: FetchFn = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    const result = await fetcherWith(fetchFn, recordingParser().parser, 10).fetch('PC-ISO', 0);

    expect(result).toEqual([]);
  });

  it('should return an empty page when the parser throws', async () => {
    const parser: ListingParser = {
      parse() {
        throw new Error('unexpected markup');
      },
    };
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('<html></html>'));

    await expect(fetcherWith(fetchFn, parser).fetch('PC-ISO', 0)).resolves.toEqual([]);
  });

  it('should not issue a request for an unknown category', async () => {
    const fetchFn = vi.fn<FetchFn>();

    const result = await fetcherWith(fetchFn, recordingParser().parser).fetch('Amiga', 0);

    expect(result).toEqual([]);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
