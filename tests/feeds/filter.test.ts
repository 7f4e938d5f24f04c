/**
 * Tests for query-time filtering and sorting
 */

import { describe, it, expect } from 'vitest';
import { filterListings, sortListings, sizeToMb } from '../../src/feeds/filter';
import { makeListing, daysBefore, ids, NOW } from '../helpers';

const listings = [
  makeListing('1', daysBefore(1), { name: 'Alpha Strike', category: 'PC-ISO', snatched: 50, seeders: 3, size: '2 GB' }),
  makeListing('2', daysBefore(3), { name: 'beta Racer', category: 'PC-Rip', snatched: 5, seeders: 9, size: '900 MB' }),
  makeListing('3', daysBefore(10), { name: 'Gamma Quest Demo', category: 'PC-ISO', snatched: 20, seeders: 1, size: '1 TB' }),
];

describe('filterListings', () => {
  it('should return everything with no filters', () => {
    expect(ids(filterListings(listings, {}, NOW))).toEqual(['1', '2', '3']);
  });

  it('should filter by category', () => {
    expect(ids(filterListings(listings, { categories: ['PC-Rip'] }, NOW))).toEqual(['2']);
  });

  it('should filter by upload age in days', () => {
    expect(ids(filterListings(listings, { days: 7 }, NOW))).toEqual(['1', '2']);
  });

  it('should filter by minimum snatched', () => {
    expect(ids(filterListings(listings, { minSnatched: 20 }, NOW))).toEqual(['1', '3']);
  });

  it('should drop names containing any excluded keyword', () => {
    expect(ids(filterListings(listings, { exclude: 'demo, RACER' }, NOW))).toEqual(['1']);
  });

  it('should match search case-insensitively', () => {
    expect(ids(filterListings(listings, { search: 'BETA' }, NOW))).toEqual(['2']);
  });

  it('should combine filters', () => {
    expect(ids(filterListings(listings, { categories: ['PC-ISO'], days: 30, minSnatched: 30 }, NOW))).toEqual(['1']);
  });
});

describe('sizeToMb', () => {
  it('should convert units to megabytes', () => {
    expect(sizeToMb('700 MB')).toBe(700);
    expect(sizeToMb('1.5 GB')).toBe(1536);
    expect(sizeToMb('1 TB')).toBe(1048576);
    expect(sizeToMb('Unknown')).toBe(0);
  });
});

describe('sortListings', () => {
  it('should sort by snatched descending by default', () => {
    expect(ids(sortListings(listings))).toEqual(['1', '3', '2']);
  });

  it('should sort by name ignoring case', () => {
    expect(ids(sortListings(listings, 'name', 'asc'))).toEqual(['1', '2', '3']);
  });

  it('should sort by size using megabytes', () => {
    expect(ids(sortListings(listings, 'size', 'desc'))).toEqual(['3', '1', '2']);
  });

  it('should sort by date ascending', () => {
    expect(ids(sortListings(listings, 'date', 'asc'))).toEqual(['3', '2', '1']);
  });

  it('should sort by seeders', () => {
    expect(ids(sortListings(listings, 'seeders', 'desc'))).toEqual(['2', '1', '3']);
  });

  it('should not mutate the input', () => {
    sortListings(listings, 'seeders');
    expect(ids(listings)).toEqual(['1', '2', '3']);
  });
});
