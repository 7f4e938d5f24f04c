/**
 * Tests for listing deduplication
 */

import { describe, it, expect } from 'vitest';
import { dedupeListings, mergeUnique } from '../../src/feeds/dedup';
import { makeListing, daysBefore, ids } from '../helpers';

describe('mergeUnique', () => {
  it('should append only unseen ids', () => {
    const existing = [makeListing('1', daysBefore(1)), makeListing('2', daysBefore(2))];
    const incoming = [makeListing('2', daysBefore(0)), makeListing('3', daysBefore(3))];

    expect(ids(mergeUnique(existing, incoming))).toEqual(['1', '2', '3']);
  });

  it('should keep the first copy rather than overwrite', () => {
    const original = makeListing('7', daysBefore(5), { name: 'Original' });
    const repeat = makeListing('7', daysBefore(1), { name: 'Repeat' });

    const merged = mergeUnique([original], [repeat]);

    expect(merged).toHaveLength(1);
    expect(merged[0].name).toBe('Original');
  });

  it('should drop duplicates inside the existing list as well', () => {
    const merged = mergeUnique(
      [makeListing('1', daysBefore(1), { name: 'first' }), makeListing('1', daysBefore(2), { name: 'second' })],
      []
    );
    expect(merged.map(l => l.name)).toEqual(['first']);
  });

  it('should be idempotent when merging the same batch twice', () => {
    const existing = [makeListing('1', daysBefore(3))];
    const batch = [makeListing('2', daysBefore(2)), makeListing('3', daysBefore(1))];

    const once = mergeUnique(existing, batch);
    const twice = mergeUnique(once, batch);

    expect(ids(twice)).toEqual(ids(once));
  });
});

describe('dedupeListings', () => {
  it('should count dropped repeats', () => {
    const result = dedupeListings([
      makeListing('a', daysBefore(1)),
      makeListing('b', daysBefore(1)),
      makeListing('a', daysBefore(2)),
      makeListing('a', daysBefore(3)),
    ]);

    expect(ids(result.listings)).toEqual(['a', 'b']);
    expect(result.duplicateCount).toBe(2);
  });
});
