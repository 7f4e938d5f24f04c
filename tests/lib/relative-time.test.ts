/**
 * Tests for relative upload ages and cache age formatting
 */

import { describe, it, expect } from 'vitest';
import { matchRelativeAge, formatCacheAge, daysAgo } from '../../src/lib/relative-time';
import { NOW } from '../helpers';

const HOUR_MS = 60 * 60 * 1000;

function resolvedMs(text: string): number | undefined {
  return matchRelativeAge(text, NOW)?.timestamp.getTime();
}

describe('matchRelativeAge', () => {
  it('should resolve fractional hours against now', () => {
    // Date truncates fractional milliseconds
    expect(resolvedMs('10.9 hours ago')).toBe(new Date(NOW.getTime() - 10.9 * HOUR_MS).getTime());
  });

  it('should handle minutes, days and weeks', () => {
    expect(resolvedMs('5 minutes ago')).toBe(NOW.getTime() - 5 * 60 * 1000);
    expect(resolvedMs('1.2 days ago')).toBe(new Date(NOW.getTime() - 1.2 * (24 * HOUR_MS)).getTime());
    expect(resolvedMs('2 weeks ago')).toBe(NOW.getTime() - 14 * 24 * HOUR_MS);
  });

  it('should count a month as 30 days', () => {
    expect(resolvedMs('1 month ago')).toBe(NOW.getTime() - 30 * 24 * HOUR_MS);
  });

  it('should be case-insensitive and accept singular units', () => {
    expect(resolvedMs('1 Hour Ago')).toBe(NOW.getTime() - HOUR_MS);
  });

  it('should find the age inside surrounding text', () => {
    const match = matchRelativeAge('Some Game v1.0 3.5 GB 2.5 hours ago by uploader', NOW);
    expect(match?.text).toBe('2.5 hours ago');
  });

  it('should return null without an age', () => {
    expect(matchRelativeAge('no age here', NOW)).toBeNull();
  });
});

describe('formatCacheAge', () => {
  it('should return null when never updated', () => {
    expect(formatCacheAge(null, NOW)).toBeNull();
  });

  it('should use minutes below one hour', () => {
    const updatedAt = new Date(NOW.getTime() - 42 * 60 * 1000);
    expect(formatCacheAge(updatedAt, NOW)).toBe('42 minutes ago');
  });

  it('should use whole hours from one hour up', () => {
    const updatedAt = new Date(NOW.getTime() - 150 * 60 * 1000);
    expect(formatCacheAge(updatedAt, NOW)).toBe('2 hours ago');
  });

  it('should not report a negative age when updatedAt is slightly ahead', () => {
    const updatedAt = new Date(NOW.getTime() + 30 * 1000);
    expect(formatCacheAge(updatedAt, NOW)).toBe('0 minutes ago');
  });
});

describe('daysAgo', () => {
  it('should subtract whole days', () => {
    expect(daysAgo(7, NOW).toISOString()).toBe('2026-03-03T12:00:00.000Z');
  });
});
