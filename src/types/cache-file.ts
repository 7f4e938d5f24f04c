/**
 * ListingSync: Cache File Schemas
 *
 * On-disk layout of cache.json. Keys are snake_case; the in-memory
 * model in ./listing is camelCase with Date timestamps.
 */

import { z } from 'zod';

// Accepts "2025-03-01T10:00:00Z", offsets, and zone-less values with
// microsecond fractions ("2025-03-01T10:00:00.123456").
const ISO_PATTERN =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})?$/;

export function parseIsoTimestamp(value: string): Date | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, base, fraction, zone] = match;
  const millis = fraction ? `.${fraction.slice(0, 3).padEnd(3, '0')}` : '';
  const date = new Date(`${base}${millis}${zone ?? ''}`);

  return Number.isNaN(date.getTime()) ? null : date;
}

export const IsoDateSchema = z.string().transform((value, ctx) => {
  const date = parseIsoTimestamp(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return date;
});

// ============================================================
// LISTING ROW
// ============================================================

export const ListingRowSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  name: z.string(),
  category: z.string(),
  size: z.string().default('Unknown'),
  seeders: z.number().int().nonnegative().default(0),
  leechers: z.number().int().nonnegative().default(0),
  snatched: z.number().int().nonnegative().default(0),
  upload_time: z.string().default('Unknown'),
  timestamp: IsoDateSchema,
  download_link: z.string().nullable().default(null),
  is_freeleech: z.boolean().default(false),
  url: z.string().nullable().default(null),
  rating: z.number().optional(),
  year: z.number().int().optional(),
  genres: z.array(z.string()).optional(),
  quality: z.string().optional(),
  uploader: z.string().optional(),
});
export type ListingRow = z.input<typeof ListingRowSchema>;

// ============================================================
// METADATA
// ============================================================

export const CategoryMetadataRowSchema = z.object({
  newest_timestamp: IsoDateSchema.nullable(),
  oldest_timestamp: IsoDateSchema.nullable(),
  count: z.number().int().nonnegative(),
});

export const CacheMetadataRowSchema = z.object({
  created_at: IsoDateSchema.nullable().default(null),
  updated_at: IsoDateSchema.nullable().default(null),
  default_window_days: z.number().int().positive().optional(),
  categories: z.record(CategoryMetadataRowSchema).default({}),
});

// ============================================================
// FILE FORMATS
// ============================================================

// Rows are validated one by one so a single bad row is skipped, not fatal.
export const CacheFileSchema = z.object({
  metadata: CacheMetadataRowSchema,
  data: z.array(z.unknown()).default([]),
});
export type CacheFile = z.output<typeof CacheFileSchema>;

/**
 * Flat format written by early versions: one timestamp, no per-category metadata.
 */
export const LegacyCacheFileSchema = z.object({
  timestamp: IsoDateSchema.nullable(),
  data: z.array(z.unknown()).default([]),
});
export type LegacyCacheFile = z.output<typeof LegacyCacheFileSchema>;
