/**
 * ListingSync: Relative Time
 *
 * The tracker shows upload ages like "10.9 hours ago"; listings need
 * an absolute timestamp, computed against the fetch time.
 */

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const UNIT_MS: Record<string, number> = {
  minute: MINUTE_MS,
  hour: HOUR_MS,
  day: DAY_MS,
  week: 7 * DAY_MS,
  // Months are counted as 30 days
  month: 30 * DAY_MS,
};

const RELATIVE_AGE_PATTERN = /([\d.]+)\s*(minute|hour|day|week|month)s?\s*ago/i;

export interface RelativeAge {
  /** Matched text, e.g. "1.2 days ago" */
  text: string;
  timestamp: Date;
}

/**
 * Find a relative age in text and resolve it against `now`.
 * Returns null when the text has no recognizable age.
 */
export function matchRelativeAge(text: string, now: Date = new Date()): RelativeAge | null {
  const match = RELATIVE_AGE_PATTERN.exec(text);
  if (!match) return null;

  const value = Number.parseFloat(match[1]);
  const unitMs = UNIT_MS[match[2].toLowerCase()];
  if (!Number.isFinite(value) || unitMs === undefined) return null;

  return {
    text: match[0],
    timestamp: new Date(now.getTime() - value * unitMs),
  };
}

/**
 * "N minutes ago" under an hour, "N hours ago" otherwise. Null if never updated.
 */
export function formatCacheAge(updatedAt: Date | null, now: Date = new Date()): string | null {
  if (!updatedAt) return null;

  // A clock step can put updatedAt slightly in the future
  const ageMinutes = Math.max(0, Math.floor((now.getTime() - updatedAt.getTime()) / MINUTE_MS));
  if (ageMinutes < 60) {
    return `${ageMinutes} minutes ago`;
  }
  return `${Math.floor(ageMinutes / 60)} hours ago`;
}

export function daysAgo(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * DAY_MS);
}
