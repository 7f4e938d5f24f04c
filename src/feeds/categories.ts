/**
 * ListingSync: Category Catalog
 *
 * Browse categories the tracker exposes, keyed by display name.
 */

import { ListingSyncError } from '../lib/errors';

export const CATEGORIES = {
  'PC-ISO': '43',
  'PC-Rip': '45',
  'PC-Mixed': '2',
  Nintendo: '47',
  Playstation: '71',
  Xbox: '44',
  Wii: '50',
} as const;

export type CategoryName = keyof typeof CATEGORIES;

export function isKnownCategory(name: string): name is CategoryName {
  return Object.prototype.hasOwnProperty.call(CATEGORIES, name);
}

export function getCategoryId(name: string): string {
  if (!isKnownCategory(name)) {
    throw new ListingSyncError('UNKNOWN_CATEGORY', `Unknown category: ${name}`);
  }
  return CATEGORIES[name];
}

/**
 * Split requested names into known categories and the rest.
 * Keeps the caller's order and drops repeats.
 */
export function partitionCategories(names: readonly string[]): {
  known: CategoryName[];
  unknown: string[];
} {
  const known: CategoryName[] = [];
  const unknown: string[] = [];

  for (const name of new Set(names)) {
    if (isKnownCategory(name)) {
      known.push(name);
    } else {
      unknown.push(name);
    }
  }

  return { known, unknown };
}
