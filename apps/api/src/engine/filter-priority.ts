import type { HardFilter } from '@travel-search/types';
import { ConstraintSet, monthName, normalizeText, toTitleCase } from './constraints.js';

export type HardFilterField = HardFilter['field'];

/**
 * The store can only push one equality predicate down efficiently.
 * Destination and timing come first: a wrong city or a wrong season is
 * never an acceptable answer, a price or category miss sometimes is.
 */
export const HARD_FILTER_PRECEDENCE: readonly HardFilterField[] = [
  'destination',
  'travel_month',
  'season',
  'category',
  'price_range',
  'subcategory',
];

function normalizedValue(field: HardFilterField, constraints: ConstraintSet): string | null {
  switch (field) {
    case 'destination':
      return constraints.destination ? toTitleCase(constraints.destination) : null;
    case 'travel_month':
      return constraints.travel_month ? monthName(constraints.travel_month) : null;
    case 'season':
      return constraints.season ?? null;
    case 'price_range':
      return constraints.price_range ?? null;
    case 'category':
      return constraints.category ? normalizeText(constraints.category) : null;
    case 'subcategory':
      return constraints.subcategory ? normalizeText(constraints.subcategory) : null;
  }
}

/**
 * Pick the single constraint to enforce inside the candidate store, or null
 * for an unfiltered similarity search.
 */
export function selectHardFilter(constraints: ConstraintSet): HardFilter | null {
  for (const field of HARD_FILTER_PRECEDENCE) {
    const value = normalizedValue(field, constraints);
    if (value !== null && value !== '') {
      return { field, value };
    }
  }
  return null;
}
