/**
 * Soft-filter penalty rules
 *
 * Each rule maps (query value, candidate attributes) to a severity in [0, 1]:
 * 0 when the candidate satisfies the constraint, 1 for a full mismatch, and
 * a fraction for near misses. The scorer turns severity into a penalty by
 * multiplying with the constraint's weight.
 */

import type { FragmentAttributes } from '@travel-search/types';
import {
  ConstraintName,
  ConstraintValueMap,
  normalizeText,
  readBoolean,
  readList,
  readMonth,
  readNumber,
  readPrice,
  readText,
  PRICE_BAND_VALUES,
} from './constraints.js';

export type PenaltyWeights = Record<ConstraintName, number>;

export const DEFAULT_PENALTY_WEIGHT = 0.1;

export const DEFAULT_PENALTY_WEIGHTS: PenaltyWeights = {
  price_range: 0.9,
  travel_month: 0.8,
  duration_days: 0.6,
  category: 0.5,
  family_friendly: 0.3,
  transport_type: 0.2,
  destination: DEFAULT_PENALTY_WEIGHT,
  season: DEFAULT_PENALTY_WEIGHT,
  price_max: DEFAULT_PENALTY_WEIGHT,
  amenities: DEFAULT_PENALTY_WEIGHT,
  subcategory: DEFAULT_PENALTY_WEIGHT,
};

export type PenaltyRule<T> = (queryValue: T, attributes: FragmentAttributes) => number;

export type PenaltyRegistry = { [K in ConstraintName]: PenaltyRule<ConstraintValueMap[K]> };

const FULL_MISMATCH = 1;

// ---------------------------------------------------------------------------
// Severity curves
// ---------------------------------------------------------------------------

/**
 * Whole-unit distance: ≤1 → 0.2, 2 → 0.5, beyond → full.
 */
export function numericSeverity(queryValue: number, candidateValue: number | null): number {
  if (candidateValue === null) return FULL_MISMATCH;

  const diff = Math.abs(queryValue - candidateValue);
  if (diff === 0) return 0;
  if (diff <= 1) return 0.2;
  if (diff <= 2) return 0.5;
  return FULL_MISMATCH;
}

/**
 * Relative price difference against the query price: ≤10% → 0.2, ≤25% → 0.5.
 */
export function priceSeverity(queryPrice: number, candidatePrice: number | null): number {
  if (candidatePrice === null || queryPrice <= 0) return FULL_MISMATCH;

  const diff = Math.abs(queryPrice - candidatePrice);
  if (diff === 0) return 0;

  const relative = diff / queryPrice;
  if (relative <= 0.1) return 0.2;
  if (relative <= 0.25) return 0.5;
  return FULL_MISMATCH;
}

/**
 * Linear month distance: 1 → 0.3, 2 → 0.6, beyond → full.
 * December and January are eleven months apart here.
 */
export function monthSeverity(queryMonth: number, candidateMonth: number | null): number {
  if (candidateMonth === null) return FULL_MISMATCH;

  const diff = Math.abs(queryMonth - candidateMonth);
  if (diff === 0) return 0;
  if (diff === 1) return 0.3;
  if (diff === 2) return 0.6;
  return FULL_MISMATCH;
}

export function exactSeverity<T>(queryValue: T, candidateValue: T | null): number {
  return candidateValue !== null && candidateValue === queryValue ? 0 : FULL_MISMATCH;
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

function textRule(field: ConstraintName): PenaltyRule<string> {
  return (queryValue, attributes) => exactSeverity(normalizeText(queryValue), readText(attributes[field]));
}

// Price attributes stand in for each other when only one is stored
function candidatePrice(attributes: FragmentAttributes, preferred: 'price_range' | 'price_max'): number | null {
  const other = preferred === 'price_range' ? 'price_max' : 'price_range';
  return readPrice(attributes[preferred]) ?? readPrice(attributes[other]);
}

export const PENALTY_RULES: PenaltyRegistry = {
  destination: textRule('destination'),
  category: textRule('category'),
  subcategory: textRule('subcategory'),
  transport_type: textRule('transport_type'),
  season: textRule('season'),

  family_friendly: (queryValue, attributes) =>
    exactSeverity(queryValue, readBoolean(attributes.family_friendly)),

  duration_days: (queryValue, attributes) =>
    numericSeverity(queryValue, readNumber(attributes.duration_days)),

  travel_month: (queryValue, attributes) =>
    monthSeverity(queryValue, readMonth(attributes.travel_month)),

  price_range: (queryValue, attributes) =>
    priceSeverity(PRICE_BAND_VALUES[queryValue], candidatePrice(attributes, 'price_range')),

  price_max: (queryValue, attributes) =>
    priceSeverity(queryValue, candidatePrice(attributes, 'price_max')),

  amenities: (queryValue, attributes) => {
    const offered = readList(attributes.amenities);
    if (offered === null) return FULL_MISMATCH;
    const satisfied = queryValue.every(amenity => offered.includes(normalizeText(amenity)));
    return satisfied ? 0 : FULL_MISMATCH;
  },
};

/**
 * Severity of one constraint against one candidate.
 */
export function severityFor<K extends ConstraintName>(
  name: K,
  queryValue: ConstraintValueMap[K],
  attributes: FragmentAttributes,
  rules: PenaltyRegistry = PENALTY_RULES
): number {
  const rule: PenaltyRule<ConstraintValueMap[K]> = rules[name];
  const severity = rule(queryValue, attributes);
  return Math.max(0, Math.min(1, severity));
}
