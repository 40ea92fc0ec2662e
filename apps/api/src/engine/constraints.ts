/**
 * Constraint vocabulary
 *
 * The query parser hands us a loose name → value mapping. It is validated
 * once into a ConstraintSet whose value type is fixed per constraint kind,
 * so every scoring rule sees a typed query value. Candidate attributes stay
 * untyped and are read through the tolerant readers at the bottom of this
 * file: a value that cannot be read is reported as null, never thrown.
 */

import { z } from 'zod';
import type { AttributeValue, ConstraintName } from '@travel-search/types';
import { logger } from '../config/index.js';

export type { ConstraintName } from '@travel-search/types';

export const CONSTRAINT_NAMES = [
  'destination',
  'category',
  'price_range',
  'price_max',
  'travel_month',
  'season',
  'duration_days',
  'family_friendly',
  'transport_type',
  'amenities',
  'subcategory',
] as const satisfies readonly ConstraintName[];

export const PRICE_BANDS = ['budget', 'moderate', 'expensive', 'luxury'] as const;
export type PriceBand = (typeof PRICE_BANDS)[number];

// Representative EUR value per band; comparison is point-to-point
export const PRICE_BAND_VALUES: Record<PriceBand, number> = {
  budget: 150,
  moderate: 350,
  expensive: 600,
  luxury: 1000,
};

export const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
] as const;
export type MonthName = (typeof MONTH_NAMES)[number];
export type Month = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

export const SEASONS = ['spring', 'summer', 'autumn', 'winter', 'year_round'] as const;
export type Season = (typeof SEASONS)[number];

export interface ConstraintValueMap {
  destination: string;
  category: string;
  price_range: PriceBand;
  price_max: number;
  travel_month: Month;
  season: Season;
  duration_days: number;
  family_friendly: boolean;
  transport_type: string;
  amenities: string[];
  subcategory: string;
}

export type ConstraintSet = { [K in ConstraintName]?: ConstraintValueMap[K] };

// ---------------------------------------------------------------------------
// Normalisation helpers
// ---------------------------------------------------------------------------

export function normalizeText(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * "new york" → "New York", "rio de janeiro" → "Rio De Janeiro"
 */
export function toTitleCase(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

export function monthName(month: Month): MonthName {
  return MONTH_NAMES[month - 1];
}

function isMonth(value: number): value is Month {
  return Number.isInteger(value) && value >= 1 && value <= 12;
}

function isPriceBand(value: string): value is PriceBand {
  return PRICE_BANDS.some(band => band === value);
}

// ---------------------------------------------------------------------------
// Candidate attribute readers
// ---------------------------------------------------------------------------

export function readText(value: AttributeValue | undefined): string | null {
  if (typeof value === 'string') {
    const text = normalizeText(value);
    return text === '' ? null : text;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

export function readNumber(value: AttributeValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readBoolean(value: AttributeValue | undefined): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (value === 1) return true;
    if (value === 0) return false;
    return null;
  }
  if (typeof value === 'string') {
    switch (normalizeText(value)) {
      case 'true':
      case 'yes':
      case '1':
        return true;
      case 'false':
      case 'no':
      case '0':
        return false;
    }
  }
  return null;
}

export function readMonth(value: AttributeValue | undefined): Month | null {
  const numeric = readNumber(value);
  if (numeric !== null) {
    return isMonth(numeric) ? numeric : null;
  }
  const text = readText(value);
  if (text === null) return null;

  const index = MONTH_NAMES.findIndex(name => name === text || (text.length >= 3 && name.startsWith(text)));
  const month = index + 1;
  return isMonth(month) ? month : null;
}

/**
 * Price bands resolve to their representative value; bare numbers are EUR.
 */
export function readPrice(value: AttributeValue | undefined): number | null {
  const numeric = readNumber(value);
  if (numeric !== null) {
    return numeric > 0 ? numeric : null;
  }
  const text = readText(value);
  if (text !== null && isPriceBand(text)) {
    return PRICE_BAND_VALUES[text];
  }
  return null;
}

export function readList(value: AttributeValue | undefined): string[] | null {
  const items = Array.isArray(value)
    ? value
    : typeof value === 'string'
      ? value.split(',')
      : null;
  if (items === null) return null;

  const normalized = items.map(normalizeText).filter(item => item !== '');
  return normalized.length > 0 ? normalized : null;
}

// ---------------------------------------------------------------------------
// Query constraint parsing
// ---------------------------------------------------------------------------

function isEmpty(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    (typeof value === 'string' && value.trim() === '') ||
    (Array.isArray(value) && value.length === 0)
  );
}

function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (isEmpty(value) ? undefined : value), schema.optional());
}

const textValue = z.string().trim().min(1);

const priceBandValue = z
  .string()
  .transform(normalizeText)
  .pipe(z.enum(PRICE_BANDS));

const seasonValue = z
  .string()
  .transform(value => normalizeText(value).replace(/[\s-]+/g, '_'))
  .pipe(z.enum(SEASONS));

const monthValue = z
  .union([z.number(), z.string()])
  .transform((value, ctx): Month => {
    const month = readMonth(value);
    if (month === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown travel month: ${value}` });
      return z.NEVER;
    }
    return month;
  });

const booleanValue = z.union([z.boolean(), z.string(), z.number()]).transform((value, ctx): boolean => {
  const parsed = readBoolean(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got ${value}` });
    return z.NEVER;
  }
  return parsed;
});

// Only numbers and numeric strings; booleans would otherwise coerce to 1
const numericValue = z.union([z.number(), z.string()]).pipe(z.coerce.number());

const listValue = z
  .union([z.array(z.string()), z.string()])
  .transform(value => readList(value) ?? [])
  .pipe(z.array(z.string()).min(1));

export const ConstraintSetSchema = z.object({
  destination: optional(textValue),
  category: optional(textValue),
  price_range: optional(priceBandValue),
  price_max: optional(numericValue.pipe(z.number().positive())),
  travel_month: optional(monthValue),
  season: optional(seasonValue),
  duration_days: optional(numericValue.pipe(z.number().int().positive())),
  family_friendly: optional(booleanValue),
  transport_type: optional(textValue),
  amenities: optional(listValue),
  subcategory: optional(textValue),
});

/**
 * Validate a raw constraint mapping. Empty values are dropped, keys outside
 * the vocabulary are ignored, malformed values throw a ZodError.
 */
export function parseConstraints(raw: unknown): ConstraintSet {
  const input = raw ?? {};

  if (typeof input === 'object' && !Array.isArray(input)) {
    const known: readonly string[] = CONSTRAINT_NAMES;
    const ignored = Object.keys(input).filter(key => !known.includes(key));
    if (ignored.length > 0) {
      logger.debug({ ignored }, 'Ignoring constraints outside the vocabulary');
    }
  }

  const parsed = ConstraintSetSchema.parse(input);

  // Drop the keys zod left as undefined so "present" means "has a value"
  const constraints: ConstraintSet = {};
  for (const name of CONSTRAINT_NAMES) {
    copyConstraint(parsed, constraints, name);
  }
  return constraints;
}

function copyConstraint<K extends ConstraintName>(from: ConstraintSet, to: ConstraintSet, name: K): void {
  const value = from[name];
  if (value !== undefined) {
    to[name] = value;
  }
}

export function constraintCount(constraints: ConstraintSet): number {
  return CONSTRAINT_NAMES.filter(name => constraints[name] !== undefined).length;
}
