import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PENALTY_WEIGHTS,
  PENALTY_RULES,
  PenaltyRegistry,
  monthSeverity,
  numericSeverity,
  priceSeverity,
  severityFor,
} from '../penalties.js';

describe('Penalty weights', () => {
  it('should rank price and timing as the costliest misses', () => {
    expect(DEFAULT_PENALTY_WEIGHTS.price_range).toBe(0.9);
    expect(DEFAULT_PENALTY_WEIGHTS.travel_month).toBe(0.8);
    expect(DEFAULT_PENALTY_WEIGHTS.duration_days).toBe(0.6);
    expect(DEFAULT_PENALTY_WEIGHTS.category).toBe(0.5);
    expect(DEFAULT_PENALTY_WEIGHTS.family_friendly).toBe(0.3);
    expect(DEFAULT_PENALTY_WEIGHTS.transport_type).toBe(0.2);
  });

  it('should default unlisted constraints to 0.1', () => {
    expect(DEFAULT_PENALTY_WEIGHTS.destination).toBe(0.1);
    expect(DEFAULT_PENALTY_WEIGHTS.price_max).toBe(0.1);
    expect(DEFAULT_PENALTY_WEIGHTS.amenities).toBe(0.1);
  });
});

describe('Severity curves', () => {
  it('should grade numeric distance', () => {
    expect(numericSeverity(5, 5)).toBe(0);
    expect(numericSeverity(5, 6)).toBe(0.2);
    expect(numericSeverity(5, 3)).toBe(0.5);
    expect(numericSeverity(5, 9)).toBe(1);
    expect(numericSeverity(5, null)).toBe(1);
  });

  it('should grade relative price difference', () => {
    expect(priceSeverity(350, 350)).toBe(0);
    expect(priceSeverity(400, 370)).toBe(0.2);
    expect(priceSeverity(400, 320)).toBe(0.5);
    expect(priceSeverity(350, 1000)).toBe(1);
    expect(priceSeverity(350, null)).toBe(1);
    expect(priceSeverity(0, 100)).toBe(1);
  });

  it('should grade month distance linearly', () => {
    expect(monthSeverity(8, 8)).toBe(0);
    expect(monthSeverity(8, 9)).toBe(0.3);
    expect(monthSeverity(8, 6)).toBe(0.6);
    expect(monthSeverity(8, 12)).toBe(1);
    // No wrap-around between December and January
    expect(monthSeverity(12, 1)).toBe(1);
  });
});

describe('Penalty rules', () => {
  it('should compare text attributes case-insensitively', () => {
    expect(severityFor('category', 'Museum', { category: 'museum ' })).toBe(0);
    expect(severityFor('category', 'museum', { category: 'beach' })).toBe(1);
  });

  it('should treat a missing attribute as a full mismatch', () => {
    expect(severityFor('duration_days', 5, {})).toBe(1);
    expect(severityFor('transport_type', 'train', {})).toBe(1);
    expect(severityFor('family_friendly', true, { family_friendly: 'unknown' })).toBe(1);
  });

  it('should read month names and numbers on candidates', () => {
    expect(severityFor('travel_month', 8, { travel_month: 'September' })).toBe(0.3);
    expect(severityFor('travel_month', 8, { travel_month: 10 })).toBe(0.6);
  });

  it('should compare price bands by their representative value', () => {
    expect(severityFor('price_range', 'moderate', { price_range: 'moderate' })).toBe(0);
    expect(severityFor('price_range', 'moderate', { price_range: 'luxury' })).toBe(1);
    expect(severityFor('price_range', 'moderate', { price_range: 380 })).toBe(0.2);
  });

  it('should fall back between price_range and price_max', () => {
    expect(severityFor('price_range', 'expensive', { price_max: 600 })).toBe(0);
    expect(severityFor('price_max', 500, { price_range: 'expensive' })).toBe(0.5);
  });

  it('should require every requested amenity', () => {
    expect(severityFor('amenities', ['pool', 'spa'], { amenities: ['Pool', 'Spa', 'Gym'] })).toBe(0);
    expect(severityFor('amenities', ['pool', 'spa'], { amenities: 'pool, gym' })).toBe(1);
    expect(severityFor('amenities', ['pool'], {})).toBe(1);
  });

  it('should clamp severities from custom rules', () => {
    const rules: PenaltyRegistry = { ...PENALTY_RULES, duration_days: () => 3 };
    expect(severityFor('duration_days', 5, {}, rules)).toBe(1);
  });
});
