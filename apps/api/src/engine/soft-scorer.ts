/**
 * Soft Scorer
 *
 * Implements the multiplicative constraint formula:
 * score = base_similarity × Π(1 − weight_i × severity_i)
 *
 * over every constraint except the one already enforced by the store's
 * hard filter. Penalties only ever shrink the score.
 */

import type { FragmentAttributes, HardFilter } from '@travel-search/types';
import { CONSTRAINT_NAMES, ConstraintName, ConstraintSet } from './constraints.js';
import {
  DEFAULT_PENALTY_WEIGHTS,
  PENALTY_RULES,
  PenaltyRegistry,
  PenaltyWeights,
  severityFor,
} from './penalties.js';

export interface PenaltyBreakdown {
  constraint: ConstraintName;
  weight: number;
  severity: number;
  penalty: number;
}

export interface ScoreExplanation {
  baseSimilarity: number;
  penalties: PenaltyBreakdown[];
  score: number;
}

export class SoftScorer {
  private readonly weights: PenaltyWeights;
  private readonly rules: PenaltyRegistry;

  constructor(weights: Partial<PenaltyWeights> = {}, rules: PenaltyRegistry = PENALTY_RULES) {
    this.weights = SoftScorer.validateWeights({ ...DEFAULT_PENALTY_WEIGHTS, ...weights });
    this.rules = rules;
  }

  score(
    baseSimilarity: number,
    attributes: FragmentAttributes,
    constraints: ConstraintSet,
    hardFilter: HardFilter | null
  ): number {
    return this.explain(baseSimilarity, attributes, constraints, hardFilter).score;
  }

  /**
   * Score with the per-constraint penalties that produced it
   */
  explain(
    baseSimilarity: number,
    attributes: FragmentAttributes,
    constraints: ConstraintSet,
    hardFilter: HardFilter | null
  ): ScoreExplanation {
    const base = Math.max(0, Math.min(1, Number.isFinite(baseSimilarity) ? baseSimilarity : 0));
    const penalties: PenaltyBreakdown[] = [];

    const factor = CONSTRAINT_NAMES.reduce((product, name) => {
      if (name === hardFilter?.field) return product;

      const queryValue = constraints[name];
      if (queryValue === undefined) return product;

      const weight = this.weights[name];
      const severity = severityFor(name, queryValue, attributes, this.rules);
      const penalty = weight * severity;
      penalties.push({ constraint: name, weight, severity, penalty });

      return product * (1 - penalty);
    }, 1);

    return {
      baseSimilarity: base,
      penalties,
      score: Math.max(0, base * factor),
    };
  }

  private static validateWeights(weights: PenaltyWeights): PenaltyWeights {
    for (const name of CONSTRAINT_NAMES) {
      const weight = weights[name];
      if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
        throw new RangeError(`Penalty weight for ${name} must be within [0, 1], got ${weight}`);
      }
    }
    return weights;
  }
}
