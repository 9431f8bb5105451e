/**
 * Cross-Agent Signal Metrics
 *
 * The corrective terms of the final score:
 * - consistency: do the agents that scored a pharmacy agree?
 * - outlier: where does the pharmacy's average score sit in the run's
 *   whole score population (sigmoid of its z-score)?
 * and the step function from final score to risk level.
 */

import {
  CONSISTENCY_SCORES,
  FINAL_SCORE_BLEND,
  HIGH_SIGNAL_THRESHOLD,
  LOW_SIGNAL_THRESHOLD,
  NEUTRAL_OUTLIER_SCORE,
  OUTLIER_SCORE_BOUNDS,
  RISK_LEVEL_BOUNDS,
  type RiskLevel,
} from "../config/constants.ts";
import { clamp, mean, sigmoid, stddev } from "../lib/math-utils.ts";

export interface ScorePopulation {
  mean: number;
  std: number;
  count: number;
}

/**
 * Categorize the scores the reporting agents gave one pharmacy.
 * Always one of 0.1, 0.3, 0.5, 0.9.
 */
export function consistencyScore(scores: readonly number[]): number {
  if (scores.length < 2) return CONSISTENCY_SCORES.neutral;

  const hasHigh = scores.some((s) => s >= HIGH_SIGNAL_THRESHOLD);
  const hasLow = scores.some((s) => s < LOW_SIGNAL_THRESHOLD);

  if (hasHigh && hasLow) return CONSISTENCY_SCORES.conflicting;
  if (hasHigh) return CONSISTENCY_SCORES.convergingHigh;
  if (hasLow) return CONSISTENCY_SCORES.convergingLow;
  return CONSISTENCY_SCORES.neutral;
}

/** Mean and population standard deviation of every score in the run */
export function scorePopulation(scores: readonly number[]): ScorePopulation {
  return { mean: mean(scores), std: stddev(scores), count: scores.length };
}

/**
 * Sigmoid of the pharmacy's z-score against the run population. Near 1 means
 * the agents scored this pharmacy well above average. 0.5 when the
 * population has no spread. Never exactly 0 or 1, however extreme the z-score.
 */
export function outlierScore(
  entityScores: readonly number[],
  population: ScorePopulation,
): number {
  if (population.count === 0 || population.std === 0 || entityScores.length === 0) {
    return NEUTRAL_OUTLIER_SCORE;
  }
  const z = (mean(entityScores) - population.mean) / population.std;
  return clamp(sigmoid(z), OUTLIER_SCORE_BOUNDS.min, OUTLIER_SCORE_BOUNDS.max);
}

export function finalScore(weighted: number, consistency: number, outlier: number): number {
  return (
    weighted * FINAL_SCORE_BLEND.weighted +
    consistency * FINAL_SCORE_BLEND.consistency +
    outlier * FINAL_SCORE_BLEND.outlier
  );
}

/** Band lower bounds are inclusive: exactly 0.8 is HIGH */
export function riskLevel(score: number): RiskLevel {
  return RISK_LEVEL_BOUNDS.find((band) => score >= band.min)?.level ?? "VERY_LOW";
}
