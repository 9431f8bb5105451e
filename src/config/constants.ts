/**
 * Scoring constants shared by the aggregation engine, the explanation
 * generator and the run insights.
 */

// ---------------------------------------------------------------------------
// Final score blend (sum = 1.00)
// ---------------------------------------------------------------------------

/**
 * Raw evidence dominates; cross-agent agreement and population standing
 * only correct it.
 */
export const FINAL_SCORE_BLEND = {
  weighted: 0.7,
  consistency: 0.2,
  outlier: 0.1,
} as const;

// ---------------------------------------------------------------------------
// Score bands
// ---------------------------------------------------------------------------

/** A single agent score at or above this is a high-risk signal */
export const HIGH_SIGNAL_THRESHOLD = 0.8;

/** A single agent score at or above this (and below HIGH) is a medium-risk signal */
export const MEDIUM_SIGNAL_THRESHOLD = 0.6;

/** A single agent score below this is a low-risk signal */
export const LOW_SIGNAL_THRESHOLD = 0.4;

export const RISK_LEVELS = ["HIGH", "MEDIUM", "LOW", "VERY_LOW"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

/** Lower bounds (inclusive) of each risk band on the final score */
export const RISK_LEVEL_BOUNDS: ReadonlyArray<{ level: RiskLevel; min: number }> = [
  { level: "HIGH", min: 0.8 },
  { level: "MEDIUM", min: 0.6 },
  { level: "LOW", min: 0.4 },
];

// ---------------------------------------------------------------------------
// Consistency categories
// ---------------------------------------------------------------------------

export const CONSISTENCY_SCORES = {
  /** Fewer than two agents reported, or signals are moderate */
  neutral: 0.5,
  /** At least one high and at least one low signal */
  conflicting: 0.3,
  /** High signals without low ones */
  convergingHigh: 0.9,
  /** Low signals without high ones */
  convergingLow: 0.1,
} as const;

/** Outlier score when the run's score population has no spread */
export const NEUTRAL_OUTLIER_SCORE = 0.5;

/**
 * Open-interval bounds of the outlier score. In doubles the sigmoid rounds to
 * exactly 1 above z ≈ 37 and to 0 below z ≈ -745.
 */
export const OUTLIER_SCORE_BOUNDS = {
  min: Number.MIN_VALUE,
  max: 1 - Number.EPSILON / 2,
} as const;

// ---------------------------------------------------------------------------
// Transaction analysis (explanations)
// ---------------------------------------------------------------------------

/** Coverage types counted as cash / uncovered claims */
export const CASH_COVERAGE_TYPES: readonly string[] = ["Cash", "Not Covered"];

/** A claim is high-dollar when either cost exceeds its limit */
export const HIGH_DOLLAR_COPAY_LIMIT = 200;
export const HIGH_DOLLAR_OOP_LIMIT = 500;

export const NO_INDICATORS_MESSAGE = "No significant fraud indicators detected";

// ---------------------------------------------------------------------------
// Run insights
// ---------------------------------------------------------------------------

/** Agents reporting in the same band needed for a "high consistency" entity */
export const HIGH_CONSISTENCY_MIN_AGENTS = 3;

/** Both agents scoring >= HIGH_SIGNAL_THRESHOLD on one entity is a double flag */
export const DOUBLE_FLAG_AGENTS = ["coverage_agent", "patient_flip_agent"] as const;

export const RECOMMENDATION_THRESHOLDS = {
  highRiskEntities: 10,
  mediumRiskEntities: 20,
  conflictingSignals: 5,
  highConsistency: 10,
} as const;
