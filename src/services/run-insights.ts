/**
 * Run Insights
 *
 * Run-level summary computed when a scoring run is finalized: risk level
 * distribution, per-agent performance, cross-agent patterns and review
 * recommendations.
 */

import type { FindingsByAgent } from "../agents/base-agent.ts";
import {
  DOUBLE_FLAG_AGENTS,
  HIGH_CONSISTENCY_MIN_AGENTS,
  HIGH_SIGNAL_THRESHOLD,
  LOW_SIGNAL_THRESHOLD,
  RECOMMENDATION_THRESHOLDS,
  RISK_LEVELS,
  type RiskLevel,
} from "../config/constants.ts";
import { countWhere, mean, round3 } from "../lib/math-utils.ts";
import type { AggregatedScore } from "./aggregation-engine.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AgentPerformance {
  avgScore: number;
  highRiskFindings: number;
  totalFindings: number;
}

export interface CrossAgentPatterns {
  /** Pharmacies with at least one high and at least one low agent score */
  conflictingSignals: number;
  /** Pharmacies where 3+ agents agree on high, or 3+ agree on low */
  highConsistency: number;
  /** Pharmacies flagged high by both the coverage and the patient flip agent */
  doubleFlag: number;
}

export interface RunInsights {
  totalEntities: number;
  riskLevelCounts: Record<RiskLevel, number>;
  agentPerformance: Record<string, AgentPerformance>;
  crossAgentPatterns: CrossAgentPatterns;
  recommendations: string[];
}

export const RECOMMENDATIONS = {
  manyHighRisk: "High number of high-risk pharmacies detected - consider manual review",
  manyMediumRisk: "Many medium-risk pharmacies - consider adjusting thresholds",
  conflictingSignals: "Multiple conflicting signals detected - review agent weights",
  highConsistency: "High agent agreement detected - consider increasing confidence threshold",
} as const;

// ---------------------------------------------------------------------------
// Computation
// ---------------------------------------------------------------------------

function emptyRiskLevelCounts(): Record<RiskLevel, number> {
  return { HIGH: 0, MEDIUM: 0, LOW: 0, VERY_LOW: 0 };
}

export function emptyInsights(): RunInsights {
  return {
    totalEntities: 0,
    riskLevelCounts: emptyRiskLevelCounts(),
    agentPerformance: {},
    crossAgentPatterns: { conflictingSignals: 0, highConsistency: 0, doubleFlag: 0 },
    recommendations: [],
  };
}

export function analyzeCrossAgentPatterns(
  scores: readonly AggregatedScore[],
): CrossAgentPatterns {
  const patterns: CrossAgentPatterns = {
    conflictingSignals: 0,
    highConsistency: 0,
    doubleFlag: 0,
  };

  for (const score of scores) {
    const entries = Object.entries(score.unitScores);
    const high = entries.filter(([, s]) => s >= HIGH_SIGNAL_THRESHOLD).map(([name]) => name);
    const lowCount = countWhere(entries, ([, s]) => s < LOW_SIGNAL_THRESHOLD);

    if (high.length > 0 && lowCount > 0) patterns.conflictingSignals++;
    if (high.length >= HIGH_CONSISTENCY_MIN_AGENTS || lowCount >= HIGH_CONSISTENCY_MIN_AGENTS) {
      patterns.highConsistency++;
    }
    if (DOUBLE_FLAG_AGENTS.every((agent) => high.includes(agent))) patterns.doubleFlag++;
  }

  return patterns;
}

/**
 * Performance of every registered agent. An agent that failed or found
 * nothing appears with zero findings.
 */
export function agentPerformance(
  agentNames: readonly string[],
  findings: FindingsByAgent,
): Record<string, AgentPerformance> {
  const performance: Record<string, AgentPerformance> = {};
  for (const agentName of agentNames) {
    const agentFindings = findings.get(agentName) ?? [];
    const agentScores = agentFindings.map((f) => f.score);
    performance[agentName] = {
      avgScore: round3(mean(agentScores)),
      highRiskFindings: countWhere(agentScores, (s) => s >= HIGH_SIGNAL_THRESHOLD),
      totalFindings: agentFindings.length,
    };
  }
  return performance;
}

export function computeInsights(
  scores: readonly AggregatedScore[],
  findings: FindingsByAgent,
  agentNames: readonly string[] = [...findings.keys()],
): RunInsights {
  const riskLevelCounts = emptyRiskLevelCounts();
  for (const level of RISK_LEVELS) {
    riskLevelCounts[level] = countWhere(scores, (s) => s.riskLevel === level);
  }

  const crossAgentPatterns = analyzeCrossAgentPatterns(scores);

  const recommendations: string[] = [];
  if (riskLevelCounts.HIGH > RECOMMENDATION_THRESHOLDS.highRiskEntities) {
    recommendations.push(RECOMMENDATIONS.manyHighRisk);
  }
  if (riskLevelCounts.MEDIUM > RECOMMENDATION_THRESHOLDS.mediumRiskEntities) {
    recommendations.push(RECOMMENDATIONS.manyMediumRisk);
  }
  if (crossAgentPatterns.conflictingSignals > RECOMMENDATION_THRESHOLDS.conflictingSignals) {
    recommendations.push(RECOMMENDATIONS.conflictingSignals);
  }
  if (crossAgentPatterns.highConsistency > RECOMMENDATION_THRESHOLDS.highConsistency) {
    recommendations.push(RECOMMENDATIONS.highConsistency);
  }

  return {
    totalEntities: scores.length,
    riskLevelCounts,
    agentPerformance: agentPerformance(agentNames, findings),
    crossAgentPatterns,
    recommendations,
  };
}
