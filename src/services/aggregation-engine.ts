/**
 * Weighted Aggregation Engine
 *
 * Merges every agent's findings into one composite score per pharmacy:
 *
 *   final = 0.7 × weighted + 0.2 × consistency + 0.1 × outlier
 *
 * - weighted: Σ score × weight over the agents that reported the pharmacy.
 *   Not renormalized over the reporting subset, so an agent's silence lowers
 *   the score (no flag counts as no evidence of that risk).
 * - consistency: agreement between the reporting agents (signal-metrics.ts)
 * - outlier: pharmacy's average score against the whole run population
 *
 * Only pharmacies flagged by at least one agent are scored. The result is a
 * pure function of (findings, claims, weights).
 */

import type { ClaimRecord, Finding, FindingsByAgent } from "../agents/base-agent.ts";
import type { RiskLevel } from "../config/constants.ts";
import { groupBy } from "../lib/math-utils.ts";
import type { Weights } from "./weight-vector.ts";
import { explain } from "./explanation.ts";
import {
  consistencyScore,
  finalScore,
  outlierScore,
  riskLevel,
  scorePopulation,
} from "./signal-metrics.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AggregatedScore {
  entityId: string;
  /** 1-based position after sorting by finalScore descending */
  rank: number;
  weightedScore: number;
  consistencyScore: number;
  outlierScore: number;
  finalScore: number;
  riskLevel: RiskLevel;
  /** Agents that reported this pharmacy, in registration order */
  contributingUnits: string[];
  explanation: string;
  unitScores: Record<string, number>;
  unitReasons: Record<string, string>;
  transactionCount: number;
  entityName: string;
  entityCity: string;
  entityState: string;
}

/** Pharmacy id → agent name → that agent's finding */
export type EntityFindingIndex = Map<string, Map<string, Finding>>;

// ---------------------------------------------------------------------------
// Indexing
// ---------------------------------------------------------------------------

/**
 * Index findings by pharmacy once per run. A second finding from the same
 * agent for the same pharmacy only replaces the first when it scores higher.
 */
export function indexFindings(findings: FindingsByAgent): EntityFindingIndex {
  const index: EntityFindingIndex = new Map();

  for (const [agentName, agentFindings] of findings) {
    for (const finding of agentFindings) {
      let byAgent = index.get(finding.entityId);
      if (!byAgent) {
        byAgent = new Map();
        index.set(finding.entityId, byAgent);
      }
      const existing = byAgent.get(agentName);
      if (!existing || finding.score > existing.score) {
        byAgent.set(agentName, finding);
      }
    }
  }

  return index;
}

function detailText(findings: Iterable<Finding>, key: string): string | undefined {
  for (const finding of findings) {
    const value = finding.detail[key];
    if (typeof value === "string" && value !== "" && value !== "Unknown") return value;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

/**
 * Sort by final score (descending, pharmacy id ascending on ties) and assign
 * ranks 1..n. Returns new objects; the input is not modified.
 */
export function rankScores(scores: readonly AggregatedScore[]): AggregatedScore[] {
  return [...scores]
    .sort((a, b) => b.finalScore - a.finalScore || a.entityId.localeCompare(b.entityId))
    .map((score, i) => ({ ...score, rank: i + 1 }));
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

export function aggregate(
  findings: FindingsByAgent,
  dataset: readonly ClaimRecord[],
  weights: Weights,
): AggregatedScore[] {
  const index = indexFindings(findings);
  const claimsByEntity = groupBy(dataset, (claim) => claim.pharmacyNumber);
  const agentOrder = [...findings.keys()];

  const allScores: number[] = [];
  for (const byAgent of index.values()) {
    for (const finding of byAgent.values()) allScores.push(finding.score);
  }
  const population = scorePopulation(allScores);

  const results: AggregatedScore[] = [];

  for (const [entityId, byAgent] of index) {
    const contributing = agentOrder.filter((agent) => byAgent.has(agent));
    if (contributing.length === 0) continue;

    const scores = new Map<string, number>();
    const reasons = new Map<string, string>();
    let weighted = 0;
    for (const agent of contributing) {
      const finding = byAgent.get(agent);
      if (!finding) continue;
      scores.set(agent, finding.score);
      reasons.set(agent, finding.reason);
      weighted += finding.score * (weights[agent] ?? 0);
    }

    const entityScores = [...scores.values()];
    const consistency = consistencyScore(entityScores);
    const outlier = outlierScore(entityScores, population);
    const final = finalScore(weighted, consistency, outlier);
    const transactions = claimsByEntity.get(entityId) ?? [];
    const firstClaim = transactions[0];
    const entityFindings = [...byAgent.values()];

    results.push({
      entityId,
      rank: 0,
      weightedScore: weighted,
      consistencyScore: consistency,
      outlierScore: outlier,
      finalScore: final,
      riskLevel: riskLevel(final),
      contributingUnits: contributing,
      explanation: explain(scores, reasons, transactions),
      unitScores: Object.fromEntries(scores),
      unitReasons: Object.fromEntries(reasons),
      transactionCount: transactions.length,
      entityName:
        detailText(entityFindings, "pharmacyName") ?? firstClaim?.pharmacyName ?? "Unknown",
      entityCity:
        detailText(entityFindings, "pharmacyCity") ?? firstClaim?.pharmacyCity ?? "Unknown",
      entityState:
        detailText(entityFindings, "pharmacyState") ?? firstClaim?.pharmacyState ?? "Unknown",
    });
  }

  return rankScores(results);
}
