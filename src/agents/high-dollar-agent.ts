/**
 * High-Dollar Claim Agent
 *
 * Looks only at high-dollar claims and scores each pharmacy on four additive
 * factors: claim count, total cost, average cost and cash share. Pharmacies
 * without a high-dollar claim are not reported.
 */

import { BaseScoringAgent, type ClaimRecord, type Finding } from "./base-agent.ts";
import { countWhere, mean, percentOf, round2 } from "../lib/math-utils.ts";
import { CASH_COVERAGE_TYPES } from "../config/constants.ts";

interface Tier {
  min: number;
  points: number;
}

const COUNT_TIERS: Tier[] = [
  { min: 10, points: 0.25 },
  { min: 5, points: 0.15 },
  { min: 2, points: 0.1 },
];

const TOTAL_COST_TIERS: Tier[] = [
  { min: 10000, points: 0.25 },
  { min: 5000, points: 0.15 },
  { min: 2000, points: 0.1 },
];

const AVG_COST_TIERS: Tier[] = [
  { min: 1000, points: 0.25 },
  { min: 500, points: 0.15 },
  { min: 300, points: 0.1 },
];

const CASH_PERCENT_TIERS: Tier[] = [
  { min: 80, points: 0.25 },
  { min: 60, points: 0.15 },
  { min: 40, points: 0.1 },
];

function tierPoints(value: number, tiers: Tier[]): number {
  return tiers.find((t) => value >= t.min)?.points ?? 0;
}

export function isHighDollarClaim(claim: ClaimRecord): boolean {
  return (
    (claim.copayCost ?? 0) > 200 ||
    (claim.oopCost ?? 0) > 500 ||
    (claim.copayFeeCost ?? 0) > 200 ||
    (claim.originalCost ?? 0) > 1000
  );
}

export function highDollarReason(score: number): string {
  if (score >= 0.9) {
    return "CRITICAL: Multiple high-risk factors - high volume, high cost, high cash percentage";
  }
  if (score >= 0.8) return "HIGH_RISK: High-dollar claims with suspicious patterns";
  if (score >= 0.6) return "MEDIUM_HIGH: Elevated high-dollar claim activity";
  if (score >= 0.4) return "MEDIUM: Moderate high-dollar claim patterns";
  if (score >= 0.2) return "LOW_MEDIUM: Some high-dollar claims detected";
  return "LOW: Minimal high-dollar claim activity";
}

export class HighDollarAgent extends BaseScoringAgent {
  readonly name = "high_dollar_agent";
  readonly description =
    "Volume, cost and cash share of high-dollar claims per pharmacy";

  run(dataset: readonly ClaimRecord[]): Finding[] {
    const highDollarClaims = dataset.filter(isHighDollarClaim);
    if (highDollarClaims.length === 0) {
      console.log(`[${this.name}] No high-dollar claims found`);
      return [];
    }

    const findings: Finding[] = [];

    for (const [pharmacyNumber, claims] of this.groupByPharmacy(highDollarClaims)) {
      const costs = claims.map((c) => c.originalCost ?? 0);
      const totalCost = costs.reduce((sum, cost) => sum + cost, 0);
      const avgCost = mean(costs);
      const cashCount = countWhere(claims, (c) =>
        CASH_COVERAGE_TYPES.includes(c.coverageType ?? ""),
      );
      const cashPercent = percentOf(cashCount, claims.length);

      const score = Math.min(
        tierPoints(claims.length, COUNT_TIERS) +
          tierPoints(totalCost, TOTAL_COST_TIERS) +
          tierPoints(avgCost, AVG_COST_TIERS) +
          tierPoints(cashPercent, CASH_PERCENT_TIERS),
        1,
      );

      findings.push(
        this.finding(pharmacyNumber, score, highDollarReason(score), {
          ...this.pharmacyDetails(claims),
          totalHighDollarClaims: claims.length,
          totalCost: round2(totalCost),
          avgClaimCost: round2(avgCost),
          cashNotCoveredCount: cashCount,
          cashPercentage: round2(cashPercent),
          analysisType: "high_dollar_claims",
        }),
      );
    }

    this.logSummary(findings, "pharmacies");
    return this.sortFindings(findings);
  }
}

export const highDollarAgent = new HighDollarAgent();
