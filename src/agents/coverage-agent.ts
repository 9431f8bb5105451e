/**
 * Coverage Pattern Agent
 *
 * Flags pharmacies whose claims are dominated by cash / not-covered coverage
 * types or suspicious other-coverage codes. Reports every pharmacy in the
 * dataset, including clean ones (score 0).
 */

import { BaseScoringAgent, type ClaimRecord, type Finding } from "./base-agent.ts";
import { countWhere, percentOf, round2 } from "../lib/math-utils.ts";

const FLAGGED_COVERAGE_TYPES = new Set(["Not Covered", "Cash"]);

/** Other-coverage codes that indicate the claim bypassed primary insurance */
const FLAGGED_OCC_CODES = new Set([0, 1, 3]);

/** Checked top-down; first band whose floor the flagged share exceeds wins */
const COVERAGE_BANDS: ReadonlyArray<{ above: number; score: number; reason: string }> = [
  { above: 90, score: 1.0, reason: "HIGH_RISK: >90% flagged claims" },
  { above: 75, score: 0.8, reason: "MEDIUM_HIGH: >75% flagged claims" },
  { above: 50, score: 0.6, reason: "MEDIUM: >50% flagged claims" },
  { above: 25, score: 0.3, reason: "LOW_MEDIUM: >25% flagged claims" },
  { above: 0, score: 0.1, reason: "LOW: Some flagged claims" },
];

export function isFlaggedCoverageClaim(claim: ClaimRecord): boolean {
  const coverageType = (claim.coverageType ?? "").trim();
  if (FLAGGED_COVERAGE_TYPES.has(coverageType)) return true;
  return claim.occ !== null && claim.occ !== undefined && FLAGGED_OCC_CODES.has(claim.occ);
}

export class CoverageAgent extends BaseScoringAgent {
  readonly name = "coverage_agent";
  readonly description =
    "Share of cash / not-covered claims and suspicious other-coverage codes per pharmacy";

  run(dataset: readonly ClaimRecord[]): Finding[] {
    const findings: Finding[] = [];

    for (const [pharmacyNumber, claims] of this.groupByPharmacy(dataset)) {
      const totalClaims = claims.length;
      const flaggedClaims = countWhere(claims, isFlaggedCoverageClaim);
      const flaggedPercent = percentOf(flaggedClaims, totalClaims);

      const band = COVERAGE_BANDS.find((b) => flaggedPercent > b.above);

      findings.push(
        this.finding(pharmacyNumber, band?.score ?? 0, band?.reason ?? "Normal", {
          ...this.pharmacyDetails(claims),
          totalClaims,
          flaggedClaims,
          flaggedPercent: round2(flaggedPercent),
          analysisType: "coverage_pattern",
        }),
      );
    }

    this.logSummary(findings, "pharmacies");
    return this.sortFindings(findings);
  }
}

export const coverageAgent = new CoverageAgent();
