/**
 * Rejected Claim Density Agent
 *
 * Pharmacies that resubmit after COB or prior-authorization rejections may be
 * gaming adjudication. Scores rejection rate, rejection count and claim
 * volume additively; pharmacies with no rejected claim are not reported.
 */

import { BaseScoringAgent, type ClaimRecord, type Finding } from "./base-agent.ts";
import { countWhere, percentOf, round2 } from "../lib/math-utils.ts";

const REJECTED_STATUS_PATTERN = /reject|denied|failed/i;

function hasCode(value: string | null | undefined): boolean {
  return value !== null && value !== undefined && value !== "";
}

function primaryRejections(claim: ClaimRecord): number {
  return (
    Number(hasCode(claim.claimCobPrimaryRejectCode1)) +
    Number(hasCode(claim.claimCobPrimaryRejectCode2))
  );
}

function paRejections(claim: ClaimRecord): number {
  return Number(hasCode(claim.paRejectionCode1)) + Number(hasCode(claim.paRejectionCode2));
}

function hasRejectedStatus(claim: ClaimRecord): boolean {
  return REJECTED_STATUS_PATTERN.test(claim.latestPaStatusDesc ?? "");
}

export function isRejectedClaim(claim: ClaimRecord): boolean {
  return primaryRejections(claim) > 0 || paRejections(claim) > 0 || hasRejectedStatus(claim);
}

export function rejectionScore(
  totalClaims: number,
  rejectedClaims: number,
  rejectionPercent: number,
): number {
  let score = 0;

  if (rejectionPercent >= 50) score += 0.4;
  else if (rejectionPercent >= 30) score += 0.3;
  else if (rejectionPercent >= 20) score += 0.2;
  else if (rejectionPercent >= 10) score += 0.1;

  if (rejectedClaims >= 20) score += 0.3;
  else if (rejectedClaims >= 10) score += 0.2;
  else if (rejectedClaims >= 5) score += 0.1;

  if (totalClaims >= 50) score += 0.3;
  else if (totalClaims >= 20) score += 0.2;
  else if (totalClaims >= 10) score += 0.1;

  return Math.min(score, 1);
}

function rejectionReason(score: number): string {
  if (score >= 0.9) return "CRITICAL: Extremely high rejection rate with large volume";
  if (score >= 0.8) return "HIGH_RISK: High rejection density indicating potential gaming";
  if (score >= 0.6) return "MEDIUM_HIGH: Elevated rejection patterns";
  if (score >= 0.4) return "MEDIUM: Moderate rejection density";
  if (score >= 0.2) return "LOW_MEDIUM: Some rejection patterns detected";
  return "LOW: Minimal rejection activity";
}

export class RejectionAgent extends BaseScoringAgent {
  readonly name = "rejection_agent";
  readonly description = "Density of COB and prior-authorization rejections per pharmacy";

  run(dataset: readonly ClaimRecord[]): Finding[] {
    const findings: Finding[] = [];

    for (const [pharmacyNumber, claims] of this.groupByPharmacy(dataset)) {
      const rejectedClaims = countWhere(claims, isRejectedClaim);
      if (rejectedClaims === 0) continue;

      const totalClaims = claims.length;
      const rejectionPercent = percentOf(rejectedClaims, totalClaims);
      const score = rejectionScore(totalClaims, rejectedClaims, rejectionPercent);

      const primary = claims.reduce((sum, c) => sum + primaryRejections(c), 0);
      const pa = claims.reduce((sum, c) => sum + paRejections(c), 0);
      const status = countWhere(claims, hasRejectedStatus);

      findings.push(
        this.finding(pharmacyNumber, score, rejectionReason(score), {
          ...this.pharmacyDetails(claims),
          totalClaims,
          rejectedClaims,
          rejectionPercentage: round2(rejectionPercent),
          primaryRejections: primary,
          paRejections: pa,
          statusRejections: status,
          totalRejectionTypes: primary + pa + status,
          analysisType: "rejection_density",
        }),
      );
    }

    this.logSummary(findings, "pharmacies");
    return this.sortFindings(findings);
  }
}

export const rejectionAgent = new RejectionAgent();
