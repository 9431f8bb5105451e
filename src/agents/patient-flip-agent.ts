/**
 * Patient Flip Agent
 *
 * Detects insurance-to-cash "flips": the same patient fills the same product
 * at the same pharmacy first through insurance, then later as cash or
 * not-covered, typically after the insured claim was rejected.
 *
 * Patterns are found per (patient, product, pharmacy); each pharmacy is
 * reported once, with its highest-scoring pattern.
 */

import { BaseScoringAgent, type ClaimRecord, type Finding } from "./base-agent.ts";
import { groupBy } from "../lib/math-utils.ts";

const INSURED_COVERAGE_TYPES = new Set(["Well Covered", "Covered - HD"]);
const CASH_COVERAGE_TYPES = new Set(["Cash", "Not Covered"]);

/** A copay this high on an insured claim usually means it was not adjudicated */
const REJECTION_COPAY_LIMIT = 100;

export interface FlipPattern {
  patientId: string;
  productNdc: string;
  productName: string;
  pharmacyNumber: string;
  numberOfFlips: number;
  totalClaims: number;
  score: number;
  reason: string;
}

function coverageOf(claim: ClaimRecord): string {
  return (claim.coverageType ?? "").trim();
}

function submittedAt(claim: ClaimRecord): string {
  return claim.dateSubmitted ?? "";
}

function hasRejectionSignal(claim: ClaimRecord): boolean {
  const statusDesc = (claim.latestPaStatusDesc ?? "").toLowerCase();
  return Boolean(
    claim.paRejectionCode1 ||
      claim.paRejectionCode2 ||
      claim.latestPaStatusCode ||
      statusDesc.includes("reject") ||
      statusDesc.includes("denied") ||
      claim.claimCobPrimaryRejectCode1 ||
      claim.claimCobPrimaryRejectCode2 ||
      (claim.copayCost ?? 0) > REJECTION_COPAY_LIMIT,
  );
}

function flipRatioBand(ratio: number): { score: number; reason: string } {
  if (ratio > 0.8) return { score: 1.0, reason: "HIGH_RISK: >80% claims are cash flips" };
  if (ratio > 0.6) return { score: 0.8, reason: "MEDIUM_HIGH: >60% claims are cash flips" };
  if (ratio > 0.4) return { score: 0.6, reason: "MEDIUM: >40% claims are cash flips" };
  if (ratio > 0.2) return { score: 0.4, reason: "LOW_MEDIUM: >20% claims are cash flips" };
  return { score: 0.2, reason: "LOW: Some cash flips detected" };
}

/**
 * Analyze one patient/product/pharmacy claim history. Returns null when no
 * insurance-to-cash transition happened.
 */
export function analyzeFlipPattern(claims: readonly ClaimRecord[]): FlipPattern | null {
  if (claims.length < 2) return null;

  const sorted = [...claims].sort((a, b) => submittedAt(a).localeCompare(submittedAt(b)));
  const insured = sorted.filter((c) => INSURED_COVERAGE_TYPES.has(coverageOf(c)));
  const cash = sorted.filter((c) => CASH_COVERAGE_TYPES.has(coverageOf(c)));

  if (insured.length === 0 || cash.length === 0) return null;

  // sorted ascending, so the first of each subset is the earliest
  if (submittedAt(cash[0]) <= submittedAt(insured[0])) return null;

  const first = sorted[0];
  const base = {
    patientId: first.patientId ?? "",
    productNdc: first.productNdc ?? "",
    productName: first.productName ?? "Unknown",
    pharmacyNumber: first.pharmacyNumber,
    numberOfFlips: cash.length,
    totalClaims: sorted.length,
  };

  if (!insured.some(hasRejectionSignal)) {
    return {
      ...base,
      score: 0.3,
      reason: "SUSPICIOUS: Insurance-to-cash pattern without rejection indicators",
    };
  }

  return { ...base, ...flipRatioBand(cash.length / sorted.length) };
}

export class PatientFlipAgent extends BaseScoringAgent {
  readonly name = "patient_flip_agent";
  readonly description =
    "Insurance-to-cash flips per patient and product, rolled up per pharmacy";

  run(dataset: readonly ClaimRecord[]): Finding[] {
    const relevant = dataset.filter((c) => {
      const coverage = coverageOf(c);
      return INSURED_COVERAGE_TYPES.has(coverage) || CASH_COVERAGE_TYPES.has(coverage);
    });
    if (relevant.length === 0) {
      console.log(`[${this.name}] No relevant coverage types found`);
      return [];
    }

    const groups = groupBy(
      relevant,
      (c) => `${c.patientId ?? ""}\u0000${c.productNdc ?? ""}\u0000${c.pharmacyNumber}`,
    );

    const patternsByPharmacy = new Map<string, FlipPattern[]>();
    for (const claims of groups.values()) {
      const pattern = analyzeFlipPattern(claims);
      if (!pattern) continue;
      const list = patternsByPharmacy.get(pattern.pharmacyNumber) ?? [];
      list.push(pattern);
      patternsByPharmacy.set(pattern.pharmacyNumber, list);
    }

    const claimsByPharmacy = this.groupByPharmacy(relevant);
    const findings: Finding[] = [];

    for (const [pharmacyNumber, patterns] of patternsByPharmacy) {
      const top = patterns.reduce((best, p) => (p.score > best.score ? p : best));
      findings.push(
        this.finding(pharmacyNumber, top.score, top.reason, {
          ...this.pharmacyDetails(claimsByPharmacy.get(pharmacyNumber) ?? []),
          patientId: top.patientId,
          productNdc: top.productNdc,
          productName: top.productName,
          numberOfFlips: top.numberOfFlips,
          totalClaims: top.totalClaims,
          patternsDetected: patterns.length,
          totalFlips: patterns.reduce((sum, p) => sum + p.numberOfFlips, 0),
          analysisType: "flip_pattern",
        }),
      );
    }

    this.logSummary(findings, "pharmacies");
    return this.sortFindings(findings);
  }
}

export const patientFlipAgent = new PatientFlipAgent();
