/**
 * Base Agent Types & Abstract Class
 *
 * Defines the contract every scoring agent satisfies: given the full claim
 * dataset, produce zero or more findings, each naming one pharmacy, a score
 * in [0, 1] and a free-text reason. Agents that refine their output with the
 * findings of their peers implement the combination-dependent variant.
 */

import type { z } from "zod";
import type { claimRecordSchema, findingSchema } from "../schemas/scoring.ts";
import { clamp, groupBy, round3 } from "../lib/math-utils.ts";

// ---------------------------------------------------------------------------
// Core Types
// ---------------------------------------------------------------------------

/** One observed pharmacy claim. Shared read-only by every agent in a run. */
export type ClaimRecord = z.infer<typeof claimRecordSchema>;

/** One agent's scored opinion about one pharmacy */
export type Finding = z.infer<typeof findingSchema>;

export type FindingDetail = Finding["detail"];

/** Agent name → that agent's findings for the run */
export type FindingsByAgent = Map<string, readonly Finding[]>;

export interface ScoringAgent {
  /** Stable identifier, also the key into the weight vector */
  readonly name: string;
  readonly description: string;
  run(dataset: readonly ClaimRecord[]): Finding[] | Promise<Finding[]>;
}

/**
 * An agent whose score depends on what the other agents found. It runs after
 * the independent agents, with their combined findings as auxiliary input.
 */
export interface CombinationDependentAgent extends ScoringAgent {
  runWithPeers(
    dataset: readonly ClaimRecord[],
    peerFindings: readonly Finding[],
  ): Finding[] | Promise<Finding[]>;
}

export function isCombinationDependent(
  agent: ScoringAgent,
): agent is CombinationDependentAgent {
  return "runWithPeers" in agent && typeof agent.runWithPeers === "function";
}

/** Name/location columns carried into every finding's detail */
export interface PharmacyDetails {
  pharmacyName: string;
  pharmacyCity: string;
  pharmacyState: string;
}

// ---------------------------------------------------------------------------
// Abstract Base Class
// ---------------------------------------------------------------------------

const UNKNOWN = "Unknown";

/**
 * Shared plumbing for the built-in agents: per-pharmacy grouping, pharmacy
 * details and finding construction. Subclasses only supply the rule set.
 */
export abstract class BaseScoringAgent implements ScoringAgent {
  abstract readonly name: string;
  abstract readonly description: string;

  abstract run(dataset: readonly ClaimRecord[]): Finding[] | Promise<Finding[]>;

  protected groupByPharmacy(
    dataset: readonly ClaimRecord[],
  ): Map<string, ClaimRecord[]> {
    return groupBy(dataset, (claim) => claim.pharmacyNumber);
  }

  protected pharmacyDetails(claims: readonly ClaimRecord[]): PharmacyDetails {
    const first = claims[0];
    return {
      pharmacyName: first?.pharmacyName ?? UNKNOWN,
      pharmacyCity: first?.pharmacyCity ?? UNKNOWN,
      pharmacyState: first?.pharmacyState ?? UNKNOWN,
    };
  }

  protected finding(
    entityId: string,
    score: number,
    reason: string,
    detail: FindingDetail,
  ): Finding {
    return {
      entityId,
      score: round3(clamp(score, 0, 1)),
      reason,
      sourceUnit: this.name,
      detail,
    };
  }

  /** Highest-scoring findings first, pharmacy number breaking ties */
  protected sortFindings(findings: Finding[]): Finding[] {
    return findings.sort(
      (a, b) => b.score - a.score || a.entityId.localeCompare(b.entityId),
    );
  }

  protected logSummary(findings: readonly Finding[], scope: string): void {
    const high = findings.filter((f) => f.score >= 0.8).length;
    const medium = findings.filter((f) => f.score >= 0.6 && f.score < 0.8).length;
    console.log(
      `[${this.name}] ${findings.length} ${scope} flagged (${high} high, ${medium} medium)`,
    );
  }
}
