/**
 * Fraud Explanation Generator
 *
 * Renders one pharmacy's agent scores, agent reasons and raw claims into the
 * audit string stored on its aggregated score, e.g.
 *
 *   HIGH RISK from 2 agents: HIGH_RISK: >90% flagged claims, ... |
 *   Transaction analysis: 62.5% cash/not covered claims, 12.5% high-dollar claims
 */

import type { ClaimRecord } from "../agents/base-agent.ts";
import {
  CASH_COVERAGE_TYPES,
  HIGH_DOLLAR_COPAY_LIMIT,
  HIGH_DOLLAR_OOP_LIMIT,
  HIGH_SIGNAL_THRESHOLD,
  MEDIUM_SIGNAL_THRESHOLD,
  NO_INDICATORS_MESSAGE,
} from "../config/constants.ts";
import { countWhere, percentOf } from "../lib/math-utils.ts";

const CLAUSE_SEPARATOR = " | ";

export function isCashClaim(claim: ClaimRecord): boolean {
  return CASH_COVERAGE_TYPES.includes(claim.coverageType ?? "");
}

export function isHighCostClaim(claim: ClaimRecord): boolean {
  return (
    (claim.copayCost ?? 0) > HIGH_DOLLAR_COPAY_LIMIT ||
    (claim.oopCost ?? 0) > HIGH_DOLLAR_OOP_LIMIT
  );
}

function bucketClause(
  label: string,
  agents: readonly string[],
  reasons: ReadonlyMap<string, string>,
  fallback: string,
): string {
  const listed = agents.map((agent) => reasons.get(agent) ?? fallback);
  return `${label} from ${agents.length} agents: ${listed.join(", ")}`;
}

function transactionClause(transactions: readonly ClaimRecord[]): string | null {
  if (transactions.length === 0) return null;

  const total = transactions.length;
  const cash = countWhere(transactions, isCashClaim);
  const highCost = countWhere(transactions, isHighCostClaim);

  const insights: string[] = [];
  if (cash > 0) {
    insights.push(`${percentOf(cash, total).toFixed(1)}% cash/not covered claims`);
  }
  if (highCost > 0) {
    insights.push(`${percentOf(highCost, total).toFixed(1)}% high-dollar claims`);
  }

  return insights.length > 0 ? `Transaction analysis: ${insights.join(", ")}` : null;
}

/**
 * Build the explanation for one pharmacy. Agents are listed in the iteration
 * order of `scores`.
 */
export function explain(
  scores: ReadonlyMap<string, number>,
  reasons: ReadonlyMap<string, string>,
  transactions: readonly ClaimRecord[],
): string {
  const high: string[] = [];
  const medium: string[] = [];
  for (const [agent, score] of scores) {
    if (score >= HIGH_SIGNAL_THRESHOLD) high.push(agent);
    else if (score >= MEDIUM_SIGNAL_THRESHOLD) medium.push(agent);
  }

  const parts: string[] = [];
  if (high.length > 0) parts.push(bucketClause("HIGH RISK", high, reasons, "High risk"));
  if (medium.length > 0) {
    parts.push(bucketClause("MEDIUM RISK", medium, reasons, "Medium risk"));
  }

  const txClause = transactionClause(transactions);
  if (txClause) parts.push(txClause);

  return parts.length > 0 ? parts.join(CLAUSE_SEPARATOR) : NO_INDICATORS_MESSAGE;
}
