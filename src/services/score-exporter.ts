/**
 * Score Exporter
 *
 * Flattens aggregated scores into column-stable records for downstream
 * review: JSON records with snake_case keys, or CSV with the same columns
 * in the same order.
 */

import type { RiskLevel } from "../config/constants.ts";
import type { AggregatedScore } from "./aggregation-engine.ts";

export interface ScoreRecord {
  rank: number;
  entity_id: string;
  entity_name: string;
  entity_city: string;
  entity_state: string;
  weighted_score: number;
  consistency_score: number;
  outlier_score: number;
  final_score: number;
  risk_level: RiskLevel;
  contributing_units: string[];
  transaction_count: number;
  explanation: string;
}

export const SCORE_COLUMNS = [
  "rank",
  "entity_id",
  "entity_name",
  "entity_city",
  "entity_state",
  "weighted_score",
  "consistency_score",
  "outlier_score",
  "final_score",
  "risk_level",
  "contributing_units",
  "transaction_count",
  "explanation",
] as const satisfies readonly (keyof ScoreRecord)[];

/** Separator of the agent names in the CSV `contributing_units` column */
const UNIT_SEPARATOR = ";";

export function toScoreRecord(score: AggregatedScore): ScoreRecord {
  return {
    rank: score.rank,
    entity_id: score.entityId,
    entity_name: score.entityName,
    entity_city: score.entityCity,
    entity_state: score.entityState,
    weighted_score: score.weightedScore,
    consistency_score: score.consistencyScore,
    outlier_score: score.outlierScore,
    final_score: score.finalScore,
    risk_level: score.riskLevel,
    contributing_units: [...score.contributingUnits],
    transaction_count: score.transactionCount,
    explanation: score.explanation,
  };
}

export function exportScores(
  scores: readonly AggregatedScore[],
  options?: { riskLevel?: RiskLevel },
): ScoreRecord[] {
  const riskLevel = options?.riskLevel;
  return scores
    .filter((s) => riskLevel === undefined || s.riskLevel === riskLevel)
    .map(toScoreRecord);
}

function csvCell(value: string | number | string[]): string {
  const s = Array.isArray(value) ? value.join(UNIT_SEPARATOR) : String(value);
  return s.includes(",") || s.includes('"') || s.includes("\n") || s.includes("\r")
    ? `"${s.replace(/"/g, '""')}"` : s;
}

/**
 * Export records as CSV. The header row is always present.
 */
export function exportScoresAsCSV(records: readonly ScoreRecord[]): string {
  const csvRows = [SCORE_COLUMNS.join(",")];
  for (const record of records) {
    csvRows.push(SCORE_COLUMNS.map((column) => csvCell(record[column])).join(","));
  }
  return csvRows.join("\n");
}
