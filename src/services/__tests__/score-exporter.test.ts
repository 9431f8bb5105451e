import { describe, it, expect } from "vitest";
import type { AggregatedScore } from "../aggregation-engine.ts";
import {
  SCORE_COLUMNS,
  exportScores,
  exportScoresAsCSV,
  toScoreRecord,
} from "../score-exporter.ts";

function makeScore(overrides: Partial<AggregatedScore>): AggregatedScore {
  return {
    entityId: "P1",
    rank: 1,
    weightedScore: 0.5,
    consistencyScore: 0.5,
    outlierScore: 0.5,
    finalScore: 0.5,
    riskLevel: "LOW",
    contributingUnits: ["coverage_agent"],
    explanation: "No significant fraud indicators detected",
    unitScores: { coverage_agent: 0.5 },
    unitReasons: { coverage_agent: "MEDIUM: >50% flagged claims" },
    transactionCount: 3,
    entityName: "Main St Rx",
    entityCity: "Dayton",
    entityState: "OH",
    ...overrides,
  };
}

describe("score exporter", () => {
  it("maps scores to snake_case records", () => {
    const record = toScoreRecord(makeScore({ contributingUnits: ["a", "b"] }));
    expect(Object.keys(record)).toEqual([...SCORE_COLUMNS]);
    expect(record).toMatchObject({
      entity_id: "P1",
      entity_name: "Main St Rx",
      contributing_units: ["a", "b"],
      transaction_count: 3,
    });
  });

  it("filters by risk level", () => {
    const scores = [
      makeScore({ entityId: "P1", riskLevel: "HIGH" }),
      makeScore({ entityId: "P2", riskLevel: "LOW" }),
    ];
    expect(exportScores(scores, { riskLevel: "HIGH" }).map((r) => r.entity_id)).toEqual(["P1"]);
    expect(exportScores(scores)).toHaveLength(2);
  });

  it("writes the header even without rows", () => {
    expect(exportScoresAsCSV([])).toBe(SCORE_COLUMNS.join(","));
  });

  it("joins units and quotes cells with separators", () => {
    const csv = exportScoresAsCSV([
      toScoreRecord(
        makeScore({
          contributingUnits: ["a", "b"],
          entityName: 'Bob\'s "Best", Rx',
          explanation: "HIGH RISK from 2 agents: x, y",
        }),
      ),
    ]);

    expect(csv.split("\n")[1]).toBe(
      '1,P1,"Bob\'s ""Best"", Rx",Dayton,OH,0.5,0.5,0.5,0.5,LOW,a;b,3,"HIGH RISK from 2 agents: x, y"',
    );
  });

  it("quotes cells containing a carriage return", () => {
    const csv = exportScoresAsCSV([toScoreRecord(makeScore({ explanation: "line one\rline two" }))]);
    expect(csv.endsWith(',3,"line one\rline two"')).toBe(true);
  });
});
