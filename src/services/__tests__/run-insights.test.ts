import { describe, it, expect } from "vitest";
import {
  RECOMMENDATIONS,
  agentPerformance,
  analyzeCrossAgentPatterns,
  computeInsights,
  emptyInsights,
} from "../run-insights.ts";
import type { AggregatedScore } from "../aggregation-engine.ts";
import type { Finding } from "../../agents/base-agent.ts";
import type { RiskLevel } from "../../config/constants.ts";

function makeScore(
  entityId: string,
  unitScores: Record<string, number>,
  riskLevel: RiskLevel = "LOW",
): AggregatedScore {
  return {
    entityId,
    rank: 0,
    weightedScore: 0,
    consistencyScore: 0.5,
    outlierScore: 0.5,
    finalScore: 0,
    riskLevel,
    contributingUnits: Object.keys(unitScores),
    explanation: "",
    unitScores,
    unitReasons: {},
    transactionCount: 0,
    entityName: "Unknown",
    entityCity: "Unknown",
    entityState: "Unknown",
  };
}

function makeFinding(entityId: string, sourceUnit: string, score: number): Finding {
  return { entityId, sourceUnit, score, reason: "flagged", detail: {} };
}

function repeat(count: number, make: (i: number) => AggregatedScore): AggregatedScore[] {
  return Array.from({ length: count }, (_, i) => make(i));
}

describe("analyzeCrossAgentPatterns", () => {
  it("counts conflicting, highly consistent and double-flagged pharmacies", () => {
    const patterns = analyzeCrossAgentPatterns([
      makeScore("P1", { coverage_agent: 0.9, patient_flip_agent: 0.85, rejection_agent: 0.1 }),
      makeScore("P2", { a: 0.9, b: 0.8, c: 0.95 }),
      makeScore("P3", { a: 0.1, b: 0.2, c: 0.3 }),
      makeScore("P4", { coverage_agent: 0.9 }),
      makeScore("P5", { coverage_agent: 0.79, patient_flip_agent: 0.9 }),
    ]);

    expect(patterns).toEqual({ conflictingSignals: 1, highConsistency: 2, doubleFlag: 1 });
  });
});

describe("agentPerformance", () => {
  it("reports every registered agent, including ones without findings", () => {
    const findings = new Map([
      ["a", [makeFinding("P1", "a", 0.9), makeFinding("P2", "a", 0.5), makeFinding("P3", "a", 0.2)]],
    ]);

    expect(agentPerformance(["a", "failed"], findings)).toEqual({
      a: { avgScore: 0.533, highRiskFindings: 1, totalFindings: 3 },
      failed: { avgScore: 0, highRiskFindings: 0, totalFindings: 0 },
    });
  });
});

describe("computeInsights", () => {
  it("counts pharmacies per risk level", () => {
    const insights = computeInsights(
      [
        makeScore("P1", {}, "HIGH"),
        makeScore("P2", {}, "MEDIUM"),
        makeScore("P3", {}, "MEDIUM"),
        makeScore("P4", {}, "VERY_LOW"),
      ],
      new Map(),
    );

    expect(insights.totalEntities).toBe(4);
    expect(insights.riskLevelCounts).toEqual({ HIGH: 1, MEDIUM: 2, LOW: 0, VERY_LOW: 1 });
    expect(insights.recommendations).toEqual([]);
  });

  it("recommends manual review above 10 high-risk pharmacies", () => {
    const ten = computeInsights(repeat(10, (i) => makeScore(`P${i}`, {}, "HIGH")), new Map());
    const eleven = computeInsights(repeat(11, (i) => makeScore(`P${i}`, {}, "HIGH")), new Map());

    expect(ten.recommendations).toEqual([]);
    expect(eleven.recommendations).toEqual([RECOMMENDATIONS.manyHighRisk]);
  });

  it("recommends threshold review above 20 medium-risk pharmacies", () => {
    const insights = computeInsights(repeat(21, (i) => makeScore(`P${i}`, {}, "MEDIUM")), new Map());
    expect(insights.recommendations).toEqual([RECOMMENDATIONS.manyMediumRisk]);
  });

  it("recommends weight review above 5 conflicting pharmacies", () => {
    const insights = computeInsights(
      repeat(6, (i) => makeScore(`P${i}`, { a: 0.9, b: 0.1 })),
      new Map(),
    );
    expect(insights.crossAgentPatterns.conflictingSignals).toBe(6);
    expect(insights.recommendations).toEqual([RECOMMENDATIONS.conflictingSignals]);
  });

  it("lists recommendations in a fixed order", () => {
    const insights = computeInsights(
      repeat(11, (i) => makeScore(`P${i}`, { a: 0.9, b: 0.9, c: 0.9 }, "HIGH")),
      new Map(),
    );
    expect(insights.recommendations).toEqual([
      RECOMMENDATIONS.manyHighRisk,
      RECOMMENDATIONS.highConsistency,
    ]);
  });

  it("defaults the agent list to the agents in the findings", () => {
    const insights = computeInsights([], new Map([["a", [makeFinding("P1", "a", 0.8)]]]));
    expect(insights.agentPerformance).toEqual({
      a: { avgScore: 0.8, highRiskFindings: 1, totalFindings: 1 },
    });
  });
});

describe("emptyInsights", () => {
  it("has zero counts", () => {
    expect(emptyInsights()).toEqual({
      totalEntities: 0,
      riskLevelCounts: { HIGH: 0, MEDIUM: 0, LOW: 0, VERY_LOW: 0 },
      agentPerformance: {},
      crossAgentPatterns: { conflictingSignals: 0, highConsistency: 0, doubleFlag: 0 },
      recommendations: [],
    });
  });
});
