/**
 * Integration tests for the scoring run API
 *
 * - POST /api/v1/runs: run the pipeline
 * - GET /api/v1/runs/latest: last run result
 * - GET /api/v1/runs/latest/scores: score export (JSON / CSV)
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { z } from "zod";

vi.mock("../db/index.ts", () => ({
  db: { execute: vi.fn(async () => [{ health_check: 1 }]) },
}));

vi.mock("../services/claims-loader.ts", () => ({
  databaseClaimSource: { loadClaims: vi.fn(async () => []) },
}));

import app from "../app.ts";
import {
  configureScoringService,
  resetScoringService,
  triggerRun,
} from "../services/scoring-service.ts";
import { SCORE_COLUMNS } from "../services/score-exporter.ts";
import type { ClaimRecord, ScoringAgent } from "../agents/base-agent.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeClaim(pharmacyNumber: string): ClaimRecord {
  return {
    pharmacyNumber,
    occ: null,
    copayCost: null,
    oopCost: null,
    copayFeeCost: null,
    originalCost: null,
  };
}

const coverageStub: ScoringAgent = {
  name: "coverage_agent",
  description: "fixed scores",
  run: () => [
    { entityId: "P1", score: 0.9, reason: "HIGH_RISK: >90% flagged claims", sourceUnit: "coverage_agent", detail: {} },
    { entityId: "P2", score: 0.3, reason: "LOW_MEDIUM: >25% flagged claims", sourceUnit: "coverage_agent", detail: {} },
  ],
};

const runBody = z.object({ runId: z.string() });
const exportBody = z.object({
  runId: z.string(),
  count: z.number(),
  scores: z.array(z.record(z.string(), z.unknown())),
});

function req(method: string, path: string) {
  return app.request(path, { method });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Scoring run routes", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    resetScoringService();
    configureScoringService({
      source: { loadClaims: async () => [makeClaim("P1"), makeClaim("P2")] },
      agents: [coverageStub],
      initialWeights: { coverage_agent: 1 },
    });
  });

  it("returns 404 before the first run", async () => {
    const res = await req("GET", "/api/v1/runs/latest");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "run_not_found",
      code: "run_not_found",
      details: "No scoring run has completed yet",
    });

    const scores = await req("GET", "/api/v1/runs/latest/scores");
    expect(scores.status).toBe(404);
  });

  it("runs the pipeline and serves the latest result", async () => {
    const res = await req("POST", "/api/v1/runs");
    expect(res.status).toBe(201);
    const run: unknown = await res.json();
    expect(run).toMatchObject({
      datasetSize: 2,
      scores: [{ entityId: "P1", rank: 1 }, { entityId: "P2", rank: 2 }],
      insights: { riskLevelCounts: { HIGH: 1, MEDIUM: 0, LOW: 0, VERY_LOW: 1 } },
      unitErrors: [],
      stageErrors: [],
    });

    const latest = await req("GET", "/api/v1/runs/latest");
    expect(latest.status).toBe(200);
    expect(runBody.parse(await latest.json()).runId).toBe(runBody.parse(run).runId);
  });

  it("exports snake_case score records", async () => {
    await triggerRun();
    const res = await req("GET", "/api/v1/runs/latest/scores");
    const body = exportBody.parse(await res.json());

    expect(body.count).toBe(2);
    expect(Object.keys(body.scores[0] ?? {})).toEqual([...SCORE_COLUMNS]);
    expect(body.scores[0]).toMatchObject({
      rank: 1,
      entity_id: "P1",
      entity_name: "Unknown",
      risk_level: "HIGH",
      contributing_units: ["coverage_agent"],
      transaction_count: 1,
      explanation: "HIGH RISK from 1 agents: HIGH_RISK: >90% flagged claims",
    });
  });

  it("filters exported scores by risk level", async () => {
    await triggerRun();
    const res = await req("GET", "/api/v1/runs/latest/scores?riskLevel=VERY_LOW");
    const body = exportBody.parse(await res.json());

    expect(body.count).toBe(1);
    expect(body.scores[0]).toMatchObject({ entity_id: "P2" });
  });

  it("exports CSV", async () => {
    await triggerRun();
    const res = await req("GET", "/api/v1/runs/latest/scores?format=csv");

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/csv; charset=utf-8");
    const lines = (await res.text()).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(SCORE_COLUMNS.join(","));
    expect(lines[2]?.startsWith("2,P2,Unknown,Unknown,Unknown,0.3,0.5,")).toBe(true);
    expect(
      lines[2]?.endsWith(",VERY_LOW,coverage_agent,1,No significant fraud indicators detected"),
    ).toBe(true);
  });

  it("rejects an unknown export format", async () => {
    await triggerRun();
    const res = await req("GET", "/api/v1/runs/latest/scores?format=xml");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "validation_failed" });
  });

  it("returns 409 while another run is in progress", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    configureScoringService({
      source: {
        loadClaims: async () => {
          await gate;
          return [makeClaim("P1")];
        },
      },
    });

    const running = triggerRun();
    const res = await req("POST", "/api/v1/runs");

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ code: "run_in_progress", status: 409 });

    release();
    await running;
  });

  it("returns a structured 404 for unknown routes", async () => {
    const res = await req("GET", "/api/v1/unknown");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "Route GET /api/v1/unknown not found",
      code: "not_found",
      status: 404,
    });
  });
});
