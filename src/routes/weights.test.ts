/**
 * Integration tests for the agent weight API
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

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
import { ALL_AGENTS } from "../agents/registry.ts";

function put(body: string) {
  return app.request("/api/v1/weights", {
    method: "PUT",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("Weight routes", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    resetScoringService();
    configureScoringService({
      agents: [
        { name: "a", description: "first", run: () => [] },
        { name: "b", description: "second", run: () => [] },
      ],
      initialWeights: { a: 1, b: 1 },
    });
  });

  it("returns the normalized weights and the registered agents", async () => {
    const res = await app.request("/api/v1/weights");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      weights: { a: 0.5, b: 0.5 },
      agents: ALL_AGENTS.map((a) => ({
        name: a.name,
        description: a.description,
        combinationDependent: a.name === "network_agent",
      })),
    });
  });

  it("merges overrides and renormalizes", async () => {
    const res = await put(JSON.stringify({ a: 1.5 }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ applied: true, weights: { a: 0.75, b: 0.25 } });
  });

  it("keeps the weights when the update would zero them", async () => {
    const res = await put(JSON.stringify({ a: 0, b: 0 }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      applied: false,
      weights: { a: 0.5, b: 0.5 },
      warning: "Weights would sum to 0; current weights kept",
    });
  });

  it("rejects negative weights", async () => {
    const res = await put(JSON.stringify({ a: -1 }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: "validation_failed",
      details: { issues: [{ path: "a", message: "weight must be >= 0" }] },
    });
  });

  it("rejects a weight for an agent that is not registered", async () => {
    const res = await put(JSON.stringify({ coverag_agent: 1 }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Unknown agents in weights: coverag_agent (registered: a, b)",
      code: "invalid_weights",
      status: 400,
    });

    const current = await app.request("/api/v1/weights");
    expect(await current.json()).toMatchObject({ weights: { a: 0.5, b: 0.5 } });
  });

  it("rejects an empty object", async () => {
    const res = await put("{}");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      details: { issues: [{ path: "", message: "at least one agent weight is required" }] },
    });
  });

  it("rejects a body that is not JSON", async () => {
    const res = await put("coverage_agent=1");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "invalid_json" });
  });

  it("refuses updates while a run is in progress", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    configureScoringService({
      source: {
        loadClaims: async () => {
          await gate;
          return [];
        },
      },
    });

    const running = triggerRun();
    const res = await put(JSON.stringify({ a: 2 }));

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ code: "run_in_progress" });

    release();
    await running;
  });
});
