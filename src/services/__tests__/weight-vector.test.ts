/**
 * Weight Vector Tests
 *
 * Normalization, merge-then-renormalize updates, the all-zero degrade and
 * rejection of negative weights.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { WeightVector, assertKnownAgents, normalizeWeights } from "../weight-vector.ts";
import type { Weights } from "../weight-vector.ts";
import { ConfigurationError } from "../../lib/errors.ts";
import { DEFAULT_AGENT_WEIGHTS } from "../../agents/registry.ts";

function sum(weights: Readonly<Record<string, number>>): number {
  return Object.values(weights).reduce((s, w) => s + w, 0);
}

describe("normalizeWeights", () => {
  it("scales weights to sum to 1", () => {
    expect(normalizeWeights({ a: 2, b: 2 })).toEqual({ a: 0.5, b: 0.5 });
  });

  it("returns null when the weights sum to 0", () => {
    expect(normalizeWeights({ a: 0, b: 0 })).toBeNull();
  });
});

describe("WeightVector", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("normalizes the default agent weights", () => {
    const vector = new WeightVector(DEFAULT_AGENT_WEIGHTS);
    expect(sum(vector.snapshot())).toBeCloseTo(1, 10);
    expect(vector.get("coverage_agent")).toBeCloseTo(0.25, 10);
  });

  it("weighs agents missing from the vector at 0", () => {
    const vector = new WeightVector({ a: 1 });
    expect(vector.get("unknown_agent")).toBe(0);
  });

  it("merges overrides and renormalizes", () => {
    const vector = new WeightVector({ a: 0.5, b: 0.5 });
    const result = vector.update({ a: 1.5 });

    expect(result.applied).toBe(true);
    expect(result.weights).toEqual({ a: 0.75, b: 0.25 });
    expect(vector.get("a")).toBe(0.75);
  });

  it("adds agents that were not in the vector", () => {
    const vector = new WeightVector({ a: 1 });
    vector.update({ b: 1 });
    expect(vector.snapshot()).toEqual({ a: 0.5, b: 0.5 });
  });

  it("keeps the vector unchanged when an update would zero every weight", () => {
    const vector = new WeightVector({ a: 1 });
    const result = vector.update({ a: 0 });

    expect(result.applied).toBe(false);
    expect(result.weights).toEqual({ a: 1 });
    expect(vector.get("a")).toBe(1);
  });

  it("leaves all-zero initial weights unnormalized", () => {
    const vector = new WeightVector({ a: 0, b: 0 });
    expect(vector.snapshot()).toEqual({ a: 0, b: 0 });
  });

  it("rejects negative weights", () => {
    const vector = new WeightVector({ a: 1 });
    expect(() => vector.update({ a: -0.5 })).toThrow(ConfigurationError);
    expect(vector.get("a")).toBe(1);
  });

  it("rejects non-finite weights", () => {
    expect(() => new WeightVector({ a: Number.POSITIVE_INFINITY })).toThrow(ConfigurationError);
  });

  it("rejects an empty override set", () => {
    const vector = new WeightVector({ a: 1 });
    expect(() => vector.update({})).toThrow(ConfigurationError);
  });

  it("does not change a snapshot taken before an update", () => {
    const vector = new WeightVector({ a: 1, b: 1 });
    const before = vector.snapshot();
    vector.update({ b: 1.5 });

    expect(before).toEqual({ a: 0.5, b: 0.5 });
    expect(vector.snapshot()).toEqual({ a: 0.25, b: 0.75 });
    expect(Object.isFrozen(before)).toBe(true);
  });

  it("sums to 1 after any applied update", () => {
    const vector = new WeightVector(DEFAULT_AGENT_WEIGHTS);
    const updates: Weights[] = [{ network_agent: 0.9 }, { coverage_agent: 0 }, { extra: 0.33 }];
    for (const overrides of updates) {
      vector.update(overrides);
      expect(sum(vector.snapshot())).toBeCloseTo(1, 10);
    }
  });
});

describe("assertKnownAgents", () => {
  it("accepts weights for registered agents", () => {
    expect(() =>
      assertKnownAgents({ coverage_agent: 1 }, Object.keys(DEFAULT_AGENT_WEIGHTS)),
    ).not.toThrow();
  });

  it("names every unknown agent", () => {
    expect(() => assertKnownAgents({ a: 1, x: 1, y: 0 }, ["a", "b"])).toThrow(
      new ConfigurationError("Unknown agents in weights: x, y (registered: a, b)"),
    );
  });
});
