import { describe, it, expect } from "vitest";
import {
  consistencyScore,
  finalScore,
  outlierScore,
  riskLevel,
  scorePopulation,
} from "../signal-metrics.ts";

describe("consistencyScore", () => {
  it("is neutral for a single agent", () => {
    expect(consistencyScore([0.95])).toBe(0.5);
    expect(consistencyScore([])).toBe(0.5);
  });

  it("is 0.3 when high and low signals conflict", () => {
    expect(consistencyScore([0.9, 0.2])).toBe(0.3);
  });

  it("is 0.9 when signals converge high", () => {
    expect(consistencyScore([0.9, 0.85])).toBe(0.9);
  });

  it("is 0.1 when signals converge low", () => {
    expect(consistencyScore([0.1, 0.2, 0.39])).toBe(0.1);
  });

  it("is neutral for moderate signals", () => {
    expect(consistencyScore([0.5, 0.6, 0.79])).toBe(0.5);
  });

  it("treats 0.8 as high and 0.4 as not low", () => {
    expect(consistencyScore([0.8, 0.4])).toBe(0.9);
  });

  it("only ever returns one of the four categories", () => {
    const samples = [
      [0, 1],
      [0.4, 0.6],
      [0.8, 0.8, 0.1],
      [0.3, 0.3],
      [0.99, 0.81],
      [0.5, 0.5, 0.5, 0.5],
    ];
    for (const scores of samples) {
      expect([0.1, 0.3, 0.5, 0.9]).toContain(consistencyScore(scores));
    }
  });
});

describe("outlierScore", () => {
  it("is 0.5 when the population has no spread", () => {
    const population = scorePopulation([0.5, 0.5, 0.5]);
    expect(outlierScore([0.5], population)).toBe(0.5);
  });

  it("is 0.5 for an empty population", () => {
    expect(outlierScore([0.9], scorePopulation([]))).toBe(0.5);
  });

  it("is the sigmoid of the z-score", () => {
    // mean 0.5, population std 0.2
    const population = scorePopulation([0.3, 0.7]);
    expect(population.mean).toBeCloseTo(0.5, 10);
    expect(population.std).toBeCloseTo(0.2, 10);
    expect(outlierScore([0.7], population)).toBeCloseTo(1 / (1 + Math.exp(-1)), 10);
  });

  it("stays strictly inside (0, 1)", () => {
    const population = scorePopulation([0, 0, 0, 0, 0, 0, 0, 0, 0, 1]);
    const high = outlierScore([1], population);
    const low = outlierScore([0], population);
    expect(high).toBeGreaterThan(0.5);
    expect(high).toBeLessThan(1);
    expect(low).toBeGreaterThan(0);
    expect(low).toBeLessThan(0.5);
  });

  it("stays below 1 when one pharmacy stands out from thousands of zero scores", () => {
    const population = scorePopulation([...new Array<number>(2000).fill(0), 1]);
    expect(population.count).toBe(2001);

    const score = outlierScore([1], population);
    expect(score).toBeLessThan(1);
    expect(score).toBeGreaterThan(0.999);
  });

  it("keeps extreme z-scores off both ends of the interval", () => {
    expect(outlierScore([1], { mean: 0, std: 0.001, count: 2 })).toBe(1 - Number.EPSILON / 2);
    expect(outlierScore([0], { mean: 1, std: 0.001, count: 2 })).toBe(Number.MIN_VALUE);
  });
});

describe("finalScore", () => {
  it("blends 70% weighted, 20% consistency and 10% outlier", () => {
    expect(finalScore(1, 0.9, 1)).toBeCloseTo(0.98, 10);
    expect(finalScore(0, 0, 0)).toBe(0);
  });
});

describe("riskLevel", () => {
  it("uses inclusive lower bounds", () => {
    expect(riskLevel(0.8)).toBe("HIGH");
    expect(riskLevel(0.7999)).toBe("MEDIUM");
    expect(riskLevel(0.6)).toBe("MEDIUM");
    expect(riskLevel(0.5999)).toBe("LOW");
    expect(riskLevel(0.4)).toBe("LOW");
    expect(riskLevel(0.3999)).toBe("VERY_LOW");
  });

  it("covers the ends of the range", () => {
    expect(riskLevel(1)).toBe("HIGH");
    expect(riskLevel(0)).toBe("VERY_LOW");
  });
});
