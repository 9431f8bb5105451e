/**
 * Agent Weight Vector
 *
 * Per-agent importance used by the weighted score. Weights are kept
 * normalized (sum = 1.0). A vector whose raw sum is 0 cannot be normalized
 * and is left as supplied rather than dividing by zero.
 *
 * The vector is owned by the scoring service and only changes between runs;
 * each run aggregates against a snapshot.
 */

import { ConfigurationError } from "../lib/errors.ts";
import { weightOverridesSchema } from "../schemas/scoring.ts";

export type Weights = Readonly<Record<string, number>>;

export interface WeightUpdateResult {
  /** False when the merged weights summed to 0 and the vector was kept */
  applied: boolean;
  weights: Weights;
}

/**
 * Scale weights so they sum to 1.0. Returns null when the sum is 0.
 */
export function normalizeWeights(weights: Weights): Weights | null {
  const total = Object.values(weights).reduce((sum, w) => sum + w, 0);
  if (total <= 0) return null;

  const normalized: Record<string, number> = {};
  for (const [name, weight] of Object.entries(weights)) {
    normalized[name] = weight / total;
  }
  return normalized;
}

function validate(weights: Weights): Weights {
  const result = weightOverridesSchema.safeParse(weights);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "weights"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid agent weights: ${issues}`);
  }
  return result.data;
}

/**
 * Reject weights for agents that are not registered. A misspelled name would
 * otherwise take a share of the weight mass from every real agent.
 *
 * @throws ConfigurationError naming the unknown agents
 */
export function assertKnownAgents(weights: Weights, agentNames: readonly string[]): void {
  const known = new Set(agentNames);
  const unknown = Object.keys(weights).filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown agents in weights: ${unknown.join(", ")} (registered: ${agentNames.join(", ")})`,
    );
  }
}

export class WeightVector {
  private weights: Weights;

  constructor(initial: Weights) {
    const valid = validate(initial);
    const normalized = normalizeWeights(valid);
    if (!normalized) {
      console.warn("[Weights] Initial weights sum to 0, leaving them unnormalized");
    }
    this.weights = Object.freeze({ ...(normalized ?? valid) });
  }

  /** Weight of an agent; agents missing from the vector weigh 0 */
  get(agentName: string): number {
    return this.weights[agentName] ?? 0;
  }

  /**
   * Merge overrides into the current weights and renormalize. When the
   * merged weights sum to 0 the vector is left unchanged.
   *
   * @throws ConfigurationError for negative or non-finite weights
   */
  update(overrides: Weights): WeightUpdateResult {
    const valid = validate(overrides);
    const merged = { ...this.weights, ...valid };
    const normalized = normalizeWeights(merged);

    if (!normalized) {
      console.warn("[Weights] Update would zero every weight, keeping current weights");
      return { applied: false, weights: this.weights };
    }

    this.weights = Object.freeze({ ...normalized });
    console.log(`[Weights] Updated: ${JSON.stringify(this.weights)}`);
    return { applied: true, weights: this.weights };
  }

  /** Frozen weights for one run; later updates replace rather than mutate them */
  snapshot(): Weights {
    return this.weights;
  }

  toJSON(): Weights {
    return this.weights;
  }
}
