/**
 * Scoring Service
 *
 * Process-wide owner of the agent weight vector and the latest run result.
 * Runs are serialized through the run lock; weight updates are refused while
 * a run holds it, so each run aggregates against one stable snapshot.
 */

import type { ScoringAgent } from "../agents/base-agent.ts";
import { ALL_AGENTS, DEFAULT_AGENT_WEIGHTS } from "../agents/registry.ts";
import { env } from "../config/env.ts";
import { RunInProgressError } from "../lib/errors.ts";
import { type ClaimSource, databaseClaimSource } from "./claims-loader.ts";
import { getLockStatus, withRunLock } from "./run-lock.ts";
import { type RunResult, generateRunId, runScoringPipeline } from "./scoring-pipeline.ts";
import {
  type WeightUpdateResult,
  type Weights,
  WeightVector,
  assertKnownAgents,
} from "./weight-vector.ts";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ScoringServiceConfig {
  source: ClaimSource;
  agents: readonly ScoringAgent[];
  datasetLimit: number;
  poolSize: number;
  initialWeights: Weights;
}

function agentNames(agents: readonly ScoringAgent[]): string[] {
  return agents.map((a) => a.name);
}

function defaultConfig(): ScoringServiceConfig {
  assertKnownAgents(env.SCORING_WEIGHTS, agentNames(ALL_AGENTS));
  return {
    source: databaseClaimSource,
    agents: ALL_AGENTS,
    datasetLimit: env.DATASET_LIMIT,
    poolSize: env.AGENT_POOL_SIZE,
    initialWeights: { ...DEFAULT_AGENT_WEIGHTS, ...env.SCORING_WEIGHTS },
  };
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let config: ScoringServiceConfig = defaultConfig();
let weights = new WeightVector(config.initialWeights);
let latestRun: RunResult | null = null;

/**
 * Override parts of the service configuration. Changing `initialWeights`
 * replaces the current weight vector.
 */
export function configureScoringService(overrides: Partial<ScoringServiceConfig>): void {
  config = { ...config, ...overrides };
  if (overrides.initialWeights) {
    weights = new WeightVector(config.initialWeights);
  }
}

/** Restore the default configuration and forget the latest run */
export function resetScoringService(): void {
  config = defaultConfig();
  weights = new WeightVector(config.initialWeights);
  latestRun = null;
}

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

/**
 * Run the scoring pipeline once and keep the result as the latest run.
 *
 * @throws RunInProgressError when another run holds the lock
 */
export async function triggerRun(): Promise<RunResult> {
  const runId = generateRunId();
  const locked = await withRunLock(runId, () =>
    runScoringPipeline({
      runId,
      source: config.source,
      agents: config.agents,
      weights: weights.snapshot(),
      datasetLimit: config.datasetLimit,
      poolSize: config.poolSize,
    }),
  );

  if (!locked) {
    const holder = getLockStatus().lock?.holderInfo ?? "unknown";
    console.log(`[ScoringService] Run ${runId} refused, ${holder} is in progress`);
    throw new RunInProgressError(holder);
  }

  latestRun = locked.result;
  return locked.result;
}

export function getLatestRun(): RunResult | null {
  return latestRun;
}

export function getServiceStatus(): { runInProgress: boolean; lastRunAt: string | null } {
  return {
    runInProgress: getLockStatus().isLocked,
    lastRunAt: latestRun?.completedAt ?? null,
  };
}

// ---------------------------------------------------------------------------
// Weights
// ---------------------------------------------------------------------------

export function getWeights(): Weights {
  return weights.snapshot();
}

/**
 * Merge weight overrides into the vector and renormalize.
 *
 * @throws RunInProgressError while a run is executing
 * @throws ConfigurationError for unknown agents, negative or non-finite weights
 */
export function updateWeights(overrides: Weights): WeightUpdateResult {
  const { isLocked, lock } = getLockStatus();
  if (isLocked) {
    throw new RunInProgressError(lock?.holderInfo ?? "unknown");
  }
  assertKnownAgents(overrides, agentNames(config.agents));
  return weights.update(overrides);
}
