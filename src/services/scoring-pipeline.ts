/**
 * Scoring Pipeline Orchestrator
 *
 * Runs one scoring run as four stages:
 *
 *   load → execute_units → aggregate → finalize
 *
 * Each stage takes the previous run state and returns a new one. A stage
 * that throws is logged as a StageError and its output fields fall back to
 * their empty values, so the run always resolves with a result: a failed
 * load scores nothing, a failed aggregation produces no scores, a failed
 * finalize keeps the aggregated scores without insights.
 *
 * Only a FatalError escapes the pipeline.
 */

import type {
  ClaimRecord,
  Finding,
  FindingsByAgent,
  ScoringAgent,
} from "../agents/base-agent.ts";
import { ALL_AGENTS } from "../agents/registry.ts";
import { FatalError, StageError, type UnitExecutionError, errorMessage } from "../lib/errors.ts";
import { type AggregatedScore, aggregate, rankScores } from "./aggregation-engine.ts";
import type { ClaimSource } from "./claims-loader.ts";
import { executeAgents } from "./execution-pool.ts";
import { type RunInsights, computeInsights, emptyInsights } from "./run-insights.ts";
import type { Weights } from "./weight-vector.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const STAGES = ["load", "execute_units", "aggregate", "finalize"] as const;
export type StageName = (typeof STAGES)[number];

export interface RunState {
  readonly runId: string;
  readonly dataset: readonly ClaimRecord[];
  readonly findings: FindingsByAgent;
  readonly scores: readonly AggregatedScore[];
  readonly insights: RunInsights;
  readonly stageErrors: readonly StageError[];
  readonly unitErrors: readonly UnitExecutionError[];
}

type StageOutput = Partial<Omit<RunState, "runId" | "stageErrors">>;

export interface PipelineOptions {
  source: ClaimSource;
  weights: Weights;
  agents?: readonly ScoringAgent[];
  /** Maximum claims read by the load stage (default 10000) */
  datasetLimit?: number;
  /** Maximum concurrent agents (default 5) */
  poolSize?: number;
  runId?: string;
}

export interface RunResult {
  runId: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  datasetSize: number;
  /** Weight snapshot the run was aggregated with */
  weights: Weights;
  scores: AggregatedScore[];
  findings: Record<string, Finding[]>;
  insights: RunInsights;
  unitErrors: { unit: string; message: string }[];
  stageErrors: { stage: string; message: string }[];
}

const DEFAULT_DATASET_LIMIT = 10_000;

export function generateRunId(): string {
  return `run_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

export function initialRunState(runId: string): RunState {
  return {
    runId,
    dataset: [],
    findings: new Map(),
    scores: [],
    insights: emptyInsights(),
    stageErrors: [],
    unitErrors: [],
  };
}

// ---------------------------------------------------------------------------
// Stage boundary
// ---------------------------------------------------------------------------

/**
 * Run one stage inside a failure boundary. On success the stage output is
 * merged into a new state; on failure `fallback` is merged instead and the
 * error is appended to `stageErrors`.
 */
export async function runStage(
  state: RunState,
  stage: StageName,
  fn: (state: RunState) => StageOutput | Promise<StageOutput>,
  fallback: StageOutput,
): Promise<RunState> {
  const started = Date.now();
  try {
    const output = await fn(state);
    console.log(`[Pipeline] ${state.runId} ${stage} completed in ${Date.now() - started}ms`);
    return { ...state, ...output };
  } catch (err) {
    if (err instanceof FatalError) throw err;
    const error = new StageError(stage, errorMessage(err));
    console.error(`[Pipeline] ${state.runId} stage failed, continuing with empty output: ${error.message}`);
    return { ...state, ...fallback, stageErrors: [...state.stageErrors, error] };
  }
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

function loadStage(source: ClaimSource, limit: number) {
  return async (): Promise<StageOutput> => {
    const claims = await source.loadClaims(limit);
    return { dataset: Object.freeze(claims.map((claim) => Object.freeze(claim))) };
  };
}

function executeStage(agents: readonly ScoringAgent[], poolSize: number | undefined) {
  return async (state: RunState): Promise<StageOutput> => {
    const { findings, unitErrors } = await executeAgents(agents, state.dataset, { poolSize });
    return { findings, unitErrors };
  };
}

function aggregateStage(weights: Weights) {
  return (state: RunState): StageOutput => ({
    scores: aggregate(state.findings, state.dataset, weights),
  });
}

function finalizeStage(agents: readonly ScoringAgent[]) {
  return (state: RunState): StageOutput => {
    const scores = rankScores(state.scores);
    return {
      scores,
      insights: computeInsights(
        scores,
        state.findings,
        agents.map((a) => a.name),
      ),
    };
  };
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

function toRunResult(
  state: RunState,
  weights: Weights,
  startedAt: Date,
): RunResult {
  const completedAt = new Date();
  return {
    runId: state.runId,
    startedAt: startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
    durationMs: completedAt.getTime() - startedAt.getTime(),
    datasetSize: state.dataset.length,
    weights,
    scores: [...state.scores],
    findings: Object.fromEntries(
      [...state.findings].map(([agent, findings]) => [agent, [...findings]]),
    ),
    insights: state.insights,
    unitErrors: state.unitErrors.map((e) => ({ unit: e.unitName, message: e.message })),
    stageErrors: state.stageErrors.map((e) => ({ stage: e.stage, message: e.message })),
  };
}

export async function runScoringPipeline(options: PipelineOptions): Promise<RunResult> {
  const agents = options.agents ?? ALL_AGENTS;
  const weights = options.weights;
  const runId = options.runId ?? generateRunId();
  const startedAt = new Date();

  console.log(
    `[Pipeline] Starting scoring run ${runId} with ${agents.length} agents at ${startedAt.toISOString()}`,
  );

  let state = initialRunState(runId);
  state = await runStage(
    state,
    "load",
    loadStage(options.source, options.datasetLimit ?? DEFAULT_DATASET_LIMIT),
    { dataset: [] },
  );
  state = await runStage(
    state,
    "execute_units",
    executeStage(agents, options.poolSize),
    { findings: new Map() },
  );
  state = await runStage(state, "aggregate", aggregateStage(weights), { scores: [] });
  state = await runStage(state, "finalize", finalizeStage(agents), { insights: emptyInsights() });

  const { riskLevelCounts } = state.insights;
  console.log(
    `[Pipeline] Run ${runId} complete. ${state.dataset.length} claims, ${state.scores.length} pharmacies scored (${riskLevelCounts.HIGH} high, ${riskLevelCounts.MEDIUM} medium). ${state.unitErrors.length} agent errors, ${state.stageErrors.length} stage errors.`,
  );

  return toRunResult(state, weights, startedAt);
}
