/**
 * Agent Execution Pool
 *
 * Runs every scoring agent over the shared claim dataset on a bounded number
 * of concurrent workers and collects their findings.
 *
 * Two phases:
 * 1. Independent agents fan out over the pool.
 * 2. Combination-dependent agents run one at a time afterwards, each given
 *    the concatenated phase-1 findings.
 *
 * An agent that throws, rejects or returns malformed findings contributes an
 * empty list; the failure is logged and reported in `unitErrors`. Nothing is
 * retried and there are no timeouts: the pool resolves once every agent has
 * settled.
 *
 * Agent names key the findings map, so a second agent registered under a name
 * already taken is not run and is reported as a unit error.
 */

import type {
  ClaimRecord,
  Finding,
  FindingsByAgent,
  ScoringAgent,
} from "../agents/base-agent.ts";
import { isCombinationDependent } from "../agents/base-agent.ts";
import { UnitExecutionError, errorMessage } from "../lib/errors.ts";
import { findingListSchema } from "../schemas/scoring.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExecutionOptions {
  /** Maximum concurrent agents in phase 1 (default 5) */
  poolSize?: number;
}

export interface ExecutionResult {
  /** Keyed in registration order; every agent has an entry */
  findings: FindingsByAgent;
  unitErrors: UnitExecutionError[];
}

type AgentOutcome =
  | { ok: true; findings: readonly Finding[] }
  | { ok: false; error: UnitExecutionError };

const DEFAULT_POOL_SIZE = 5;

// ---------------------------------------------------------------------------
// Output validation
// ---------------------------------------------------------------------------

/**
 * Validate an agent's raw output and collapse duplicate findings for one
 * pharmacy to the highest-scoring one (the first on a tie).
 */
export function validateFindings(agentName: string, output: unknown): readonly Finding[] {
  const parsed = findingListSchema.safeParse(output);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "output"}: ${issue.message}` : "invalid";
    throw new UnitExecutionError(agentName, `malformed findings (${where})`);
  }

  const byEntity = new Map<string, Finding>();
  for (const finding of parsed.data) {
    if (finding.sourceUnit !== agentName) {
      throw new UnitExecutionError(
        agentName,
        `finding for ${finding.entityId} names source "${finding.sourceUnit}"`,
      );
    }
    const existing = byEntity.get(finding.entityId);
    if (!existing || finding.score > existing.score) {
      byEntity.set(finding.entityId, Object.freeze(finding));
    }
  }

  return Object.freeze([...byEntity.values()]);
}

async function settle(
  agent: ScoringAgent,
  invoke: () => Finding[] | Promise<Finding[]>,
): Promise<AgentOutcome> {
  const started = Date.now();
  try {
    const output: unknown = await invoke();
    const findings = validateFindings(agent.name, output);
    console.log(
      `[ExecutionPool] ${agent.name}: ${findings.length} findings in ${Date.now() - started}ms`,
    );
    return { ok: true, findings };
  } catch (err) {
    const error =
      err instanceof UnitExecutionError
        ? err
        : new UnitExecutionError(agent.name, errorMessage(err));
    console.error(`[ExecutionPool] ${error.message}`);
    return { ok: false, error };
  }
}

// ---------------------------------------------------------------------------
// Bounded pool
// ---------------------------------------------------------------------------

/**
 * Run tasks with at most `limit` in flight. Workers pull from a shared cursor
 * so a slow task never holds up the others. Results are index-aligned.
 */
export async function runBounded<T>(
  tasks: readonly (() => Promise<T>)[],
  limit: number,
): Promise<T[]> {
  const results = new Array<T>(tasks.length);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < tasks.length) {
      const i = cursor++;
      const task = tasks[i];
      if (task) results[i] = await task();
    }
  };

  const workers = Math.max(1, Math.min(limit, tasks.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** First registration of each agent name, plus an error for every later one */
function dedupeAgents(agents: readonly ScoringAgent[]): {
  unique: ScoringAgent[];
  duplicates: UnitExecutionError[];
} {
  const seen = new Set<string>();
  const unique: ScoringAgent[] = [];
  const duplicates: UnitExecutionError[] = [];

  for (const agent of agents) {
    if (seen.has(agent.name)) {
      const error = new UnitExecutionError(agent.name, "duplicate agent name, registration skipped");
      console.error(`[ExecutionPool] ${error.message}`);
      duplicates.push(error);
      continue;
    }
    seen.add(agent.name);
    unique.push(agent);
  }

  return { unique, duplicates };
}

export async function executeAgents(
  agents: readonly ScoringAgent[],
  dataset: readonly ClaimRecord[],
  options: ExecutionOptions = {},
): Promise<ExecutionResult> {
  const poolSize = options.poolSize ?? DEFAULT_POOL_SIZE;
  const outcomes = new Map<string, AgentOutcome>();
  const { unique, duplicates } = dedupeAgents(agents);

  const independent = unique.filter((a) => !isCombinationDependent(a));
  const dependent = unique.filter(isCombinationDependent);

  console.log(
    `[ExecutionPool] Phase 1: ${independent.length} agents, pool size ${Math.min(poolSize, independent.length)}`,
  );
  const phaseOne = await runBounded(
    independent.map((agent) => () => settle(agent, () => agent.run(dataset))),
    poolSize,
  );
  independent.forEach((agent, i) => {
    const outcome = phaseOne[i];
    if (outcome) outcomes.set(agent.name, outcome);
  });

  if (dependent.length > 0) {
    const peerFindings = Object.freeze(
      phaseOne.flatMap((outcome) => (outcome.ok ? outcome.findings : [])),
    );
    console.log(
      `[ExecutionPool] Phase 2: ${dependent.length} agents with ${peerFindings.length} peer findings`,
    );
    for (const agent of dependent) {
      outcomes.set(
        agent.name,
        await settle(agent, () => agent.runWithPeers(dataset, peerFindings)),
      );
    }
  }

  const findings: FindingsByAgent = new Map();
  const unitErrors: UnitExecutionError[] = [...duplicates];
  for (const agent of unique) {
    const outcome = outcomes.get(agent.name);
    if (!outcome) continue;
    if (outcome.ok) {
      findings.set(agent.name, outcome.findings);
    } else {
      findings.set(agent.name, Object.freeze([]));
      unitErrors.push(outcome.error);
    }
  }

  return { findings, unitErrors };
}
