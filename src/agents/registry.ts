import type { ScoringAgent } from "./base-agent.ts";
import { isCombinationDependent } from "./base-agent.ts";
import { coverageAgent } from "./coverage-agent.ts";
import { patientFlipAgent } from "./patient-flip-agent.ts";
import { highDollarAgent } from "./high-dollar-agent.ts";
import { rejectionAgent } from "./rejection-agent.ts";
import { networkAgent } from "./network-agent.ts";

/** The built-in scoring agents, in registration order */
export const ALL_AGENTS: readonly ScoringAgent[] = [
  coverageAgent,
  patientFlipAgent,
  highDollarAgent,
  rejectionAgent,
  networkAgent,
];

/** Default importance of each agent in the weighted score (sum = 1.00) */
export const DEFAULT_AGENT_WEIGHTS: Readonly<Record<string, number>> = {
  coverage_agent: 0.25,
  patient_flip_agent: 0.2,
  high_dollar_agent: 0.2,
  rejection_agent: 0.2,
  network_agent: 0.15,
};

/** Agent descriptions for API responses */
export function getAgentConfigs(agents: readonly ScoringAgent[] = ALL_AGENTS) {
  return agents.map((a) => ({
    name: a.name,
    description: a.description,
    combinationDependent: isCombinationDependent(a),
  }));
}
