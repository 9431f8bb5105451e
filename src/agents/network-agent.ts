/**
 * Pharmacy Network Anomaly Agent
 *
 * Scores how far a pharmacy operates outside the pharmacy network. This is
 * the one combination-dependent agent: given the findings of the other
 * agents it blends its own network score with their average opinion of the
 * same pharmacy (30% network, 70% peers).
 */

import {
  BaseScoringAgent,
  type ClaimRecord,
  type CombinationDependentAgent,
  type Finding,
} from "./base-agent.ts";
import { countWhere, groupBy, mean, percentOf, round2, round3 } from "../lib/math-utils.ts";

const UNKNOWN_NETWORK_TYPES = new Set(["Unknown", "None", ""]);
const SMALL_NETWORK_TYPES = new Set(["Independent", "Small Chain"]);

const NETWORK_SHARE = 0.3;
const PEER_SHARE = 0.7;

export interface NetworkProfile {
  totalClaims: number;
  networkClaims: number;
  nonNetworkClaims: number;
  nonNetworkPercent: number;
  isPrimarilyNetwork: boolean;
  primaryNetworkType: string;
}

export function profileNetwork(claims: readonly ClaimRecord[]): NetworkProfile {
  const totalClaims = claims.length;
  const networkClaims = countWhere(claims, (c) => c.isNetworkPharmacy === "Y");
  const nonNetworkClaims = countWhere(claims, (c) => c.isNetworkPharmacy === "N");
  const groupType = claims.find(
    (c) => c.networkPharmacyGroupType !== null && c.networkPharmacyGroupType !== undefined,
  )?.networkPharmacyGroupType;

  return {
    totalClaims,
    networkClaims,
    nonNetworkClaims,
    nonNetworkPercent: percentOf(nonNetworkClaims, totalClaims),
    isPrimarilyNetwork: networkClaims > nonNetworkClaims,
    primaryNetworkType: groupType ?? "Unknown",
  };
}

export function networkScore(profile: NetworkProfile): number {
  const { totalClaims, nonNetworkPercent, primaryNetworkType } = profile;
  let score = 0;

  if (nonNetworkPercent >= 80) score += 0.4;
  else if (nonNetworkPercent >= 60) score += 0.3;
  else if (nonNetworkPercent >= 40) score += 0.2;
  else if (nonNetworkPercent >= 20) score += 0.1;

  if (UNKNOWN_NETWORK_TYPES.has(primaryNetworkType) && totalClaims > 5) {
    score += 0.3;
  } else if (SMALL_NETWORK_TYPES.has(primaryNetworkType) && nonNetworkPercent > 50) {
    score += 0.2;
  }

  if (totalClaims >= 50 && nonNetworkPercent > 30) score += 0.3;
  else if (totalClaims >= 20 && nonNetworkPercent > 50) score += 0.2;
  else if (totalClaims >= 10 && nonNetworkPercent > 70) score += 0.1;

  return Math.min(score, 1);
}

function networkReason(score: number): string {
  if (score >= 0.9) return "CRITICAL: High non-network activity with suspicious patterns";
  if (score >= 0.8) return "HIGH_RISK: Elevated non-network claim patterns";
  if (score >= 0.6) return "MEDIUM_HIGH: Unusual network/non-network distribution";
  if (score >= 0.4) return "MEDIUM: Some network anomalies detected";
  if (score >= 0.2) return "LOW_MEDIUM: Minor network pattern variations";
  return "LOW: Normal network patterns";
}

function enhancedReason(
  score: number,
  nonNetworkPercent: number,
  agentCount: number,
  highRiskAgents: number,
): string {
  if (score >= 0.9) {
    return `CRITICAL: Non-network pharmacy (${nonNetworkPercent.toFixed(1)}% non-network) with ${highRiskAgents} high-risk agent findings`;
  }
  if (score >= 0.8) {
    return `HIGH_RISK: Non-network pharmacy with ${agentCount} agent findings (${highRiskAgents} high-risk)`;
  }
  if (score >= 0.6) return `MEDIUM_HIGH: Network anomaly with ${agentCount} agent findings`;
  if (score >= 0.4) return "MEDIUM: Some network and agent concerns";
  if (score >= 0.2) return "LOW_MEDIUM: Minor network and agent issues";
  return "LOW: Minimal network and agent concerns";
}

export class NetworkAgent extends BaseScoringAgent implements CombinationDependentAgent {
  readonly name = "network_agent";
  readonly description =
    "Non-network claim share, network type and volume, blended with peer agent findings";

  run(dataset: readonly ClaimRecord[]): Finding[] {
    const hasNetworkData = dataset.some(
      (c) => c.isNetworkPharmacy !== null && c.isNetworkPharmacy !== undefined,
    );
    if (!hasNetworkData) {
      console.warn(`[${this.name}] No network columns in dataset, skipping`);
      return [];
    }

    const findings: Finding[] = [];
    for (const [pharmacyNumber, claims] of this.groupByPharmacy(dataset)) {
      const profile = profileNetwork(claims);
      const score = networkScore(profile);

      findings.push(
        this.finding(pharmacyNumber, score, networkReason(score), {
          ...this.pharmacyDetails(claims),
          totalClaims: profile.totalClaims,
          networkClaims: profile.networkClaims,
          nonNetworkClaims: profile.nonNetworkClaims,
          networkPercentage: round2(percentOf(profile.networkClaims, profile.totalClaims)),
          isPrimarilyNetwork: profile.isPrimarilyNetwork,
          primaryNetworkType: profile.primaryNetworkType,
          analysisType: "network_anomaly",
        }),
      );
    }

    this.logSummary(findings, "pharmacies");
    return this.sortFindings(findings);
  }

  runWithPeers(dataset: readonly ClaimRecord[], peerFindings: readonly Finding[]): Finding[] {
    const base = this.run(dataset);
    const peers = peerFindings.filter((f) => f.sourceUnit !== this.name);
    if (base.length === 0 || peers.length === 0) return base;

    const peersByPharmacy = groupBy(peers, (f) => f.entityId);

    const enhanced = base.map((finding) => {
      const pharmacyPeers = peersByPharmacy.get(finding.entityId);
      if (!pharmacyPeers) {
        return {
          ...finding,
          reason: `${finding.reason} (No agent findings)`,
          detail: {
            ...finding.detail,
            networkFraudScore: finding.score,
            agentFraudScore: 0,
            agentCount: 0,
            highRiskAgents: 0,
            analysisType: "network_anomaly_enhanced",
          },
        };
      }

      const avgPeerScore = mean(pharmacyPeers.map((p) => p.score));
      const score = finding.score * NETWORK_SHARE + avgPeerScore * PEER_SHARE;
      const highRiskAgents = countWhere(pharmacyPeers, (p) => p.score >= 0.8);
      const totalClaims = Number(finding.detail.totalClaims ?? 0);
      const nonNetworkClaims = Number(finding.detail.nonNetworkClaims ?? 0);

      return this.finding(
        finding.entityId,
        score,
        enhancedReason(
          score,
          percentOf(nonNetworkClaims, totalClaims),
          pharmacyPeers.length,
          highRiskAgents,
        ),
        {
          ...finding.detail,
          networkFraudScore: finding.score,
          agentFraudScore: round3(avgPeerScore),
          agentCount: pharmacyPeers.length,
          highRiskAgents,
          analysisType: "network_anomaly_enhanced",
        },
      );
    });

    console.log(`[${this.name}] Enhanced ${enhanced.length} pharmacies with peer findings`);
    return this.sortFindings(enhanced);
  }
}

export const networkAgent = new NetworkAgent();
