#!/usr/bin/env npx tsx
/**
 * Run a single scoring run against the claims database.
 *
 * Loads claims, runs every scoring agent, aggregates and prints the run
 * insights and the top of the ranking.
 *
 * Usage:
 *   npx tsx scripts/run-scoring.ts [--top 20] [--limit 10000]
 */

import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { existsSync, readFileSync } from "fs";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Load .env
const envPath = resolve(__dirname, "../.env");
if (existsSync(envPath)) {
  for (const line of readFileSync(envPath, "utf-8").split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim();
    if (!process.env[key]) process.env[key] = value;
  }
}

const args = process.argv.slice(2);
const topIdx = args.indexOf("--top");
const limitIdx = args.indexOf("--limit");
const TOP_N = topIdx >= 0 ? parseInt(args[topIdx + 1] ?? "20", 10) : 20;
if (limitIdx >= 0 && args[limitIdx + 1]) process.env.DATASET_LIMIT = args[limitIdx + 1];

const { triggerRun } = await import("../src/services/scoring-service.ts");
const { closeDb } = await import("../src/db/index.ts");

console.log("\n============================================================");
console.log("  Pharmacy Risk Engine: Manual Scoring Run");
console.log(`  Claim limit: ${process.env.DATASET_LIMIT ?? "10000"}`);
console.log(`  Time: ${new Date().toISOString()}`);
console.log("============================================================\n");

try {
  const result = await triggerRun();
  const { insights } = result;

  console.log("\n============================================================");
  console.log("  RUN RESULTS");
  console.log("============================================================");
  console.log(`  Run ID: ${result.runId}`);
  console.log(`  Claims: ${result.datasetSize}`);
  console.log(`  Pharmacies scored: ${insights.totalEntities}`);
  console.log(
    `  Risk levels: ${insights.riskLevelCounts.HIGH} high, ${insights.riskLevelCounts.MEDIUM} medium, ` +
      `${insights.riskLevelCounts.LOW} low, ${insights.riskLevelCounts.VERY_LOW} very low`,
  );
  console.log(
    `  Cross-agent: ${insights.crossAgentPatterns.conflictingSignals} conflicting, ` +
      `${insights.crossAgentPatterns.highConsistency} high consistency, ` +
      `${insights.crossAgentPatterns.doubleFlag} double flags`,
  );
  console.log("");

  console.log("  Agents:");
  for (const [agent, perf] of Object.entries(insights.agentPerformance)) {
    console.log(
      `    ${agent}: ${perf.totalFindings} findings, avg ${perf.avgScore.toFixed(3)}, ${perf.highRiskFindings} high risk`,
    );
  }

  console.log(`\n  Top ${TOP_N} pharmacies:`);
  for (const s of result.scores.slice(0, TOP_N)) {
    console.log(
      `  #${s.rank} ${s.entityId} ${s.entityName} (${s.entityCity}, ${s.entityState}) ` +
        `${s.finalScore.toFixed(3)} ${s.riskLevel} [${s.contributingUnits.join(", ")}]`,
    );
    console.log(`      ${s.explanation}`);
  }

  if (insights.recommendations.length > 0) {
    console.log("\n  Recommendations:");
    for (const r of insights.recommendations) console.log(`    - ${r}`);
  }

  const failures = [
    ...result.unitErrors.map((e) => `agent ${e.message}`),
    ...result.stageErrors.map((e) => `stage ${e.message}`),
  ];
  if (failures.length > 0) {
    console.log("\n  Errors:");
    for (const e of failures) console.log(`    - ${e}`);
  }
  console.log("");
} catch (err) {
  console.error("Scoring run failed:", err);
  process.exitCode = 1;
} finally {
  await closeDb();
}
