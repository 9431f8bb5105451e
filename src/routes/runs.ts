/**
 * Scoring Run Routes
 *
 * POST /            Run the scoring pipeline once (409 while another run holds the lock)
 * GET  /latest      Full result of the last completed run
 * GET  /latest/scores  Ranked score records, ?format=csv and ?riskLevel=HIGH
 */

import { Hono } from "hono";
import { apiError } from "../lib/errors.ts";
import { validateQuery } from "../middleware/validation.ts";
import { scoreExportQuerySchema } from "../schemas/scoring.ts";
import { exportScores, exportScoresAsCSV } from "../services/score-exporter.ts";
import { getLatestRun, triggerRun } from "../services/scoring-service.ts";

export const runRoutes = new Hono();

runRoutes.post("/", async (c) => {
  const result = await triggerRun();
  return c.json(result, 201);
});

runRoutes.get("/latest", (c) => {
  const run = getLatestRun();
  if (!run) return apiError(c, "RUN_NOT_FOUND", "No scoring run has completed yet");
  return c.json(run);
});

runRoutes.get("/latest/scores", validateQuery(scoreExportQuerySchema), (c) => {
  const run = getLatestRun();
  if (!run) return apiError(c, "RUN_NOT_FOUND", "No scoring run has completed yet");

  const { format, riskLevel } = c.get("validatedQuery");
  const records = exportScores(run.scores, { riskLevel });

  if (format === "csv") {
    c.header("Content-Type", "text/csv; charset=utf-8");
    c.header("Content-Disposition", `attachment; filename="${run.runId}-scores.csv"`);
    return c.body(exportScoresAsCSV(records));
  }

  return c.json({ runId: run.runId, count: records.length, scores: records });
});
