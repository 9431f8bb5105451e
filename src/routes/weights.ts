/**
 * Agent Weight Routes
 *
 * GET /  Current normalized weights and the registered agents
 * PUT /  Merge weight overrides and renormalize (409 during a run)
 */

import { Hono } from "hono";
import { getAgentConfigs } from "../agents/registry.ts";
import { validateBody } from "../middleware/validation.ts";
import { weightOverridesSchema } from "../schemas/scoring.ts";
import { getWeights, updateWeights } from "../services/scoring-service.ts";

export const weightRoutes = new Hono();

weightRoutes.get("/", (c) => {
  return c.json({ weights: getWeights(), agents: getAgentConfigs() });
});

weightRoutes.put("/", validateBody(weightOverridesSchema), (c) => {
  const overrides = c.get("validatedBody");
  const { applied, weights } = updateWeights(overrides);
  return c.json({
    applied,
    weights,
    ...(!applied && { warning: "Weights would sum to 0; current weights kept" }),
  });
});
