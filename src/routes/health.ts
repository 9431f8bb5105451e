import { Hono } from "hono";
import { db } from "../db/index.ts";
import { sql } from "drizzle-orm";
import { errorMessage } from "../lib/errors.ts";
import { getServiceStatus } from "../services/scoring-service.ts";

const healthRoutes = new Hono();

/** Track server start time for uptime calculation */
const serverStartTime = Date.now();

/**
 * GET /health - Service health with claim database verification
 *
 * Returns:
 * - status: "ok" or "degraded" (claims database unreachable)
 * - uptime: milliseconds since server start
 * - runInProgress / lastRunAt: scoring run state
 * - database: { connected: boolean, latency?: number, error?: string }
 */
healthRoutes.get("/", async (c) => {
  let dbConnected = false;
  let dbLatency: number | undefined;
  let dbError: string | undefined;

  try {
    const dbCheckStart = Date.now();
    await db.execute(sql`SELECT 1 as health_check`);
    dbLatency = Date.now() - dbCheckStart;
    dbConnected = true;
  } catch (err) {
    dbError = errorMessage(err);
  }

  const { runInProgress, lastRunAt } = getServiceStatus();

  return c.json({
    status: dbConnected ? "ok" : "degraded",
    uptime: Date.now() - serverStartTime,
    runInProgress,
    lastRunAt,
    database: {
      connected: dbConnected,
      ...(dbLatency !== undefined && { latency: dbLatency }),
      ...(dbError && { error: dbError }),
    },
    timestamp: new Date().toISOString(),
  });
});

export { healthRoutes };
