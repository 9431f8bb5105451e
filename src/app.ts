import { Hono } from "hono";
import { healthRoutes } from "./routes/health.ts";
import { runRoutes } from "./routes/runs.ts";
import { weightRoutes } from "./routes/weights.ts";
import { globalErrorHandler, notFoundHandler } from "./middleware/error-handler.ts";

const app = new Hono();

app.onError(globalErrorHandler);
app.notFound(notFoundHandler);

// Health check
app.route("/health", healthRoutes);

// Scoring runs and ranked exports
app.route("/api/v1/runs", runRoutes);

// Agent weight vector
app.route("/api/v1/weights", weightRoutes);

export default app;
