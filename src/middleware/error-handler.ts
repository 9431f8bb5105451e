/**
 * Global Error Handler Middleware
 *
 * Catches unhandled errors in any route and returns a consistent
 * structured JSON response. Also logs errors with timestamps for
 * debugging.
 */

import type { Context } from "hono";
import { AppError } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Error response type
// ---------------------------------------------------------------------------

export interface StructuredError {
  error: string;
  code: string;
  status: 400 | 404 | 409 | 500;
}

// ---------------------------------------------------------------------------
// Error mapper: known error types → structured response
// ---------------------------------------------------------------------------

export function mapErrorToResponse(err: unknown): StructuredError {
  if (err instanceof AppError) {
    return {
      error: err.message,
      code: err.errorCode,
      status: err.statusCode,
    };
  }

  if (err instanceof Error) {
    if (err.name === "ZodError") {
      return {
        error: "Validation failed",
        code: "validation_failed",
        status: 400,
      };
    }

    if (err instanceof SyntaxError && err.message.includes("JSON")) {
      return {
        error: "Invalid request body",
        code: "invalid_json",
        status: 400,
      };
    }

    return {
      error: "Internal server error",
      code: "internal_error",
      status: 500,
    };
  }

  return {
    error: "An unexpected error occurred",
    code: "internal_error",
    status: 500,
  };
}

// ---------------------------------------------------------------------------
// Logging helper
// ---------------------------------------------------------------------------

function logError(err: unknown, path: string, method: string): void {
  const timestamp = new Date().toISOString();
  const errMsg =
    err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  const stack = err instanceof Error ? err.stack : undefined;

  console.error(
    JSON.stringify({
      level: "error",
      timestamp,
      method,
      path,
      error: errMsg,
      ...(stack && { stack }),
    })
  );
}

// ---------------------------------------------------------------------------
// Hono handlers
// ---------------------------------------------------------------------------

/**
 * Global error handler for Hono's app.onError().
 *
 * Client errors (4xx) are expected outcomes and are not logged.
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  const structured = mapErrorToResponse(err);
  if (structured.status >= 500) {
    logError(err, c.req.path, c.req.method);
  }
  return c.json(structured, structured.status);
}

/**
 * Global 404 handler for Hono's app.notFound().
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    {
      error: `Route ${c.req.method} ${c.req.path} not found`,
      code: "not_found",
      status: 404,
    },
    404
  );
}
