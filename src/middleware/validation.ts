/**
 * Input Validation Middleware
 *
 * Zod-based request validation for Hono routes.
 */

import type { MiddlewareHandler } from "hono";
import type { z } from "zod";

// ---------------------------------------------------------------------------
// Validation error response format
// ---------------------------------------------------------------------------

export interface ValidationErrorResponse {
  error: string;
  code: string;
  status: number;
  details: {
    issues: Array<{
      path: string;
      message: string;
    }>;
  };
}

function issueList(error: z.ZodError) {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    message: i.message,
  }));
}

// ---------------------------------------------------------------------------
// Generic validator middleware factories
// ---------------------------------------------------------------------------

/**
 * Validates the JSON request body against a Zod schema. On failure, returns
 * a structured 400 error. On success, the parsed data is available at
 * c.get("validatedBody").
 */
export function validateBody<T extends z.ZodTypeAny>(
  schema: T,
): MiddlewareHandler<{ Variables: { validatedBody: z.output<T> } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      const resp: ValidationErrorResponse = {
        error: "Request body must be valid JSON",
        code: "invalid_json",
        status: 400,
        details: { issues: [{ path: "body", message: "Failed to parse JSON" }] },
      };
      return c.json(resp, 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const resp: ValidationErrorResponse = {
        error: "Validation failed",
        code: "validation_failed",
        status: 400,
        details: { issues: issueList(result.error) },
      };
      return c.json(resp, 400);
    }

    c.set("validatedBody", result.data);
    await next();
  };
}

/**
 * Validates query string parameters against a Zod schema. On success, the
 * parsed data is available at c.get("validatedQuery").
 */
export function validateQuery<T extends z.ZodTypeAny>(
  schema: T,
): MiddlewareHandler<{ Variables: { validatedQuery: z.output<T> } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      const resp: ValidationErrorResponse = {
        error: "Invalid query parameters",
        code: "validation_failed",
        status: 400,
        details: { issues: issueList(result.error) },
      };
      return c.json(resp, 400);
    }

    c.set("validatedQuery", result.data);
    await next();
  };
}
