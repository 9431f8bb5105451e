/**
 * Standardized Error Handling
 *
 * Error taxonomy for scoring runs plus the consistent error response format
 * used by the API routes. Format: { error: string, code: string, details?: unknown }
 *
 * Recovery rules:
 * - UnitExecutionError: recovered inside the execution pool (unit contributes no findings)
 * - StageError: recovered at the pipeline stage boundary (stage output defaults to empty)
 * - ConfigurationError: rejected weight input; all-zero weights degrade instead of throwing
 * - FatalError: never recovered, propagates out of the orchestrator
 */

import type { Context } from "hono";

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
}

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 400 Bad Request
  VALIDATION_FAILED: { status: 400, code: "validation_failed" },
  INVALID_WEIGHTS: { status: 400, code: "invalid_weights" },

  // 404 Not Found
  RUN_NOT_FOUND: { status: 404, code: "run_not_found" },

  // 409 Conflict
  RUN_IN_PROGRESS: { status: 409, code: "run_in_progress" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, code: "internal_error" },
  UNIT_EXECUTION_FAILED: { status: 500, code: "unit_execution_failed" },
  STAGE_FAILED: { status: 500, code: "stage_failed" },
  FATAL: { status: 500, code: "fatal" },
} as const;

export type ErrorCodeKey = keyof typeof ErrorCodes;
export type ErrorStatus = (typeof ErrorCodes)[ErrorCodeKey]["status"];

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class AppError extends Error {
  public readonly statusCode: ErrorStatus;
  public readonly errorCode: string;

  constructor(errorCode: ErrorCodeKey, message: string) {
    super(message);
    this.name = "AppError";
    this.statusCode = ErrorCodes[errorCode].status;
    this.errorCode = ErrorCodes[errorCode].code;
  }
}

/** A scoring unit threw, rejected, or returned output that failed validation. */
export class UnitExecutionError extends AppError {
  public readonly unitName: string;

  constructor(unitName: string, message: string) {
    super("UNIT_EXECUTION_FAILED", `${unitName}: ${message}`);
    this.name = "UnitExecutionError";
    this.unitName = unitName;
  }
}

/** A pipeline stage threw; the orchestrator substitutes the stage's empty output. */
export class StageError extends AppError {
  public readonly stage: string;

  constructor(stage: string, message: string) {
    super("STAGE_FAILED", `${stage}: ${message}`);
    this.name = "StageError";
    this.stage = stage;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super("INVALID_WEIGHTS", message);
    this.name = "ConfigurationError";
  }
}

/** No safe default exists. Aborts the run instead of emitting partial scores. */
export class FatalError extends AppError {
  constructor(message: string) {
    super("FATAL", message);
    this.name = "FatalError";
  }
}

export class RunInProgressError extends AppError {
  constructor(holderInfo: string) {
    super("RUN_IN_PROGRESS", `scoring run ${holderInfo} is still in progress`);
    this.name = "RunInProgressError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Message of any thrown value, for logs and error summaries. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Create a standardized API error response
 */
export function apiError(
  c: Context,
  errorCode: ErrorCodeKey,
  details?: unknown,
) {
  const { status, code } = ErrorCodes[errorCode];
  const response: ApiError = {
    error: code,
    code,
    ...(details !== undefined && { details }),
  };
  return c.json(response, status);
}
