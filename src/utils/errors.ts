import { ZodError } from "zod";
import type { ValidationIssue } from "../validators/flow-validator.types.js";

/**
 * Failure codes for structured pipeline failures
 */
export type FailureCode =
  | "EMPTY_INPUT"
  | "BAD_INPUT"
  | "GENERATION_FAILED"
  | "VALIDATION_FAILED"
  | "AUTO_FIX_DID_NOT_CONVERGE"
  | "INTERNAL";

/**
 * Structured failure returned to the driver (failure.v1 schema)
 */
export interface PipelineFailure {
  schema: "failure.v1";
  code: FailureCode;
  message: string;
  issues?: ValidationIssue[];
  details?: Record<string, unknown>;
}

/**
 * Raised when the input document is empty or unreadable.
 * The only fatal extraction-time condition.
 */
export class EmptyInputError extends Error {
  readonly code = "EMPTY_INPUT" as const;

  constructor(message = "Input document is empty") {
    super(message);
    this.name = "EmptyInputError";
  }
}

/**
 * Raised when generation cannot produce a consistent graph,
 * e.g. two chunks declaring one variable with incompatible types.
 */
export class GenerationError extends Error {
  readonly code = "GENERATION_FAILED" as const;

  constructor(
    message: string,
    readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "GenerationError";
  }
}

/**
 * Build a structured failure
 */
export function buildFailure(
  code: FailureCode,
  message: string,
  extras: { issues?: ValidationIssue[]; details?: Record<string, unknown> } = {}
): PipelineFailure {
  const failure: PipelineFailure = {
    schema: "failure.v1",
    code,
    message,
  };

  if (extras.issues && extras.issues.length > 0) {
    failure.issues = extras.issues;
  }

  if (extras.details && Object.keys(extras.details).length > 0) {
    failure.details = extras.details;
  }

  return failure;
}

/**
 * Convert Zod validation error to a failure
 */
export function zodErrorToFailure(error: ZodError): PipelineFailure {
  return buildFailure("BAD_INPUT", "Validation failed", {
    details: { validation_errors: error.flatten() },
  });
}

/**
 * Remove file paths and inline secrets from an error message
 */
export function sanitizeMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, "[path]")
    .replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]")
    .replace(/[A-Z_]+_?SECRET=\S+/gi, "[SECRET_REDACTED]")
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, "[email]");
}

/**
 * Convert any error to a failure (safe, never leaks stack/PII)
 */
export function toFailure(error: unknown): PipelineFailure {
  if (error instanceof ZodError) {
    return zodErrorToFailure(error);
  }

  if (error instanceof EmptyInputError) {
    return buildFailure("EMPTY_INPUT", error.message);
  }

  if (error instanceof GenerationError) {
    return buildFailure("GENERATION_FAILED", sanitizeMessage(error.message), {
      details: error.details,
    });
  }

  if (error instanceof Error) {
    const message = sanitizeMessage(error.message || "An unexpected error occurred");
    return buildFailure("INTERNAL", message);
  }

  return buildFailure("INTERNAL", "An unexpected error occurred");
}
