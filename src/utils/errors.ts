import { ZodError } from "zod";

/**
 * Issue kinds a turn can record. Issues are returned as data on the turn
 * result; none of them escapes runTurn() as an exception.
 */
export type IssueKind =
  | "ValidationError"
  | "ComputationError"
  | "RetrievalMiss"
  | "ExternalCallFailure"
  | "PersistenceError";

/** A recorded problem. The planner adds the stage it happened in. */
export interface Issue {
  kind: IssueKind;
  message: string;
  detail?: Record<string, unknown>;
}

export type ExternalFailureReason = "timeout" | "http_error" | "empty_response" | "circuit_open" | "error";

/**
 * A language-model (or other external) call that did not produce a usable
 * reply. Triggers the planner's fallback path for the stage that made it.
 */
export class ExternalCallFailure extends Error {
  readonly name = "ExternalCallFailure";

  constructor(
    message: string,
    public readonly task: string,
    public readonly reason: ExternalFailureReason,
    public readonly cause?: unknown,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExternalCallFailure);
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error codes for structured HTTP error responses
 */
export type ErrorCode = "BAD_INPUT" | "NOT_FOUND" | "RATE_LIMITED" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string,
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1("BAD_INPUT", "Validation failed", { validation_errors: error.flatten() }, requestId);
}

function statusOf(error: Error): number | undefined {
  const status: unknown = Reflect.get(error, "statusCode") ?? Reflect.get(error, "status");
  return typeof status === "number" ? status : undefined;
}

/**
 * Convert any error to ErrorV1 (never leaks stack traces or file paths)
 */
export function toErrorV1(error: unknown, requestId?: string): ErrorV1 {
  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof Error) {
    const status = statusOf(error);
    if (status === 429 || error.message.toLowerCase().includes("rate limit")) {
      return buildErrorV1("RATE_LIMITED", "Too many requests", undefined, requestId);
    }
    if (status === 400) {
      return buildErrorV1("BAD_INPUT", error.message, undefined, requestId);
    }

    let message = error.message || "An unexpected error occurred";
    message = message.replace(/\/[\w/.@-]+/g, "[path]");
    message = message.replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]");
    message = message.replace(/[\w.-]+@[\w.-]+\.\w+/g, "[email]");
    return buildErrorV1("INTERNAL", message, undefined, requestId);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "RATE_LIMITED":
      return 429;
    case "INTERNAL":
    default:
      return 500;
  }
}
