/**
 * Shared error types for model adapter failures
 */

/**
 * Upstream timeout error - thrown when a provider call exceeds its deadline
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly task: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamTimeoutError);
    }
  }
}

/**
 * Upstream HTTP error - thrown when a provider returns a non-2xx status.
 * Keeps the provider request id for cross-referencing provider logs.
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    public readonly elapsedMs: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamHTTPError);
    }
  }
}

/**
 * Map an SDK error (OpenAI or Anthropic) to the typed upstream errors.
 * Anything unrecognised is returned unchanged.
 */
export function toUpstreamError(
  error: unknown,
  context: { provider: string; task: string; elapsedMs: number; aborted: boolean },
): unknown {
  if (!(error instanceof Error)) return error;

  if (error.name === "AbortError" || error.name === "APIUserAbortError" || context.aborted) {
    return new UpstreamTimeoutError(
      `${context.provider} ${context.task} timed out`,
      context.provider,
      context.task,
      context.elapsedMs,
      error,
    );
  }

  const status: unknown = Reflect.get(error, "status");
  if (typeof status === "number") {
    const code: unknown = Reflect.get(error, "code") ?? Reflect.get(error, "type");
    const headers: unknown = Reflect.get(error, "headers");
    const requestId: unknown =
      headers && typeof headers === "object"
        ? Reflect.get(headers, "x-request-id") ?? Reflect.get(headers, "request-id")
        : undefined;
    return new UpstreamHTTPError(
      `${context.provider} ${context.task} failed: ${error.message || "unknown error"}`,
      context.provider,
      status,
      typeof code === "string" ? code : undefined,
      typeof requestId === "string" ? requestId : undefined,
      context.elapsedMs,
      error,
    );
  }

  return error;
}
