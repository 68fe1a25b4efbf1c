import { emit, TelemetryEvents } from "./telemetry.js";

/**
 * Backoff settings for provider calls. maxAttempts counts the first call.
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitterPercent: number;
}

export interface RetryContext {
  adapter: string;
  model: string;
  task: string;
  requestId?: string;
  /** Once aborted (the turn's deadline passed), no further attempt is made. */
  abortSignal?: AbortSignal;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  backoffFactor: 2,
  jitterPercent: 20,
};

const TRANSIENT_MESSAGES: readonly RegExp[] = [
  /ETIMEDOUT/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /socket hang up/i,
  /rate.?limit/i,
  /too many requests/i,
  /overloaded/i,
  /service unavailable/i,
  /temporarily unavailable/i,
];

const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

function statusOf(error: object): number | undefined {
  for (const field of ["status", "statusCode"]) {
    const value: unknown = Reflect.get(error, field);
    if (typeof value === "number") return value;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Transient provider failures: 408/429/5xx statuses, connection resets and
 * overload messages. A timeout is never retried; the deadline has passed.
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;
  if (error instanceof Error && error.name === "UpstreamTimeoutError") return false;

  if (typeof error === "object") {
    const status = statusOf(error);
    if (status !== undefined) return TRANSIENT_STATUSES.has(status);
  }

  const message = messageOf(error);
  return TRANSIENT_MESSAGES.some((pattern) => pattern.test(message));
}

/**
 * Exponential backoff capped at maxDelayMs, with ±jitterPercent jitter.
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const capped = Math.min(config.baseDelayMs * config.backoffFactor ** (attempt - 1), config.maxDelayMs);
  const jitterRange = (capped * config.jitterPercent) / 100;
  const jitter = Math.random() * jitterRange * 2 - jitterRange;
  return Math.max(0, Math.floor(capped + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds, fails with a non-transient error, runs out of
 * attempts or the caller aborts. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  context: RetryContext,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
): Promise<T> {
  const tags = {
    adapter: context.adapter,
    model: context.model,
    task: context.task,
    ...(context.requestId ? { request_id: context.requestId } : {}),
  };

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn(attempt);
      if (attempt > 1) {
        emit(TelemetryEvents.LlmRetrySuccess, { ...tags, total_attempts: attempt });
      }
      return result;
    } catch (error) {
      if (!isRetryableError(error) || context.abortSignal?.aborted) {
        throw error;
      }
      if (attempt >= config.maxAttempts) {
        emit(TelemetryEvents.LlmRetryExhausted, {
          ...tags,
          total_attempts: attempt,
          error_message: messageOf(error),
        });
        throw error;
      }

      const delay = calculateBackoffDelay(attempt, config);
      emit(TelemetryEvents.LlmRetry, {
        ...tags,
        attempt,
        max_attempts: config.maxAttempts,
        delay_ms: delay,
        reason: messageOf(error).slice(0, 100),
      });
      await sleep(delay);
    }
  }
}
