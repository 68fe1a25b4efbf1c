/**
 * Single entry point for model calls made by the advisor components.
 *
 * Adds a hard deadline (an adapter that ignores its abort signal still
 * resolves to a timeout), circuit-breaker bookkeeping, telemetry and the
 * mapping of every failure to ExternalCallFailure.
 */

import type { CircuitBreaker } from "../../utils/circuit-breaker.js";
import { ExternalCallFailure, errorMessage, type ExternalFailureReason } from "../../utils/errors.js";
import { emit, TelemetryEvents } from "../../utils/telemetry.js";
import { UpstreamHTTPError, UpstreamTimeoutError } from "./errors.js";
import type { CompletionRequest, CompletionResult, LLMAdapter } from "./types.js";

export interface GuardOptions {
  requestId: string;
  timeoutMs: number;
  breaker?: CircuitBreaker;
}

function failureReason(error: unknown): ExternalFailureReason {
  if (error instanceof UpstreamTimeoutError) return "timeout";
  if (error instanceof UpstreamHTTPError) return "http_error";
  return "error";
}

/**
 * @throws ExternalCallFailure when the call fails, times out, returns only
 * whitespace, or is skipped because the circuit is open
 */
export async function callModel(
  adapter: LLMAdapter,
  request: CompletionRequest,
  options: GuardOptions,
): Promise<CompletionResult> {
  const { breaker } = options;
  if (breaker && !breaker.allowRequest()) {
    emit(TelemetryEvents.LlmCircuitOpen, { task: request.task, provider: adapter.name, request_id: options.requestId });
    throw new ExternalCallFailure(`Model circuit open; skipped ${request.task}`, request.task, "circuit_open");
  }

  const startTime = Date.now();
  const abortController = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      abortController.abort();
      reject(
        new UpstreamTimeoutError(
          `${adapter.name} ${request.task} exceeded ${options.timeoutMs}ms`,
          adapter.name,
          request.task,
          Date.now() - startTime,
        ),
      );
    }, options.timeoutMs);
  });

  try {
    const result = await Promise.race([
      adapter.complete(request, {
        requestId: options.requestId,
        timeoutMs: options.timeoutMs,
        abortSignal: abortController.signal,
      }),
      deadline,
    ]);

    if (!result.text.trim()) {
      throw new ExternalCallFailure(`Empty reply for ${request.task}`, request.task, "empty_response");
    }

    breaker?.recordSuccess();
    emit(TelemetryEvents.LlmCallCompleted, {
      task: request.task,
      provider: adapter.name,
      model: adapter.model,
      elapsed_ms: Date.now() - startTime,
      input_tokens: result.usage.input_tokens,
      output_tokens: result.usage.output_tokens,
      request_id: options.requestId,
    });
    return result;
  } catch (error) {
    breaker?.recordFailure();
    const failure =
      error instanceof ExternalCallFailure
        ? error
        : new ExternalCallFailure(errorMessage(error), request.task, failureReason(error), error);
    emit(TelemetryEvents.LlmCallFailed, {
      task: request.task,
      provider: adapter.name,
      reason: failure.reason,
      elapsed_ms: Date.now() - startTime,
      request_id: options.requestId,
    });
    throw failure;
  } finally {
    clearTimeout(timeoutId);
  }
}
