import OpenAI from "openai";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { DEFAULT_RETRY_CONFIG, withRetry } from "../../utils/retry.js";
import type { CallOpts, CompletionRequest, CompletionResult, LLMAdapter } from "./types.js";
import { toUpstreamError } from "./errors.js";
import { makeIdempotencyKey } from "./idempotency.js";

export const OPENAI_DEFAULT_MODEL = "gpt-4o-mini";

// Lazy initialization to allow testing without API key
let client: OpenAI | null = null;

function getClient(): OpenAI {
  const apiKey = config.llm.openaiApiKey;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY environment variable is required but not set");
  }
  if (!client) {
    // Retries are ours (withRetry); the SDK must not add its own
    client = new OpenAI({ apiKey, maxRetries: 0 });
  }
  return client;
}

export class OpenAIAdapter implements LLMAdapter {
  readonly name = "openai" as const;
  readonly model: string;

  constructor(model?: string) {
    this.model = model || OPENAI_DEFAULT_MODEL;
  }

  async complete(request: CompletionRequest, opts: CallOpts): Promise<CompletionResult> {
    // One key for every attempt of this logical call
    const idempotencyKey = makeIdempotencyKey();
    return withRetry(
      (attempt) => this.completeOnce(request, opts, idempotencyKey, attempt),
      {
        adapter: this.name,
        model: this.model,
        task: request.task,
        requestId: opts.requestId,
        abortSignal: opts.abortSignal,
      },
      { ...DEFAULT_RETRY_CONFIG, maxAttempts: config.llm.maxAttempts },
    );
  }

  private async completeOnce(
    request: CompletionRequest,
    opts: CallOpts,
    idempotencyKey: string,
    attempt: number,
  ): Promise<CompletionResult> {
    const startTime = Date.now();

    log.debug(
      {
        task: request.task,
        model: this.model,
        provider: this.name,
        request_id: opts.requestId,
        idempotency_key: idempotencyKey,
        attempt,
      },
      "calling OpenAI",
    );

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), opts.timeoutMs);
    const onCallerAbort = () => abortController.abort();
    opts.abortSignal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await getClient().chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt },
          ],
          temperature: request.temperature ?? 0,
          ...(request.json ? { response_format: { type: "json_object" as const } } : {}),
          ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
        },
        {
          signal: abortController.signal,
          headers: { "Idempotency-Key": idempotencyKey },
        },
      );

      const text = response.choices[0]?.message?.content ?? "";
      return {
        text,
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;
      log.warn({ task: request.task, elapsed_ms: elapsedMs, request_id: opts.requestId, error }, "OpenAI call failed");
      throw toUpstreamError(error, {
        provider: this.name,
        task: request.task,
        elapsedMs,
        aborted: abortController.signal.aborted,
      });
    } finally {
      clearTimeout(timeoutId);
      opts.abortSignal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
