import Anthropic from "@anthropic-ai/sdk";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { DEFAULT_RETRY_CONFIG, withRetry } from "../../utils/retry.js";
import type { CallOpts, CompletionRequest, CompletionResult, LLMAdapter } from "./types.js";
import { toUpstreamError } from "./errors.js";
import { makeIdempotencyKey } from "./idempotency.js";

export const ANTHROPIC_DEFAULT_MODEL = "claude-3-5-haiku-20241022";

const DEFAULT_MAX_TOKENS = 1024;

let client: Anthropic | null = null;

function getClient(): Anthropic {
  const apiKey = config.llm.anthropicApiKey;
  if (!apiKey) {
    throw new Error("ANTHROPIC_API_KEY environment variable is required but not set");
  }
  if (!client) {
    client = new Anthropic({ apiKey, maxRetries: 0 });
  }
  return client;
}

/** JSON mode is a prompt instruction here; the provider has no response_format. */
function systemPrompt(request: CompletionRequest): string {
  return request.json
    ? `${request.system}\n\nRespond with a single JSON object and nothing else.`
    : request.system;
}

export class AnthropicAdapter implements LLMAdapter {
  readonly name = "anthropic" as const;
  readonly model: string;

  constructor(model?: string) {
    this.model = model || ANTHROPIC_DEFAULT_MODEL;
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
      "calling Anthropic",
    );

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), opts.timeoutMs);
    const onCallerAbort = () => abortController.abort();
    opts.abortSignal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await getClient().messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: request.temperature ?? 0,
          system: systemPrompt(request),
          messages: [{ role: "user", content: request.prompt }],
        },
        {
          signal: abortController.signal,
          headers: { "Idempotency-Key": idempotencyKey },
        },
      );

      const text = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
      return {
        text,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;
      log.warn({ task: request.task, elapsed_ms: elapsedMs, request_id: opts.requestId, error }, "Anthropic call failed");
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
