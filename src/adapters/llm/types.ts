/**
 * Provider-agnostic language model interface.
 *
 * Every adapter (OpenAI, Anthropic, fixtures) and every test fake implements
 * LLMAdapter. The advisor treats the model as an opaque completion call; all
 * structure in a reply is validated by the caller.
 */

/**
 * Usage metrics returned by model calls for telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

export type ModelTask = "profile_extraction" | "coach_response" | "answer_judge" | "answer_compare";

export interface CompletionRequest {
  task: ModelTask;
  system: string;
  prompt: string;
  temperature?: number;
  /** Ask the provider for a JSON object reply where it supports that. */
  json?: boolean;
  maxTokens?: number;
}

export interface CompletionResult {
  text: string;
  usage: UsageMetrics;
}

/**
 * Call options for request tracking and timeouts.
 */
export interface CallOpts {
  requestId: string;
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

export interface LLMAdapter {
  /**
   * Provider name for telemetry and routing.
   */
  readonly name: "anthropic" | "openai" | "fixtures" | string;

  /**
   * Model identifier (provider-specific, e.g. "gpt-4o-mini").
   */
  readonly model: string;

  /**
   * @throws UpstreamTimeoutError or UpstreamHTTPError on provider failures
   */
  complete(request: CompletionRequest, opts: CallOpts): Promise<CompletionResult>;
}

/** Alias used by the advisor components. */
export type LanguageModel = LLMAdapter;
