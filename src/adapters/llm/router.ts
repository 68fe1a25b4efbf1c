/**
 * Provider router.
 *
 * Selects the model adapter (OpenAI, Anthropic, Fixtures) from LLM_PROVIDER
 * and LLM_MODEL. Instances are cached per provider and model.
 */

import { log } from "../../utils/telemetry.js";
import { config } from "../../config/index.js";
import type { CallOpts, CompletionRequest, CompletionResult, LLMAdapter } from "./types.js";
import { AnthropicAdapter } from "./anthropic.js";
import { OpenAIAdapter } from "./openai.js";

export type ProviderName = "anthropic" | "openai" | "fixtures";

const FIXTURE_ANSWER_MAX_CHARS = 2000;

/**
 * Fixtures adapter for running without API keys.
 * Deterministic replies per task:
 * - profile_extraction: an empty object (keyword extraction stands alone)
 * - coach_response: the prompt echoed back under a fixed header
 * - answer_judge / answer_compare: a fixed verdict
 */
export class FixturesAdapter implements LLMAdapter {
  readonly name = "fixtures" as const;
  readonly model = "fixture-v1";

  async complete(request: CompletionRequest, _opts: CallOpts): Promise<CompletionResult> {
    return { text: this.reply(request), usage: { input_tokens: 0, output_tokens: 0 } };
  }

  private reply(request: CompletionRequest): string {
    switch (request.task) {
      case "profile_extraction":
        return "{}";
      case "coach_response":
        return `Fixture advice based on:\n${request.prompt}`.slice(0, FIXTURE_ANSWER_MAX_CHARS);
      case "answer_judge":
        return JSON.stringify({ verdict: "pass", reason: "fixture judge" });
      case "answer_compare":
        return JSON.stringify({ winner: "tie", reason: "fixture comparison" });
    }
  }
}

const adapters: Map<string, LLMAdapter> = new Map();

function createAdapter(provider: ProviderName, model?: string): LLMAdapter {
  switch (provider) {
    case "anthropic":
      return new AnthropicAdapter(model);
    case "openai":
      return new OpenAIAdapter(model);
    case "fixtures":
      return new FixturesAdapter();
  }
}

/**
 * Get or create an adapter instance for the given provider and model.
 */
export function getAdapterInstance(provider: ProviderName, model?: string): LLMAdapter {
  const cacheKey = `${provider}:${model || "default"}`;
  const cached = adapters.get(cacheKey);
  if (cached) return cached;

  const adapter = createAdapter(provider, model);
  adapters.set(cacheKey, adapter);
  log.info({ provider: adapter.name, model: adapter.model, cache_key: cacheKey }, "Created LLM adapter instance");
  return adapter;
}

/**
 * Adapter selected by configuration (LLM_PROVIDER, LLM_MODEL).
 */
export function getAdapter(): LLMAdapter {
  return getAdapterInstance(config.llm.provider, config.llm.model);
}

/**
 * Reset adapter cache (for testing only)
 *
 * @internal
 */
export function _resetAdapterCache(): void {
  adapters.clear();
}
