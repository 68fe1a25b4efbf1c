/**
 * Model-as-judge helpers for evaluating advisor answers.
 *
 * Both helpers treat the model reply as untrusted JSON and degrade to a
 * neutral outcome ("unavailable" / "tie") instead of throwing.
 */

import { z } from "zod";
import { callModel } from "../adapters/llm/guarded-call.js";
import type { LanguageModel } from "../adapters/llm/types.js";
import { errorMessage } from "../utils/errors.js";
import { extractJson } from "../utils/json-extractor.js";
import { log } from "../utils/telemetry.js";

export const DEFAULT_CRITERIA = "practical, accurate water conservation advice for the farmer's situation";

const JudgeReply = z.object({
  verdict: z.enum(["pass", "fail"]),
  reason: z.string().default(""),
});

const CompareReply = z.object({
  winner: z.enum(["A", "B", "tie"]),
  reason: z.string().default(""),
});

export interface JudgeOutcome {
  verdict: "pass" | "fail" | "unavailable";
  reason: string;
}

export interface CompareOutcome {
  winner: "A" | "B" | "tie";
  reason: string;
  /** false when the model gave no usable verdict and "tie" was assumed */
  decided: boolean;
}

export interface JudgeCallOptions {
  requestId?: string;
  timeoutMs?: number;
  criteria?: string;
}

const DEFAULT_TIMEOUT_MS = 20_000;

const JUDGE_SYSTEM = `You are an expert agricultural advisor reviewing another advisor's answer.
Output ONLY valid JSON in this format:
{"verdict": "pass"|"fail", "reason": "brief explanation"}`;

const COMPARE_SYSTEM = `You are an expert agricultural advisor evaluator. Compare two answers and decide which is better for the given criteria.
Output ONLY valid JSON in this format:
{"winner": "A"|"B"|"tie", "reason": "brief explanation"}`;

/**
 * Ask the model whether `answer` is an acceptable reply to `question`.
 */
export async function judgeAnswer(
  model: LanguageModel,
  input: { question: string; answer: string },
  options: JudgeCallOptions = {},
): Promise<JudgeOutcome> {
  const criteria = options.criteria ?? DEFAULT_CRITERIA;
  const prompt = `Farmer message:\n${input.question}\n\nAdvisor answer:\n${input.answer}\n\nCriteria: ${criteria}\n\nIs the answer acceptable? Output JSON only.`;

  try {
    const reply = await callModel(
      model,
      { task: "answer_judge", system: JUDGE_SYSTEM, prompt, temperature: 0, json: true },
      { requestId: options.requestId ?? "judge", timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS },
    );
    const parsed = JudgeReply.safeParse(extractJson(reply.text, { task: "answer_judge" }));
    if (!parsed.success) {
      return { verdict: "unavailable", reason: `Unusable judge reply: ${reply.text.slice(0, 100)}` };
    }
    return parsed.data;
  } catch (error) {
    log.warn({ error: errorMessage(error) }, "Answer judge unavailable");
    return { verdict: "unavailable", reason: errorMessage(error) };
  }
}

/**
 * Pairwise critic: which of two answers is better for `criteria`.
 */
export async function compareAnswers(
  model: LanguageModel,
  answerA: string,
  answerB: string,
  options: JudgeCallOptions = {},
): Promise<CompareOutcome> {
  const criteria = options.criteria ?? DEFAULT_CRITERIA;
  const prompt = `Compare these two agricultural advisory answers:\n\nAnswer A:\n${answerA}\n\nAnswer B:\n${answerB}\n\nCriteria: ${criteria}\n\nWhich answer is better? Output JSON only.`;

  try {
    const reply = await callModel(
      model,
      { task: "answer_compare", system: COMPARE_SYSTEM, prompt, temperature: 0.1, json: true },
      { requestId: options.requestId ?? "compare", timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS },
    );
    const parsed = CompareReply.safeParse(extractJson(reply.text, { task: "answer_compare" }));
    if (!parsed.success) {
      return { winner: "tie", reason: `Could not parse response: ${reply.text.slice(0, 100)}`, decided: false };
    }
    return { ...parsed.data, decided: true };
  } catch (error) {
    log.warn({ error: errorMessage(error) }, "Answer comparison unavailable");
    return { winner: "tie", reason: errorMessage(error), decided: false };
  }
}
