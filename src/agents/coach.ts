/**
 * Coach / Response Synthesizer
 *
 * Builds the prompt from everything the turn produced and asks the model for
 * the farmer-facing answer. Failures surface as ExternalCallFailure; the
 * planner substitutes the templated answer from fallback-response.ts.
 */

import { callModel } from "../adapters/llm/guarded-call.js";
import type { LanguageModel } from "../adapters/llm/types.js";
import type { SessionTurn } from "../memory/session-store.js";
import { cropLabel, type FarmerProfileT } from "../schemas/farmer.js";
import type { TipSnippetT } from "../schemas/tips.js";
import { formatM3, type WaterFootprintResult } from "../tools/water-footprint.js";
import type { CircuitBreaker } from "../utils/circuit-breaker.js";
import type { Scenario } from "./scenario-generator.js";

export interface CoachContext {
  profile: FarmerProfileT;
  footprint?: WaterFootprintResult;
  tips: readonly TipSnippetT[];
  scenarios: readonly Scenario[];
  userMessage: string;
  history: readonly SessionTurn[];
}

export interface CoachOptions {
  model: LanguageModel;
  timeoutMs: number;
  breaker?: CircuitBreaker;
  /** When set, the answer ends with a short summary in this language. */
  summaryLanguage?: string;
}

const COACH_SYSTEM = [
  "You are a practical irrigation advisor for small farmers in water-scarce regions.",
  "Use only the numbers given in the context; do not invent figures.",
  "Give concrete, low-cost actions first. Keep the answer under 250 words.",
].join("\n");

export function formatProfile(profile: FarmerProfileT): string[] {
  const crops = profile.mainCrops.length > 0 ? profile.mainCrops.map(cropLabel).join(", ") : "not specified";
  const land = profile.landSizeHa === "unknown" ? "not specified" : `${profile.landSizeHa} ha`;
  return [
    `- Region: ${profile.region === "unknown" ? "not specified" : profile.region}`,
    `- Land size: ${land}`,
    `- Main crops: ${crops}`,
    `- Irrigation: ${profile.irrigationType}`,
    `- Water availability: ${profile.waterLevel}`,
  ];
}

export function formatFootprint(footprint: WaterFootprintResult): string[] {
  const lines = [`- Total applied water: ${formatM3(footprint.totalAppliedDemandM3)} per season`];
  for (const crop of footprint.crops) {
    lines.push(`  - ${crop.crop}: ${formatM3(crop.appliedDemandM3)} on ${crop.areaHa.toFixed(2)} ha`);
  }
  for (const assumption of footprint.assumptions) {
    lines.push(`- Assumption: ${assumption}`);
  }
  return lines;
}

export function formatScenario(scenario: Scenario): string {
  return `- ${scenario.label}: ${formatM3(scenario.footprint.totalAppliedDemandM3)} (saves ${scenario.savingsPct.toFixed(1)}%; ${scenario.assumptions[scenario.assumptions.length - 1] ?? ""})`;
}

export function buildCoachPrompt(context: CoachContext, summaryLanguage?: string): string {
  const sections: string[] = [];

  sections.push(["## Farmer profile", ...formatProfile(context.profile)].join("\n"));

  if (context.footprint) {
    sections.push(["## Water footprint", ...formatFootprint(context.footprint)].join("\n"));
    if (context.footprint.recommendedSwitches.length > 0) {
      sections.push(
        ["## Suggested switches", ...context.footprint.recommendedSwitches.map((s) => `- ${s}`)].join("\n"),
      );
    }
  }

  if (context.tips.length > 0) {
    sections.push(["## Agronomy tips", ...context.tips.map((tip) => `- ${tip.title}: ${tip.text}`)].join("\n"));
  }

  if (context.scenarios.length > 0) {
    sections.push(["## Scenarios", ...context.scenarios.map(formatScenario)].join("\n"));
  }

  if (context.history.length > 0) {
    sections.push(
      [
        "## Earlier in this conversation",
        ...context.history.map((turn) => `- Farmer: ${turn.userMessage}\n  Advisor: ${turn.answer}`),
      ].join("\n"),
    );
  }

  sections.push(`## Farmer message\n${context.userMessage}`);

  const instructions = ["Answer the farmer's message using the context above."];
  if (summaryLanguage) {
    instructions.push(`End with a two-sentence summary in ${summaryLanguage}.`);
  }
  sections.push(instructions.join(" "));

  return sections.join("\n\n");
}

export class Coach {
  constructor(private readonly options: CoachOptions) {}

  /**
   * @throws ExternalCallFailure when no usable answer comes back
   */
  async respond(context: CoachContext, call: { requestId: string }): Promise<string> {
    const result = await callModel(
      this.options.model,
      {
        task: "coach_response",
        system: COACH_SYSTEM,
        prompt: buildCoachPrompt(context, this.options.summaryLanguage),
        temperature: 0.3,
      },
      { requestId: call.requestId, timeoutMs: this.options.timeoutMs, breaker: this.options.breaker },
    );
    return result.text.trim();
  }
}
