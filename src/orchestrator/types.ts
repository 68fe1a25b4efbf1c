/**
 * Advisor turn types.
 */

import type { Scenario } from "../agents/scenario-generator.js";
import type { AnswerSource } from "../memory/session-store.js";
import type { FarmerProfileT } from "../schemas/farmer.js";
import type { TipSnippetT } from "../schemas/tips.js";
import type { WaterFootprintResult } from "../tools/water-footprint.js";
import type { Issue } from "../utils/errors.js";

// ============================================================================
// Turn state machine
// ============================================================================

export const TURN_STATES = [
  "RECEIVED",
  "PROFILE_UPDATED",
  "FOOTPRINT_COMPUTED",
  "TIPS_RETRIEVED",
  "SCENARIOS_GENERATED",
  "RESPONSE_SYNTHESIZED",
  "PERSISTED",
  "DONE",
] as const;

export type TurnState = (typeof TURN_STATES)[number];

export type StageStatus = "ok" | "degraded" | "failed";

export interface TraceEntry {
  state: TurnState;
  status: StageStatus;
  elapsedMs: number;
  note?: string;
}

export interface TurnIssue extends Issue {
  stage: TurnState;
}

// ============================================================================
// Turn result
// ============================================================================

export interface TurnDiagnostics {
  /** True when any issue was recorded or the answer came from the template. */
  degraded: boolean;
  issues: TurnIssue[];
  trace: TraceEntry[];
}

export interface TurnResult {
  farmerId: string;
  /** Index this turn holds in the farmer's session; 0 when the request was rejected. */
  turnIndex: number;
  answer: string;
  answerSource: AnswerSource;
  /** null only when the calculation itself failed */
  waterFootprint: WaterFootprintResult | null;
  scenarios: Scenario[];
  tips: TipSnippetT[];
  profile: FarmerProfileT;
  diagnostics: TurnDiagnostics;
}

export interface RunTurnOptions {
  requestId?: string;
}
