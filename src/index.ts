/**
 * Public API of the irrigation advisor.
 */

export { Planner, createAdvisor, buildRetrievalQuery, settingsFromConfig, DEFAULT_PLANNER_SETTINGS } from "./orchestrator/planner.js";
export type { PlannerDeps, PlannerSettings, CreateAdvisorOptions } from "./orchestrator/planner.js";
export { TURN_STATES } from "./orchestrator/types.js";
export type { TurnResult, TurnState, TurnIssue, TraceEntry, StageStatus, TurnDiagnostics } from "./orchestrator/types.js";

export { Profiler, validateModelExtraction } from "./agents/profiler.js";
export type { ProfileExtraction, RejectedField } from "./agents/profiler.js";
export { extractProfileHeuristically } from "./agents/profile-heuristics.js";
export { generateScenarios, baselineAllocation, SCENARIO_SHIFTS } from "./agents/scenario-generator.js";
export type { Scenario, ScenarioLabel } from "./agents/scenario-generator.js";
export { Coach, buildCoachPrompt } from "./agents/coach.js";
export { buildFallbackAnswer } from "./agents/fallback-response.js";

export { computeWaterFootprint, appliedDemandPerHa } from "./tools/water-footprint.js";
export type { CropAllocation, CropWaterDemand, WaterFootprintResult } from "./tools/water-footprint.js";
export { LexicalKnowledgeRetriever, createDefaultRetriever, loadTipCorpus, tokenize } from "./tools/knowledge-retriever.js";
export type { KnowledgeRetriever } from "./tools/knowledge-retriever.js";

export { MemoryBank, mergeProfile, createDefaultProfile } from "./memory/memory-bank.js";
export { SessionStore } from "./memory/session-store.js";
export type { SessionTurn, AnswerSource } from "./memory/session-store.js";
export { InteractionLog } from "./observability/interaction-log.js";
export type { InteractionLogEntry } from "./observability/interaction-log.js";

export { judgeAnswer, compareAnswers } from "./evaluation/judge.js";
export type { JudgeOutcome, CompareOutcome } from "./evaluation/judge.js";
export { runGolden, checkAssertion } from "./evaluation/golden.js";
export type { GoldenResult } from "./evaluation/golden.js";
export { GOLDEN_CASES } from "./evaluation/golden-cases.js";
export type { GoldenCase, GoldenAssertion } from "./evaluation/golden-cases.js";

export { FixturesAdapter, getAdapter, getAdapterInstance } from "./adapters/llm/router.js";
export type { LLMAdapter, LanguageModel, CompletionRequest, CompletionResult, ModelTask } from "./adapters/llm/types.js";

export { KNOWN_CROPS, CROP_REFERENCE, resolveCrop } from "./reference/crops.js";
export type { KnownCrop } from "./reference/crops.js";
export { IRRIGATION_TYPES, WATER_LEVELS, IRRIGATION_EFFICIENCY } from "./reference/irrigation.js";
export type { IrrigationType, WaterLevel } from "./reference/irrigation.js";
export { FarmerProfile, ProfileUpdate, CropEntry } from "./schemas/farmer.js";
export type { FarmerProfileT, ProfileUpdateT, CropEntryT } from "./schemas/farmer.js";
export type { TipSnippetT } from "./schemas/tips.js";
export { ExternalCallFailure } from "./utils/errors.js";
export type { Issue, IssueKind } from "./utils/errors.js";
