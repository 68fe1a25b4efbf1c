/**
 * Planner — advisor turn orchestration
 *
 * Processing flow (one state per stage, recorded in the turn trace):
 * RECEIVED → PROFILE_UPDATED → FOOTPRINT_COMPUTED → TIPS_RETRIEVED →
 * SCENARIOS_GENERATED → RESPONSE_SYNTHESIZED → PERSISTED → DONE
 *
 * - The per-farmer lock is held for the whole turn; turns for other farmers
 *   proceed concurrently.
 * - A failing stage records an issue and the turn continues with what it has.
 * - Nothing is written before PERSISTED; the writes there run in one
 *   synchronous block.
 * - runTurn() never rejects.
 */

import { randomUUID } from "node:crypto";
import { Coach, type CoachContext } from "../agents/coach.js";
import { buildFallbackAnswer } from "../agents/fallback-response.js";
import { Profiler, type ProfileExtraction } from "../agents/profiler.js";
import {
  baselineAllocation,
  generateScenarios,
  landAssumptionLine,
  type Scenario,
} from "../agents/scenario-generator.js";
import { getAdapter } from "../adapters/llm/router.js";
import type { LanguageModel } from "../adapters/llm/types.js";
import { config } from "../config/index.js";
import { MemoryBank, createDefaultProfile, mergeProfile, type Clock } from "../memory/memory-bank.js";
import { SessionStore, type AnswerSource } from "../memory/session-store.js";
import { InteractionLog } from "../observability/interaction-log.js";
import { cropLabel, type FarmerProfileT } from "../schemas/farmer.js";
import type { TipSnippetT } from "../schemas/tips.js";
import { createDefaultRetriever, type KnowledgeRetriever } from "../tools/knowledge-retriever.js";
import { computeWaterFootprint, type WaterFootprintResult } from "../tools/water-footprint.js";
import { CircuitBreaker, type CircuitBreakerConfig } from "../utils/circuit-breaker.js";
import { ExternalCallFailure, errorMessage, type Issue, type IssueKind } from "../utils/errors.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import type {
  RunTurnOptions,
  StageStatus,
  TraceEntry,
  TurnIssue,
  TurnResult,
  TurnState,
} from "./types.js";

export interface PlannerSettings {
  topK: number;
  defaultLandHa: number;
  historyTurns: number;
  summaryLanguage?: string;
  modelExtraction: boolean;
  llmTimeoutMs: number;
  circuitBreaker: CircuitBreakerConfig;
}

export interface PlannerDeps {
  model: LanguageModel;
  retriever: KnowledgeRetriever;
  memoryBank?: MemoryBank;
  sessionStore?: SessionStore;
  interactionLog?: InteractionLog;
  clock?: Clock;
  settings?: Partial<PlannerSettings>;
}

export const DEFAULT_PLANNER_SETTINGS: PlannerSettings = {
  topK: 3,
  defaultLandHa: 5,
  historyTurns: 4,
  modelExtraction: true,
  llmTimeoutMs: 20_000,
  circuitBreaker: { failureThreshold: 3, successThreshold: 1, timeoutMs: 30_000 },
};

const DEFAULT_INTERACTION_LOG_ENTRIES = 5_000;

export function settingsFromConfig(): PlannerSettings {
  return {
    topK: config.advisor.topK,
    defaultLandHa: config.advisor.defaultLandSizeHa,
    historyTurns: config.advisor.historyTurns,
    summaryLanguage: config.advisor.summaryLanguage,
    modelExtraction: config.advisor.modelExtraction,
    llmTimeoutMs: config.llm.timeoutMs,
    circuitBreaker: { ...config.circuitBreaker },
  };
}

/**
 * Text the retriever matches against: water level, crops and irrigation
 * method from the profile, followed by the farmer's own words.
 */
export function buildRetrievalQuery(profile: FarmerProfileT, message: string): string {
  const parts: string[] = [];
  if (profile.waterLevel !== "unknown") parts.push(`${profile.waterLevel} water`);
  parts.push(...profile.mainCrops.map(cropLabel));
  if (profile.irrigationType !== "unknown") parts.push(profile.irrigationType);
  parts.push(message);
  return parts.join(" ");
}

/**
 * Per-turn bookkeeping: trace entries, issues and stage timing.
 */
class TurnRecorder {
  readonly trace: TraceEntry[] = [];
  readonly issues: TurnIssue[] = [];
  private stageStart = Date.now();

  constructor(
    private readonly farmerId: string,
    private readonly requestId: string,
  ) {}

  issue(stage: TurnState, kind: IssueKind, message: string, detail?: Record<string, unknown>): void {
    this.issues.push({ stage, kind, message, ...(detail ? { detail } : {}) });
  }

  addIssues(stage: TurnState, issues: readonly Issue[]): void {
    for (const issue of issues) {
      this.issues.push({ ...issue, stage });
    }
  }

  stage(state: TurnState, status: StageStatus, note?: string): void {
    const now = Date.now();
    const entry: TraceEntry = { state, status, elapsedMs: now - this.stageStart, ...(note ? { note } : {}) };
    this.trace.push(entry);
    this.stageStart = now;

    const event = status === "failed" ? TelemetryEvents.TurnStageFailed : TelemetryEvents.TurnStageCompleted;
    const lastIssue = this.issues[this.issues.length - 1];
    emit(event, {
      farmer_id: this.farmerId,
      request_id: this.requestId,
      stage: state,
      status,
      elapsed_ms: entry.elapsedMs,
      kind: status === "failed" && lastIssue?.stage === state ? lastIssue.kind : undefined,
    });
  }

  statusFor(state: TurnState): StageStatus {
    return this.issues.some((i) => i.stage === state) ? "degraded" : "ok";
  }
}

export class Planner {
  readonly memoryBank: MemoryBank;
  readonly sessionStore: SessionStore;
  readonly interactionLog: InteractionLog;
  readonly breaker: CircuitBreaker;
  readonly settings: PlannerSettings;

  private readonly mutex = new KeyedMutex();
  private readonly clock: Clock;
  private readonly retriever: KnowledgeRetriever;
  private readonly profiler: Profiler;
  private readonly coach: Coach;

  constructor(deps: PlannerDeps) {
    this.settings = { ...DEFAULT_PLANNER_SETTINGS, ...deps.settings };
    this.clock = deps.clock ?? (() => new Date());
    this.memoryBank = deps.memoryBank ?? new MemoryBank(this.clock);
    this.sessionStore = deps.sessionStore ?? new SessionStore(this.clock);
    this.interactionLog = deps.interactionLog ?? new InteractionLog(DEFAULT_INTERACTION_LOG_ENTRIES);
    this.retriever = deps.retriever;
    this.breaker = new CircuitBreaker(this.settings.circuitBreaker);

    this.profiler = new Profiler({
      model: deps.model,
      modelExtraction: this.settings.modelExtraction,
      timeoutMs: this.settings.llmTimeoutMs,
      breaker: this.breaker,
    });
    this.coach = new Coach({
      model: deps.model,
      timeoutMs: this.settings.llmTimeoutMs,
      breaker: this.breaker,
      summaryLanguage: this.settings.summaryLanguage,
    });
  }

  /**
   * Process one farmer message. Always resolves; failures are reported in
   * `diagnostics` alongside a usable answer.
   */
  async runTurn(farmerId: string, userMessage: string, options: RunTurnOptions = {}): Promise<TurnResult> {
    const requestId = options.requestId ?? randomUUID();
    const id = farmerId.trim();

    if (!id) {
      return this.rejectedTurn(farmerId, userMessage, requestId, "farmer_id is required");
    }

    try {
      return await this.mutex.runExclusive(id, () => this.executeTurn(id, userMessage, requestId));
    } catch (error) {
      // Only reachable through a defect in a stage guard
      log.error({ error, farmer_id: id, request_id: requestId }, "Advisor turn failed outside stage handling");
      return this.rejectedTurn(id, userMessage, requestId, `Unexpected failure: ${errorMessage(error)}`);
    }
  }

  private async executeTurn(farmerId: string, userMessage: string, requestId: string): Promise<TurnResult> {
    const startTime = Date.now();
    const rec = new TurnRecorder(farmerId, requestId);

    emit(TelemetryEvents.TurnStarted, { farmer_id: farmerId, request_id: requestId, message_chars: userMessage.length });
    const prior = this.memoryBank.getProfile(farmerId) ?? createDefaultProfile(farmerId, this.clock());
    rec.stage("RECEIVED", "ok");

    // PROFILE_UPDATED
    let extraction: ProfileExtraction = { update: {}, rejected: [], source: "none", issues: [] };
    let profile = prior;
    try {
      extraction = await this.profiler.extract(userMessage, prior, { requestId });
      profile = mergeProfile(prior, extraction.update, this.clock());
      rec.addIssues("PROFILE_UPDATED", extraction.issues);
      // Only the note cap removes stored notes
      const notesTrimmed = prior.notes.filter((note) => !profile.notes.includes(note)).length;
      rec.stage(
        "PROFILE_UPDATED",
        rec.statusFor("PROFILE_UPDATED"),
        notesTrimmed > 0 ? `source=${extraction.source}; notes_trimmed=${notesTrimmed}` : `source=${extraction.source}`,
      );
    } catch (error) {
      extraction = { update: {}, rejected: [], source: "none", issues: [] };
      rec.issue("PROFILE_UPDATED", "ValidationError", `Profile extraction failed: ${errorMessage(error)}`);
      rec.stage("PROFILE_UPDATED", "failed");
    }

    // FOOTPRINT_COMPUTED
    let footprint: WaterFootprintResult | null = null;
    try {
      const baseline = baselineAllocation(profile, this.settings.defaultLandHa);
      footprint = computeWaterFootprint(baseline.allocations, profile.irrigationType);
      if (baseline.landAssumed && baseline.allocations.length > 0) {
        footprint.assumptions.unshift(landAssumptionLine(baseline.landHa));
      }
      rec.stage("FOOTPRINT_COMPUTED", "ok", profile.mainCrops.length === 0 ? "no crops known" : undefined);
    } catch (error) {
      rec.issue("FOOTPRINT_COMPUTED", "ComputationError", `Footprint calculation failed: ${errorMessage(error)}`);
      rec.stage("FOOTPRINT_COMPUTED", "failed");
    }

    // TIPS_RETRIEVED
    let tips: TipSnippetT[] = [];
    try {
      tips = await this.retriever.retrieve(buildRetrievalQuery(profile, userMessage), this.settings.topK);
      if (tips.length === 0) {
        emit(TelemetryEvents.RetrievalMiss, { farmer_id: farmerId, request_id: requestId });
        rec.issue("TIPS_RETRIEVED", "RetrievalMiss", "No agronomy tips matched this message");
      }
      rec.stage("TIPS_RETRIEVED", rec.statusFor("TIPS_RETRIEVED"), `tips=${tips.length}`);
    } catch (error) {
      tips = [];
      rec.issue("TIPS_RETRIEVED", "RetrievalMiss", `Tip retrieval failed: ${errorMessage(error)}`);
      rec.stage("TIPS_RETRIEVED", "failed");
    }

    // SCENARIOS_GENERATED
    let scenarios: Scenario[] = [];
    if (footprint) {
      try {
        scenarios = generateScenarios(profile, footprint, {
          defaultLandHa: this.settings.defaultLandHa,
          firstSequence: this.memoryBank.listScenarios(farmerId).length + 1,
          now: this.clock(),
        });
        rec.stage("SCENARIOS_GENERATED", "ok", `scenarios=${scenarios.length}`);
      } catch (error) {
        scenarios = [];
        rec.issue("SCENARIOS_GENERATED", "ComputationError", `Scenario generation failed: ${errorMessage(error)}`);
        rec.stage("SCENARIOS_GENERATED", "failed");
      }
    } else {
      rec.stage("SCENARIOS_GENERATED", "degraded", "skipped: no footprint");
    }

    // RESPONSE_SYNTHESIZED
    const context: CoachContext = {
      profile,
      footprint: footprint ?? undefined,
      tips,
      scenarios,
      userMessage,
      history: this.sessionStore.getRecent(farmerId, this.settings.historyTurns),
    };
    let answer: string;
    let answerSource: AnswerSource;
    try {
      answer = await this.coach.respond(context, { requestId });
      answerSource = "model";
      rec.stage("RESPONSE_SYNTHESIZED", "ok");
    } catch (error) {
      answer = buildFallbackAnswer(context);
      answerSource = "template";
      const reason = error instanceof ExternalCallFailure ? error.reason : "error";
      rec.issue("RESPONSE_SYNTHESIZED", "ExternalCallFailure", `Answer synthesis failed: ${errorMessage(error)}`, {
        reason,
      });
      emit(TelemetryEvents.TurnFallbackAnswer, { farmer_id: farmerId, request_id: requestId, reason });
      rec.stage("RESPONSE_SYNTHESIZED", "degraded", "templated answer");
    }

    // PERSISTED: one synchronous block
    const turnIndex = this.sessionStore.nextTurnIndex(farmerId);
    const degradedBeforeWrite = rec.issues.length > 0 || answerSource === "template";
    try {
      profile = this.memoryBank.updateProfile(farmerId, extraction.update);
      this.memoryBank.appendScenarios(farmerId, scenarios);
      this.sessionStore.appendTurn(farmerId, {
        turnIndex,
        userMessage,
        answer,
        answerSource,
        degraded: degradedBeforeWrite,
      });
      rec.stage("PERSISTED", "ok");
    } catch (error) {
      emit(TelemetryEvents.PersistenceFailed, { farmer_id: farmerId, request_id: requestId });
      log.error({ error, farmer_id: farmerId, request_id: requestId }, "Failed to persist advisor turn");
      rec.issue("PERSISTED", "PersistenceError", `Persisting the turn failed: ${errorMessage(error)}`);
      rec.stage("PERSISTED", "failed");
    }

    rec.stage("DONE", "ok");

    const degraded = rec.issues.length > 0 || answerSource === "template";
    const latencyMs = Date.now() - startTime;
    emit(TelemetryEvents.TurnCompleted, {
      farmer_id: farmerId,
      request_id: requestId,
      turn_index: turnIndex,
      answer_source: answerSource,
      degraded,
      issue_count: rec.issues.length,
      latency_ms: latencyMs,
      total_applied_m3: footprint?.totalAppliedDemandM3,
    });

    const result: TurnResult = {
      farmerId,
      turnIndex,
      answer,
      answerSource,
      waterFootprint: footprint,
      scenarios,
      tips,
      profile,
      diagnostics: { degraded, issues: rec.issues, trace: rec.trace },
    };

    this.interactionLog.record({
      requestId,
      farmerId,
      turnIndex,
      timestamp: this.clock().toISOString(),
      userMessage,
      answer,
      answerSource,
      degraded,
      issues: rec.issues,
      trace: rec.trace,
      totalAppliedDemandM3: footprint?.totalAppliedDemandM3 ?? null,
      latencyMs,
    });

    return result;
  }

  /**
   * Result for a turn that never entered the state machine. Nothing is stored.
   */
  private rejectedTurn(farmerId: string, userMessage: string, requestId: string, message: string): TurnResult {
    const id = farmerId.trim();
    const profile = (id ? this.memoryBank.getProfile(id) : undefined) ?? createDefaultProfile(id, this.clock());
    const issue: TurnIssue = { stage: "RECEIVED", kind: "ValidationError", message };
    emit(TelemetryEvents.TurnStageFailed, { farmer_id: id, request_id: requestId, stage: "RECEIVED", kind: issue.kind });
    return {
      farmerId: id,
      turnIndex: 0,
      answer: buildFallbackAnswer({ profile, tips: [], scenarios: [], userMessage }),
      answerSource: "template",
      waterFootprint: null,
      scenarios: [],
      tips: [],
      profile,
      diagnostics: {
        degraded: true,
        issues: [issue],
        trace: [{ state: "RECEIVED", status: "failed", elapsedMs: 0 }],
      },
    };
  }
}

export type CreateAdvisorOptions = Partial<PlannerDeps>;

/**
 * Planner wired from configuration: configured model adapter, the bundled
 * tip corpus and fresh in-memory stores.
 */
export function createAdvisor(options: CreateAdvisorOptions = {}): Planner {
  return new Planner({
    ...options,
    model: options.model ?? getAdapter(),
    retriever: options.retriever ?? createDefaultRetriever(),
    interactionLog: options.interactionLog ?? new InteractionLog(config.observability.interactionLogMaxEntries),
    settings: { ...settingsFromConfig(), ...options.settings },
  });
}
