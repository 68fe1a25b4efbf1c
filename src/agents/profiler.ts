/**
 * Profiler
 *
 * Turns a free-text farmer message into a partial profile update.
 *
 * 1. Keyword pass (profile-heuristics.ts), always available.
 * 2. Model pass: the model is asked for the same fields as JSON. The reply is
 *    untrusted; every field is checked against the closed vocabularies and
 *    anything outside them is dropped and reported in `rejected`.
 * 3. Model values override keyword values field by field. When the model
 *    call fails or its reply cannot be used, the keyword update stands.
 *    Crops the keyword pass saw dropped stay dropped either way.
 */

import { callModel } from "../adapters/llm/guarded-call.js";
import type { LanguageModel } from "../adapters/llm/types.js";
import { resolveCrop } from "../reference/crops.js";
import {
  IRRIGATION_TYPES,
  WATER_LEVELS,
  isIrrigationType,
  isWaterLevel,
} from "../reference/irrigation.js";
import {
  ModelProfileExtraction,
  cropLabel,
  type CropEntryT,
  type FarmerProfileT,
  type ModelProfileExtractionT,
  type ProfileUpdateT,
} from "../schemas/farmer.js";
import type { CircuitBreaker } from "../utils/circuit-breaker.js";
import { ExternalCallFailure, errorMessage, type Issue } from "../utils/errors.js";
import { extractJson } from "../utils/json-extractor.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { extractProfileHeuristically } from "./profile-heuristics.js";

const MAX_CROP_DETAIL = 60;
const MAX_REGION = 80;
const MAX_NOTE = 200;

export interface RejectedField {
  field: string;
  value: string;
  reason: string;
}

export type ExtractionSource = "none" | "heuristic" | "model" | "combined";

export interface ProfileExtraction {
  update: ProfileUpdateT;
  rejected: RejectedField[];
  source: ExtractionSource;
  issues: Issue[];
}

export interface ProfilerOptions {
  model?: LanguageModel;
  /** Skip the model pass entirely when false. */
  modelExtraction: boolean;
  timeoutMs: number;
  breaker?: CircuitBreaker;
}

const EXTRACTION_SYSTEM = [
  "You extract farm facts from a farmer's message.",
  "Reply with one JSON object with these keys, using null for anything not stated:",
  '- "crops": array of crop names the farmer currently grows',
  '- "land_size_ha": land size in hectares as a number',
  `- "irrigation_type": one of ${IRRIGATION_TYPES.filter((t) => t !== "unknown").join(", ")}`,
  `- "water_level": one of ${WATER_LEVELS.filter((l) => l !== "unknown").join(", ")}`,
  '- "region": the region or province name',
  '- "notes": one short sentence with any other relevant constraint',
  "Only report what the farmer states about their own farm; ignore questions and hypotheticals.",
  "Never guess. Do not add keys.",
].join("\n");

function describeProfile(profile: FarmerProfileT): string {
  const crops = profile.mainCrops.length > 0 ? profile.mainCrops.map(cropLabel).join(", ") : "unknown";
  return [
    `crops: ${crops}`,
    `land_size_ha: ${profile.landSizeHa}`,
    `irrigation_type: ${profile.irrigationType}`,
    `water_level: ${profile.waterLevel}`,
    `region: ${profile.region}`,
  ].join("\n");
}

export function buildExtractionPrompt(message: string, prior: FarmerProfileT): string {
  return `Known profile so far:\n${describeProfile(prior)}\n\nFarmer message:\n${message}`;
}

interface ValidatedModelFields {
  update: ProfileUpdateT;
  rejected: RejectedField[];
  issues: Issue[];
}

/**
 * Field-by-field vocabulary check of a model extraction.
 */
export function validateModelExtraction(raw: ModelProfileExtractionT): ValidatedModelFields {
  const update: ProfileUpdateT = {};
  const rejected: RejectedField[] = [];
  const issues: Issue[] = [];

  if (raw.crops && raw.crops.length > 0) {
    const crops: CropEntryT[] = [];
    for (const name of raw.crops) {
      const trimmed = name.trim();
      if (!trimmed) continue;
      const known = resolveCrop(trimmed);
      if (known) {
        crops.push({ crop: known });
      } else if (trimmed.length <= MAX_CROP_DETAIL) {
        crops.push({ crop: "other", detail: trimmed.toLowerCase() });
        issues.push({
          kind: "ValidationError",
          message: `Crop "${trimmed}" is outside the crop vocabulary; kept as other`,
          detail: { field: "crops", value: trimmed },
        });
      } else {
        rejected.push({ field: "crops", value: trimmed.slice(0, MAX_CROP_DETAIL), reason: "too_long" });
      }
    }
    if (crops.length > 0) update.mainCrops = crops;
  }

  const land = raw.land_size_ha;
  if (land !== null && land !== undefined && land !== "unknown") {
    const value = typeof land === "number" ? land : Number.parseFloat(land);
    if (Number.isFinite(value) && value >= 0) {
      update.landSizeHa = value;
    } else {
      rejected.push({ field: "land_size_ha", value: String(land), reason: "not_a_non_negative_number" });
    }
  }

  if (raw.irrigation_type) {
    const value = raw.irrigation_type.trim().toLowerCase();
    if (!isIrrigationType(value)) {
      rejected.push({ field: "irrigation_type", value: raw.irrigation_type, reason: "outside_vocabulary" });
    } else if (value !== "unknown") {
      update.irrigationType = value;
    }
  }

  if (raw.water_level) {
    const value = raw.water_level.trim().toLowerCase();
    if (!isWaterLevel(value)) {
      rejected.push({ field: "water_level", value: raw.water_level, reason: "outside_vocabulary" });
    } else if (value !== "unknown") {
      update.waterLevel = value;
    }
  }

  if (raw.region) {
    const value = raw.region.trim();
    if (value.length > MAX_REGION) {
      rejected.push({ field: "region", value: value.slice(0, MAX_REGION), reason: "too_long" });
    } else if (value && value.toLowerCase() !== "unknown") {
      update.region = value;
    }
  }

  if (raw.notes) {
    const value = raw.notes.trim();
    if (value) update.notes = [value.slice(0, MAX_NOTE)];
  }

  for (const entry of rejected) {
    issues.push({
      kind: "ValidationError",
      message: `Rejected ${entry.field} value "${entry.value}" (${entry.reason})`,
      detail: { field: entry.field, value: entry.value, reason: entry.reason },
    });
  }

  return { update, rejected, issues };
}

function hasFields(update: ProfileUpdateT): boolean {
  return Object.keys(update).length > 0;
}

function sourceOf(heuristic: ProfileUpdateT, model: ProfileUpdateT | undefined): ExtractionSource {
  const fromKeywords = hasFields(heuristic);
  const fromModel = model !== undefined && hasFields(model);
  if (fromKeywords && fromModel) return "combined";
  if (fromModel) return "model";
  if (fromKeywords) return "heuristic";
  return "none";
}

export class Profiler {
  constructor(private readonly options: ProfilerOptions) {}

  async extract(
    message: string,
    prior: FarmerProfileT,
    context: { requestId: string } = { requestId: "profiler" },
  ): Promise<ProfileExtraction> {
    const heuristic = extractProfileHeuristically(message);
    const { model } = this.options;

    if (!model || !this.options.modelExtraction || !message.trim()) {
      return { update: heuristic, rejected: [], source: sourceOf(heuristic, undefined), issues: [] };
    }

    let raw: ModelProfileExtractionT;
    try {
      const reply = await callModel(
        model,
        {
          task: "profile_extraction",
          system: EXTRACTION_SYSTEM,
          prompt: buildExtractionPrompt(message, prior),
          temperature: 0,
          json: true,
        },
        { requestId: context.requestId, timeoutMs: this.options.timeoutMs, breaker: this.options.breaker },
      );
      const parsed = ModelProfileExtraction.safeParse(
        extractJson(reply.text, { task: "profile_extraction", requestId: context.requestId }),
      );
      if (!parsed.success) {
        return this.fallback(heuristic, context.requestId, {
          kind: "ValidationError",
          message: "Model profile extraction did not match the expected shape",
          detail: { issues: parsed.error.issues.map((issue) => issue.path.join(".") || issue.message) },
        });
      }
      raw = parsed.data;
    } catch (error) {
      return this.fallback(heuristic, context.requestId, {
        kind: error instanceof ExternalCallFailure ? "ExternalCallFailure" : "ValidationError",
        message: `Model profile extraction failed: ${errorMessage(error)}`,
        detail: error instanceof ExternalCallFailure ? { reason: error.reason } : undefined,
      });
    }

    const validated = validateModelExtraction(raw);
    for (const entry of validated.rejected) {
      emit(TelemetryEvents.ProfileFieldRejected, {
        field: entry.field,
        reason: entry.reason,
        request_id: context.requestId,
      });
    }

    return {
      update: { ...heuristic, ...validated.update },
      rejected: validated.rejected,
      source: sourceOf(heuristic, validated.update),
      issues: validated.issues,
    };
  }

  private fallback(heuristic: ProfileUpdateT, requestId: string, issue: Issue): ProfileExtraction {
    emit(TelemetryEvents.ProfileExtractionFallback, { kind: issue.kind, request_id: requestId });
    return { update: heuristic, rejected: [], source: sourceOf(heuristic, undefined), issues: [issue] };
  }
}
