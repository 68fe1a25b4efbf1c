/**
 * Profiler tests: keyword pass, model pass and fallbacks
 */

import { describe, it, expect, afterEach } from "vitest";
import { Profiler, validateModelExtraction } from "../../src/agents/profiler.js";
import { createDefaultProfile } from "../../src/memory/memory-bank.js";
import { setTestSink } from "../../src/utils/telemetry.js";
import { ScriptedModel } from "../helpers/scripted-model.js";

const PRIOR = createDefaultProfile("f1", new Date("2024-03-01T08:00:00.000Z"));

function profilerWith(model: ScriptedModel, modelExtraction = true): Profiler {
  return new Profiler({ model, modelExtraction, timeoutMs: 1_000 });
}

describe("validateModelExtraction", () => {
  it("keeps unknown crops as other and rejects values outside the vocabularies", () => {
    const result = validateModelExtraction({
      crops: ["Wheat", "quinoa"],
      land_size_ha: "3",
      irrigation_type: "Drip",
      water_level: "plenty",
      region: "Fars",
    });

    expect(result.update).toEqual({
      mainCrops: [{ crop: "wheat" }, { crop: "other", detail: "quinoa" }],
      landSizeHa: 3,
      irrigationType: "drip",
      region: "Fars",
    });
    expect(result.rejected).toEqual([{ field: "water_level", value: "plenty", reason: "outside_vocabulary" }]);
    expect(result.issues.map((i) => i.kind)).toEqual(["ValidationError", "ValidationError"]);
  });

  it("rejects negative land sizes", () => {
    const result = validateModelExtraction({ land_size_ha: -2 });
    expect(result.update).toEqual({});
    expect(result.rejected).toEqual([{ field: "land_size_ha", value: "-2", reason: "not_a_non_negative_number" }]);
  });

  it("ignores nulls and explicit unknowns", () => {
    const result = validateModelExtraction({
      crops: null,
      land_size_ha: "unknown",
      irrigation_type: "unknown",
      region: "unknown",
    });
    expect(result.update).toEqual({});
    expect(result.rejected).toEqual([]);
  });
});

describe("Profiler.extract", () => {
  afterEach(() => {
    setTestSink(null);
  });

  it("lets model values override keyword values", async () => {
    const model = new ScriptedModel({
      profile_extraction: '{"crops": ["wheat"], "land_size_ha": 3, "irrigation_type": "sprinkler"}',
    });
    const result = await profilerWith(model).extract("I grow wheat on 2 ha", PRIOR);

    expect(result.update).toEqual({ mainCrops: [{ crop: "wheat" }], landSizeHa: 3, irrigationType: "sprinkler" });
    expect(result.source).toBe("combined");
    expect(result.issues).toEqual([]);
    expect(model.callsFor("profile_extraction")[0]?.json).toBe(true);
  });

  it("reads JSON wrapped in prose", async () => {
    const model = new ScriptedModel({ profile_extraction: 'Sure! {"water_level": "medium"} Hope that helps.' });
    const result = await profilerWith(model).extract("how much should I water?", PRIOR);
    expect(result.update).toEqual({ waterLevel: "medium" });
    expect(result.source).toBe("model");
  });

  it("reports rejected fields through telemetry", async () => {
    const events: string[] = [];
    setTestSink((name) => events.push(name));
    const model = new ScriptedModel({ profile_extraction: '{"irrigation_type": "centre pivot"}' });

    const result = await profilerWith(model).extract("we irrigate", PRIOR);

    expect(result.rejected).toEqual([
      { field: "irrigation_type", value: "centre pivot", reason: "outside_vocabulary" },
    ]);
    expect(events).toContain("advisor.profile.field_rejected");
  });

  it("falls back to keywords when the model call fails", async () => {
    const model = new ScriptedModel({ profile_extraction: new Error("boom") });
    const result = await profilerWith(model).extract("I grow rice", PRIOR);

    expect(result.update).toEqual({ mainCrops: [{ crop: "rice" }] });
    expect(result.source).toBe("heuristic");
    expect(result.issues).toEqual([
      { kind: "ExternalCallFailure", message: "Model profile extraction failed: boom", detail: { reason: "error" } },
    ]);
  });

  it("falls back to keywords when the reply is not JSON", async () => {
    const model = new ScriptedModel({ profile_extraction: "I could not find anything" });
    const result = await profilerWith(model).extract("I grow rice", PRIOR);

    expect(result.update).toEqual({ mainCrops: [{ crop: "rice" }] });
    expect(result.issues[0]?.kind).toBe("ValidationError");
  });

  it("falls back when the reply has the wrong shape", async () => {
    const model = new ScriptedModel({ profile_extraction: '{"crops": "rice"}' });
    const result = await profilerWith(model).extract("I grow rice", PRIOR);

    expect(result.issues[0]?.message).toBe("Model profile extraction did not match the expected shape");
    expect(result.update).toEqual({ mainCrops: [{ crop: "rice" }] });
  });

  it("skips the model when model extraction is off", async () => {
    const model = new ScriptedModel({});
    const result = await profilerWith(model, false).extract("I grow rice", PRIOR);

    expect(model.calls).toEqual([]);
    expect(result.source).toBe("heuristic");
  });

  it("includes the known profile in the prompt", async () => {
    const model = new ScriptedModel({ profile_extraction: "{}" });
    await profilerWith(model).extract("hello", { ...PRIOR, region: "Kerman" });
    expect(model.callsFor("profile_extraction")[0]?.prompt).toContain("region: Kerman");
  });
});
