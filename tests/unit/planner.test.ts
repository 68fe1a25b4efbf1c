/**
 * Planner tests: full turns, degraded stages and per-farmer ordering
 */

import { describe, it, expect, vi } from "vitest";
import { Planner } from "../../src/orchestrator/planner.js";
import { TURN_STATES } from "../../src/orchestrator/types.js";
import { FixturesAdapter } from "../../src/adapters/llm/router.js";
import { MAX_NOTES, MemoryBank } from "../../src/memory/memory-bank.js";
import type { FarmerProfileT, ProfileUpdateT } from "../../src/schemas/farmer.js";
import type { KnowledgeRetriever } from "../../src/tools/knowledge-retriever.js";
import { ScriptedModel, deferred, testRetriever } from "../helpers/scripted-model.js";

const NOW = new Date("2024-03-01T08:00:00.000Z");
const WHEAT_BARLEY = "I have 5 hectares of wheat and barley, water is limited";

function plannerWith(deps: Partial<ConstructorParameters<typeof Planner>[0]> = {}): Planner {
  return new Planner({
    model: new FixturesAdapter(),
    retriever: testRetriever(),
    clock: () => NOW,
    ...deps,
  });
}

/** The farmer message section of a coach prompt; history is excluded. */
function currentMessage(prompt: string): string {
  const [, message = ""] = prompt.split("## Farmer message\n");
  return message.split("\n\n")[0] ?? "";
}

class FailingMemoryBank extends MemoryBank {
  override updateProfile(_farmerId: string, _update: ProfileUpdateT): FarmerProfileT {
    throw new Error("store unavailable");
  }
}

describe("Planner.runTurn", () => {
  it("runs a complete turn and persists it", async () => {
    const planner = plannerWith();
    const result = await planner.runTurn("f1", WHEAT_BARLEY, { requestId: "req-1" });

    expect(result.farmerId).toBe("f1");
    expect(result.turnIndex).toBe(1);
    expect(result.answerSource).toBe("model");
    expect(result.answer.startsWith("Fixture advice based on:\n## Farmer profile")).toBe(true);
    expect(result.profile).toMatchObject({
      mainCrops: [{ crop: "wheat" }, { crop: "barley" }],
      landSizeHa: 5,
      waterLevel: "low",
      revision: 1,
    });

    expect(result.waterFootprint?.totalAppliedDemandM3).toBe(33500);
    expect(result.scenarios.map((s) => s.id)).toEqual(["conservative-1", "water-saving-50-2"]);
    expect(result.scenarios[0]?.footprint.totalAppliedDemandM3).toBeCloseTo(33200, 6);
    expect(result.scenarios[1]?.footprint.totalAppliedDemandM3).toBeCloseTo(32750, 6);
    expect(result.tips.map((t) => t.id)).toEqual(["wheat", "drip"]);

    expect(result.diagnostics.degraded).toBe(false);
    expect(result.diagnostics.issues).toEqual([]);
    expect(result.diagnostics.trace.map((t) => t.state)).toEqual([...TURN_STATES]);

    expect(planner.memoryBank.getProfile("f1")).toEqual(result.profile);
    expect(planner.memoryBank.listScenarios("f1")).toHaveLength(2);
    expect(planner.sessionStore.getHistory("f1")).toEqual([
      {
        turnIndex: 1,
        userMessage: WHEAT_BARLEY,
        answer: result.answer,
        timestamp: NOW.toISOString(),
        answerSource: "model",
        degraded: false,
      },
    ]);
    expect(planner.interactionLog.entries()[0]).toMatchObject({ requestId: "req-1", farmerId: "f1", turnIndex: 1 });
  });

  it("carries the profile and scenario numbering into later turns", async () => {
    const planner = plannerWith();
    await planner.runTurn("f1", WHEAT_BARLEY);
    const second = await planner.runTurn("f1", "We use drip irrigation now.");

    expect(second.turnIndex).toBe(2);
    expect(second.profile).toMatchObject({ landSizeHa: 5, waterLevel: "low", irrigationType: "drip", revision: 2 });
    expect(second.scenarios.map((s) => s.id)).toEqual(["conservative-3", "water-saving-50-4"]);
    expect(second.answer).toContain("Farmer: " + WHEAT_BARLEY);
  });

  it("uses the templated answer when synthesis fails", async () => {
    const model = new ScriptedModel({ profile_extraction: "{}", coach_response: new Error("provider down") });
    const planner = plannerWith({ model });
    const result = await planner.runTurn("f1", WHEAT_BARLEY);

    expect(result.answerSource).toBe("template");
    expect(result.answer.split("\n\n")[0]).toBe(
      "Your crops need about 33,500 m³ of irrigation water per season (wheat 17,500 m³, barley 16,000 m³).",
    );
    expect(result.diagnostics.degraded).toBe(true);
    expect(result.diagnostics.issues).toEqual([
      {
        stage: "RESPONSE_SYNTHESIZED",
        kind: "ExternalCallFailure",
        message: "Answer synthesis failed: provider down",
        detail: { reason: "error" },
      },
    ]);
    expect(planner.sessionStore.getHistory("f1")[0]).toMatchObject({ answerSource: "template", degraded: true });
  });

  it("skips model calls once the circuit opens", async () => {
    const model = new ScriptedModel({ profile_extraction: new Error("provider down"), coach_response: "unused" });
    const planner = plannerWith({
      model,
      settings: { circuitBreaker: { failureThreshold: 1, successThreshold: 1, timeoutMs: 60_000 } },
    });
    const result = await planner.runTurn("f1", WHEAT_BARLEY);

    expect(model.callsFor("coach_response")).toEqual([]);
    expect(result.answerSource).toBe("template");
    expect(result.diagnostics.issues.map((i) => [i.stage, i.kind])).toEqual([
      ["PROFILE_UPDATED", "ExternalCallFailure"],
      ["RESPONSE_SYNTHESIZED", "ExternalCallFailure"],
    ]);
    expect(result.diagnostics.issues[1]?.detail).toEqual({ reason: "circuit_open" });
    // keyword extraction still applied
    expect(result.profile.landSizeHa).toBe(5);
    expect(planner.breaker.stats().state).toBe("OPEN");
  });

  it("times out a model call that never answers", async () => {
    const model = new ScriptedModel({ coach_response: () => new Promise<string>(() => undefined) });
    const planner = plannerWith({ model, settings: { modelExtraction: false, llmTimeoutMs: 20 } });
    const result = await planner.runTurn("f1", WHEAT_BARLEY);

    expect(result.answerSource).toBe("template");
    expect(result.diagnostics.issues[0]?.detail).toEqual({ reason: "timeout" });
  });

  it("records a retrieval miss and still answers", async () => {
    const retriever: KnowledgeRetriever = { retrieve: () => [] };
    const result = await plannerWith({ retriever }).runTurn("f1", WHEAT_BARLEY);

    expect(result.tips).toEqual([]);
    expect(result.answerSource).toBe("model");
    expect(result.diagnostics.degraded).toBe(true);
    expect(result.diagnostics.issues.map((i) => i.kind)).toEqual(["RetrievalMiss"]);
    expect(result.diagnostics.trace.find((t) => t.state === "TIPS_RETRIEVED")?.status).toBe("degraded");
  });

  it("continues when the retriever throws", async () => {
    const retriever: KnowledgeRetriever = {
      retrieve: () => {
        throw new Error("index offline");
      },
    };
    const result = await plannerWith({ retriever }).runTurn("f1", WHEAT_BARLEY);

    expect(result.diagnostics.trace.find((t) => t.state === "TIPS_RETRIEVED")?.status).toBe("failed");
    expect(result.diagnostics.issues[0]?.message).toBe("Tip retrieval failed: index offline");
    expect(result.scenarios).toHaveLength(2);
  });

  it("reports a persistence failure without losing the answer", async () => {
    const planner = plannerWith({ memoryBank: new FailingMemoryBank(() => NOW) });
    const result = await planner.runTurn("f1", WHEAT_BARLEY);

    expect(result.answerSource).toBe("model");
    expect(result.turnIndex).toBe(1);
    expect(result.diagnostics.issues).toEqual([
      { stage: "PERSISTED", kind: "PersistenceError", message: "Persisting the turn failed: store unavailable" },
    ]);
    expect(planner.sessionStore.getHistory("f1")).toEqual([]);
  });

  it("rejects a blank farmer id without storing anything", async () => {
    const planner = plannerWith();
    const result = await planner.runTurn("   ", "hello");

    expect(result.turnIndex).toBe(0);
    expect(result.answerSource).toBe("template");
    expect(result.diagnostics.issues).toEqual([
      { stage: "RECEIVED", kind: "ValidationError", message: "farmer_id is required" },
    ]);
    expect(planner.memoryBank.size).toBe(0);
    expect(planner.sessionStore.listSessions()).toEqual([]);
    expect(planner.interactionLog.size).toBe(0);
  });

  it("answers a message with no farm facts", async () => {
    const result = await plannerWith().runTurn("f1", "hello");

    expect(result.waterFootprint?.totalAppliedDemandM3).toBe(0);
    expect(result.scenarios).toEqual([]);
    expect(result.turnIndex).toBe(1);
  });

  it("lets turns for different farmers run concurrently without sharing profiles", async () => {
    const gate = deferred<string>();
    const model = new ScriptedModel({
      coach_response: (request) => (currentMessage(request.prompt).includes("rice") ? gate.promise : "quick answer"),
    });
    const planner = plannerWith({ model, settings: { modelExtraction: false } });

    const slow = planner.runTurn("a", "I have 3 hectares of rice");
    const fast = await planner.runTurn("b", "I have 7 hectares of wheat");

    expect(fast.answer).toBe("quick answer");
    expect(fast.profile).toMatchObject({ farmerId: "b", landSizeHa: 7, mainCrops: [{ crop: "wheat" }] });

    gate.resolve("slow answer");
    const slowResult = await slow;
    expect(slowResult.answer).toBe("slow answer");
    expect(slowResult.profile).toMatchObject({ farmerId: "a", landSizeHa: 3, mainCrops: [{ crop: "rice" }] });
    expect(planner.memoryBank.getProfile("a")?.mainCrops).toEqual([{ crop: "rice" }]);
    expect(planner.memoryBank.getProfile("b")?.mainCrops).toEqual([{ crop: "wheat" }]);
  });

  it("serializes turns for the same farmer, each starting from the last profile", async () => {
    const gate = deferred<string>();
    const started: string[] = [];
    const model = new ScriptedModel({
      coach_response: (request) => {
        const message = currentMessage(request.prompt);
        started.push(message);
        return message.includes("corn") ? gate.promise : "second answer";
      },
    });
    const planner = plannerWith({ model, settings: { modelExtraction: false } });

    const first = planner.runTurn("f1", "I grow corn on 4 hectares.");
    const second = planner.runTurn("f1", "We use drip irrigation.");

    await vi.waitFor(() => expect(started).toEqual(["I grow corn on 4 hectares."]));
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(started).toEqual(["I grow corn on 4 hectares."]);
    expect(planner.memoryBank.getProfile("f1")).toBeUndefined();

    gate.resolve("first answer");
    const [firstResult, secondResult] = await Promise.all([first, second]);
    expect([firstResult.turnIndex, secondResult.turnIndex]).toEqual([1, 2]);
    expect(started).toEqual(["I grow corn on 4 hectares.", "We use drip irrigation."]);
    expect(firstResult.profile).toMatchObject({ landSizeHa: 4, irrigationType: "unknown" });
    expect(secondResult.profile).toMatchObject({
      landSizeHa: 4,
      mainCrops: [{ crop: "corn" }],
      irrigationType: "drip",
      revision: 2,
    });
    expect(planner.sessionStore.getHistory("f1").map((t) => t.answer)).toEqual(["first answer", "second answer"]);
  });

  it("keeps stored facts when the farmer only asks a question", async () => {
    const planner = plannerWith();
    await planner.runTurn("f1", "Hi, I farm near Shiraz. I have 6 hectares of wheat and tomatoes.");
    await planner.runTurn("f1", "We use flood irrigation and water is limited this year. What should I change?");
    const third = await planner.runTurn("f1", "Would drip irrigation help with the tomatoes?");

    expect(third.profile).toMatchObject({
      region: "Shiraz",
      landSizeHa: 6,
      mainCrops: [{ crop: "wheat" }, { crop: "tomato" }],
      irrigationType: "flood",
      waterLevel: "low",
      revision: 2,
    });
  });

  it("builds scenarios for a single crop with no same-season saving", async () => {
    const result = await plannerWith().runTurn("f-apple", "I have 4 hectares of apple");

    expect(result.scenarios.map((s) => [s.label, s.shiftedFrom, s.shiftedTo])).toEqual([
      ["conservative", "apple", ["lentil"]],
      ["water-saving-50", "apple", ["lentil"]],
    ]);
  });

  it("notes in the trace when old profile notes are trimmed", async () => {
    const memoryBank = new MemoryBank(() => NOW);
    memoryBank.updateProfile("f1", { notes: Array.from({ length: MAX_NOTES }, (_, i) => `note ${i}`) });
    const model = new ScriptedModel({
      profile_extraction: '{"notes": "The well is shared with neighbours"}',
      coach_response: "ok",
    });
    const result = await plannerWith({ model, memoryBank }).runTurn("f1", "The well is shared with neighbours");

    expect(result.profile.notes[0]).toBe("note 1");
    expect(result.profile.notes[MAX_NOTES - 1]).toBe("The well is shared with neighbours");
    expect(result.diagnostics.trace.find((t) => t.state === "PROFILE_UPDATED")?.note).toBe(
      "source=model; notes_trimmed=1",
    );
  });
});
