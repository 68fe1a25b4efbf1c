/**
 * callModel tests: deadline, circuit breaker and failure mapping
 */

import { describe, it, expect, afterEach } from "vitest";
import { callModel } from "../../src/adapters/llm/guarded-call.js";
import { UpstreamHTTPError } from "../../src/adapters/llm/errors.js";
import type { CompletionRequest } from "../../src/adapters/llm/types.js";
import { CircuitBreaker } from "../../src/utils/circuit-breaker.js";
import { ExternalCallFailure } from "../../src/utils/errors.js";
import { setTestSink } from "../../src/utils/telemetry.js";
import { ScriptedModel } from "../helpers/scripted-model.js";

const REQUEST: CompletionRequest = { task: "coach_response", system: "sys", prompt: "prompt" };

async function failureOf(promise: Promise<unknown>): Promise<ExternalCallFailure> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(error instanceof ExternalCallFailure)) {
    throw new Error(`expected ExternalCallFailure, got ${String(error)}`);
  }
  return error;
}

function breaker(): CircuitBreaker {
  return new CircuitBreaker({ failureThreshold: 2, successThreshold: 1, timeoutMs: 60_000 });
}

describe("callModel", () => {
  afterEach(() => {
    setTestSink(null);
  });

  it("returns the reply and emits a completion event", async () => {
    const events: string[] = [];
    setTestSink((name) => events.push(name));
    const result = await callModel(new ScriptedModel({ coach_response: "advice" }), REQUEST, {
      requestId: "r1",
      timeoutMs: 1_000,
    });
    expect(result.text).toBe("advice");
    expect(events).toEqual(["advisor.llm.call_completed"]);
  });

  it("maps a whitespace reply to empty_response", async () => {
    const failure = await failureOf(
      callModel(new ScriptedModel({ coach_response: " \n " }), REQUEST, { requestId: "r1", timeoutMs: 1_000 }),
    );
    expect(failure.reason).toBe("empty_response");
    expect(failure.task).toBe("coach_response");
  });

  it("enforces the deadline and aborts the adapter call", async () => {
    let signal: AbortSignal | undefined;
    const model = new ScriptedModel({
      coach_response: (_request, opts) => {
        signal = opts.abortSignal;
        return new Promise<string>(() => undefined);
      },
    });
    const failure = await failureOf(callModel(model, REQUEST, { requestId: "r1", timeoutMs: 10 }));
    expect(failure.reason).toBe("timeout");
    expect(signal?.aborted).toBe(true);
  });

  it("maps provider HTTP errors", async () => {
    const model = new ScriptedModel({
      coach_response: new UpstreamHTTPError("openai failed", "openai", 500, undefined, undefined, 3),
    });
    const failure = await failureOf(callModel(model, REQUEST, { requestId: "r1", timeoutMs: 1_000 }));
    expect(failure.reason).toBe("http_error");
    expect(failure.cause).toBeInstanceOf(UpstreamHTTPError);
  });

  it("opens the breaker after repeated failures and then skips the adapter", async () => {
    const cb = breaker();
    const model = new ScriptedModel({ coach_response: new Error("down") });
    const options = { requestId: "r1", timeoutMs: 1_000, breaker: cb };

    await failureOf(callModel(model, REQUEST, options));
    await failureOf(callModel(model, REQUEST, options));
    expect(cb.stats().state).toBe("OPEN");

    const failure = await failureOf(callModel(model, REQUEST, options));
    expect(failure.reason).toBe("circuit_open");
    expect(model.calls).toHaveLength(2);
  });

  it("resets the failure count on success", async () => {
    const cb = breaker();
    await failureOf(
      callModel(new ScriptedModel({ coach_response: new Error("down") }), REQUEST, {
        requestId: "r1",
        timeoutMs: 1_000,
        breaker: cb,
      }),
    );
    await callModel(new ScriptedModel({ coach_response: "ok" }), REQUEST, {
      requestId: "r1",
      timeoutMs: 1_000,
      breaker: cb,
    });
    expect(cb.stats().failures).toBe(0);
  });
});
