/**
 * Configuration module tests
 *
 * vitest.setup.ts resets the config cache before each test, so stubbed
 * environment variables are read on first access.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { config, isTest } from "../../src/config/index.js";
import { settingsFromConfig } from "../../src/orchestrator/planner.js";
import { SERVICE_VERSION } from "../../src/version.js";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("applies defaults", () => {
    expect(config.llm.provider).toBe("fixtures");
    expect(config.advisor.defaultLandSizeHa).toBe(5);
    expect(config.circuitBreaker).toEqual({ failureThreshold: 3, successThreshold: 1, timeoutMs: 30_000 });
  });

  it("coerces numbers and booleans from the environment", () => {
    vi.stubEnv("ADVISOR_TOP_K", "5");
    vi.stubEnv("ADVISOR_MODEL_EXTRACTION", "false");
    vi.stubEnv("ADVISOR_SUMMARY_LANGUAGE", "Persian");

    expect(config.advisor.topK).toBe(5);
    expect(config.advisor.modelExtraction).toBe(false);
    expect(settingsFromConfig()).toMatchObject({ topK: 5, modelExtraction: false, summaryLanguage: "Persian" });
  });

  it("rejects invalid values", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.stubEnv("LLM_PROVIDER", "mystery");
    expect(() => config.llm).toThrow("Invalid configuration. Please check environment variables.");
  });

  it("keeps the service version out of config", () => {
    expect(Object.keys(config.server).sort()).toEqual(["host", "logLevel", "nodeEnv", "port"]);
    expect(SERVICE_VERSION).toBe(process.env.SERVICE_VERSION ?? "0.3.0");
  });

  it("detects the test environment", () => {
    expect(isTest()).toBe(true);
  });
});
