/**
 * Retry Utility Unit Tests
 *
 * Backoff calculation, retryable error detection and telemetry for model
 * call retries.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  withRetry,
  isRetryableError,
  calculateBackoffDelay,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
} from "../../src/utils/retry.js";
import { UpstreamTimeoutError } from "../../src/adapters/llm/errors.js";
import { setTestSink } from "../../src/utils/telemetry.js";

const FAST: RetryConfig = { ...DEFAULT_RETRY_CONFIG, maxAttempts: 3, baseDelayMs: 1, jitterPercent: 0 };
const CONTEXT = { adapter: "openai", model: "gpt-4o-mini", task: "coach_response" };

describe("Retry Utility", () => {
  afterEach(() => {
    setTestSink(null);
  });

  describe("isRetryableError", () => {
    it("retries transient status codes", () => {
      for (const statusCode of [408, 429, 500, 502, 503, 504]) {
        expect(isRetryableError({ statusCode, message: "x" })).toBe(true);
      }
      expect(isRetryableError({ status: 503 })).toBe(true);
    });

    it("does not retry client errors", () => {
      expect(isRetryableError({ status: 400, message: "bad request" })).toBe(false);
      expect(isRetryableError({ statusCode: 401, message: "unauthorized" })).toBe(false);
    });

    it("retries network and overload messages", () => {
      expect(isRetryableError(new Error("read ECONNRESET"))).toBe(true);
      expect(isRetryableError(new Error("Rate limit exceeded"))).toBe(true);
      expect(isRetryableError(new Error("Server is overloaded"))).toBe(true);
    });

    it("never retries a timeout", () => {
      expect(isRetryableError(new UpstreamTimeoutError("too slow", "openai", "coach_response", 20_000))).toBe(false);
    });

    it("handles empty input", () => {
      expect(isRetryableError(null)).toBe(false);
      expect(isRetryableError(undefined)).toBe(false);
    });
  });

  describe("calculateBackoffDelay", () => {
    const noJitter: RetryConfig = { ...DEFAULT_RETRY_CONFIG, jitterPercent: 0 };

    it("grows exponentially", () => {
      expect(calculateBackoffDelay(1, noJitter)).toBe(250);
      expect(calculateBackoffDelay(2, noJitter)).toBe(500);
      expect(calculateBackoffDelay(3, noJitter)).toBe(1000);
    });

    it("caps at maxDelayMs", () => {
      expect(calculateBackoffDelay(10, noJitter)).toBe(5000);
    });

    it("keeps jitter within its range", () => {
      for (let i = 0; i < 20; i++) {
        const delay = calculateBackoffDelay(1);
        expect(delay).toBeGreaterThanOrEqual(200);
        expect(delay).toBeLessThanOrEqual(300);
      }
    });
  });

  describe("withRetry", () => {
    it("returns the first success without retrying", async () => {
      const fn = vi.fn().mockResolvedValue("ok");
      await expect(withRetry(fn, CONTEXT, FAST)).resolves.toBe("ok");
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it("retries transient failures and reports the recovery", async () => {
      const events: string[] = [];
      setTestSink((name) => events.push(name));
      const fn = vi.fn().mockRejectedValueOnce({ status: 503, message: "unavailable" }).mockResolvedValue("ok");

      await expect(withRetry(fn, CONTEXT, FAST)).resolves.toBe("ok");
      expect(fn).toHaveBeenCalledTimes(2);
      expect(events).toEqual(["advisor.llm.retry", "advisor.llm.retry_success"]);
    });

    it("throws non-retryable errors immediately", async () => {
      const fn = vi.fn().mockRejectedValue(new Error("invalid api key"));
      await expect(withRetry(fn, CONTEXT, FAST)).rejects.toThrow("invalid api key");
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it("gives up after maxAttempts", async () => {
      const events: string[] = [];
      setTestSink((name) => events.push(name));
      const fn = vi.fn().mockRejectedValue(new Error("service unavailable"));

      await expect(withRetry(fn, CONTEXT, FAST)).rejects.toThrow("service unavailable");
      expect(fn).toHaveBeenCalledTimes(3);
      expect(events).toEqual(["advisor.llm.retry", "advisor.llm.retry", "advisor.llm.retry_exhausted"]);
    });

    it("stops retrying once the caller has aborted", async () => {
      const controller = new AbortController();
      const fn = vi.fn().mockImplementation(async () => {
        controller.abort();
        throw new Error("service unavailable");
      });

      await expect(withRetry(fn, { ...CONTEXT, abortSignal: controller.signal }, FAST)).rejects.toThrow(
        "service unavailable",
      );
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it("passes the attempt number to each call", async () => {
      const seen: number[] = [];
      const fn = async (attempt: number) => {
        seen.push(attempt);
        if (attempt < 3) throw { status: 502, message: "bad gateway" };
        return "ok";
      };

      await expect(withRetry(fn, CONTEXT, FAST)).resolves.toBe("ok");
      expect(seen).toEqual([1, 2, 3]);
    });
  });
});
