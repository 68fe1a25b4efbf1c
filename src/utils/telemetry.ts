import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig, SERVICE_NAME } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * Redaction paths are centralized in src/utils/logger-config.ts so the
 * Fastify logger and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetrySink = (eventName: string, data: Record<string, unknown>) => void;

/**
 * Test sink for capturing telemetry events in tests.
 * Only usable when NODE_ENV=test or VITEST is set.
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  // Direct env check avoids a circular import with the config module
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names.
 * Dashboards key on these strings; rename only together with them.
 */
export const TelemetryEvents = {
  // Turn lifecycle
  TurnStarted: "advisor.turn.started",
  TurnStageCompleted: "advisor.turn.stage_completed",
  TurnStageFailed: "advisor.turn.stage_failed",
  TurnCompleted: "advisor.turn.completed",
  TurnFallbackAnswer: "advisor.turn.fallback_answer",

  // Profiler
  ProfileFieldRejected: "advisor.profile.field_rejected",
  ProfileExtractionFallback: "advisor.profile.extraction_fallback",

  // Retrieval
  RetrievalMiss: "advisor.retrieval.miss",

  // Persistence
  PersistenceFailed: "advisor.persistence.failed",

  // Language model calls
  LlmCallCompleted: "advisor.llm.call_completed",
  LlmCallFailed: "advisor.llm.call_failed",
  LlmCircuitOpen: "advisor.llm.circuit_open",
  LlmRetry: "advisor.llm.retry",
  LlmRetrySuccess: "advisor.llm.retry_success",
  LlmRetryExhausted: "advisor.llm.retry_exhausted",

  // Evaluation
  GoldenCaseCompleted: "advisor.golden.case_completed",
  GoldenRunCompleted: "advisor.golden.run_completed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * All valid event names (for CI validation)
 */
export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * StatsD client (optional, configured via DD_AGENT_HOST)
 */
let statsdClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  statsdClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "irrigation_advisor.",
    globalTags: {
      service: env.DD_SERVICE || SERVICE_NAME,
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "StatsD client initialized");
}

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;
type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function sendMetrics(client: StatsD, event: string, eventData: TelemetryShape): void {
  switch (event) {
    case TelemetryEvents.TurnCompleted: {
      if (typeof eventData.latency_ms === "number") {
        client.histogram("turn.latency_ms", eventData.latency_ms, {
          answer_source: String(eventData.answer_source ?? "unknown"),
        });
      }
      if (typeof eventData.total_applied_m3 === "number") {
        client.histogram("turn.total_applied_m3", eventData.total_applied_m3);
      }
      client.increment("turn.completed", 1, {
        degraded: String(eventData.degraded ?? false),
      });
      break;
    }

    case TelemetryEvents.TurnStageFailed: {
      client.increment("turn.stage_failed", 1, {
        stage: String(eventData.stage ?? "unknown"),
        kind: String(eventData.kind ?? "unknown"),
      });
      break;
    }

    case TelemetryEvents.TurnFallbackAnswer: {
      client.increment("turn.fallback_answer", 1);
      break;
    }

    case TelemetryEvents.LlmCallCompleted: {
      if (typeof eventData.elapsed_ms === "number") {
        client.histogram("llm.latency_ms", eventData.elapsed_ms, {
          task: String(eventData.task ?? "unknown"),
          provider: String(eventData.provider ?? "unknown"),
        });
      }
      break;
    }

    case TelemetryEvents.LlmCallFailed: {
      client.increment("llm.failed", 1, {
        task: String(eventData.task ?? "unknown"),
        reason: String(eventData.reason ?? "unknown"),
      });
      break;
    }

    case TelemetryEvents.RetrievalMiss: {
      client.increment("retrieval.miss", 1);
      break;
    }

    default:
      // Stage and debug events are logged only
      if (!VALID_EVENT_NAMES.has(event)) {
        log.warn({ event }, "Unknown telemetry event (not in frozen enum)");
      }
  }
}

/**
 * Emit a telemetry event: test sink, pino, and StatsD when configured.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (statsdClient) {
    try {
      sendMetrics(statsdClient, event, eventData);
    } catch (error) {
      // Metrics must never break a turn
      log.error({ error, event }, "Failed to send StatsD metrics");
    }
  }
}

/**
 * Flush StatsD metrics (for graceful shutdown)
 */
export async function flushMetrics(): Promise<void> {
  const client = statsdClient;
  if (!client) return;
  return new Promise((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing StatsD metrics");
        reject(error);
      } else {
        log.info("StatsD metrics flushed");
        resolve();
      }
    });
  });
}
