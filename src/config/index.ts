/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    return true;
  });

const Environment = z.enum(["development", "test", "production"]);

const LLMProvider = z.enum(["anthropic", "openai", "fixtures"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    host: z.string().default("0.0.0.0"),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
  }),

  llm: z.object({
    provider: LLMProvider.default("fixtures"),
    model: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    openaiApiKey: z.string().optional(),
    timeoutMs: z.coerce.number().int().positive().default(20_000),
    maxAttempts: z.coerce.number().int().min(1).max(5).default(2),
  }),

  advisor: z.object({
    topK: z.coerce.number().int().positive().default(3),
    defaultLandSizeHa: z.coerce.number().positive().default(5), // used when the farmer never states land size
    historyTurns: z.coerce.number().int().min(0).default(4), // prior turns shown to the coach
    summaryLanguage: z.string().optional(), // optional second-language summary in the answer
    modelExtraction: booleanString.default(true),
  }),

  observability: z.object({
    interactionLogMaxEntries: z.coerce.number().int().positive().default(5_000),
  }),

  rateLimits: z.object({
    turnRpm: z.coerce.number().int().positive().default(60),
  }),

  circuitBreaker: z.object({
    failureThreshold: z.coerce.number().int().positive().default(3),
    successThreshold: z.coerce.number().int().positive().default(1),
    timeoutMs: z.coerce.number().int().positive().default(30_000),
  }),

  testing: z.object({
    isVitest: booleanString.default(false),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      openaiApiKey: env.OPENAI_API_KEY,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxAttempts: env.LLM_MAX_ATTEMPTS,
    },
    advisor: {
      topK: env.ADVISOR_TOP_K,
      defaultLandSizeHa: env.ADVISOR_DEFAULT_LAND_HA,
      historyTurns: env.ADVISOR_HISTORY_TURNS,
      summaryLanguage: env.ADVISOR_SUMMARY_LANGUAGE || undefined,
      modelExtraction: env.ADVISOR_MODEL_EXTRACTION,
    },
    observability: {
      interactionLogMaxEntries: env.INTERACTION_LOG_MAX_ENTRIES,
    },
    rateLimits: {
      turnRpm: env.RATE_LIMIT_RPM,
    },
    circuitBreaker: {
      failureThreshold: env.CIRCUIT_BREAKER_FAILURE_THRESHOLD,
      successThreshold: env.CIRCUIT_BREAKER_SUCCESS_THRESHOLD,
      timeoutMs: env.CIRCUIT_BREAKER_TIMEOUT_MS,
    },
    testing: {
      isVitest: env.VITEST,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("❌ Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

/**
 * Lazy-initialized configuration.
 *
 * Defers parsing until first property access so tests can set environment
 * variables before the config is parsed. Parsed once and cached thereafter.
 *
 * ```
 * import { config } from './config/index.js';
 * const port = config.server.port;
 * ```
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys() {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isTest(): boolean {
  return config.server.nodeEnv === "test" || config.testing.isVitest;
}
