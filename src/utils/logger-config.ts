/**
 * Pino options shared by the Fastify logger (server.ts) and the standalone
 * logger in telemetry.ts, so both redact the same fields.
 */

export const SERVICE_NAME = "irrigation-advisor-service";

/**
 * Pino redaction paths. Provider keys can ride along on config dumps or SDK
 * errors; contact details can appear in a farmer's free-text message payload.
 */
export const REDACT_PATHS: readonly string[] = [
  "*.anthropicApiKey",
  "*.openaiApiKey",
  "*.apiKey",
  "*.api_key",
  "*.secret",
  "*.token",
  'req.headers.authorization',
  'req.headers["x-api-key"]',
  "req.headers.cookie",
  "*.headers.authorization",
  "*.email",
  "*.phone",
];

export const REDACT_CENSOR = "[REDACTED]";

export function createLoggerConfig(level: string) {
  return {
    level,
    base: { service: SERVICE_NAME },
    redact: { paths: [...REDACT_PATHS], censor: REDACT_CENSOR },
  };
}
