// Load environment variables from .env file (local development only)
import "dotenv/config";

import { pathToFileURL } from "node:url";
import Fastify, { type FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";
import advisorTurnRoute from "./routes/advisor.turn.js";
import advisorInspectRoutes from "./routes/advisor.inspect.js";
import { createAdvisor, type Planner } from "./orchestrator/planner.js";
import { SERVICE_VERSION } from "./version.js";
import { getRequestId, requestIdFromHeaders, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { config } from "./config/index.js";
import { createLoggerConfig, SERVICE_NAME } from "./utils/logger-config.js";
import { flushMetrics, log } from "./utils/telemetry.js";

const BODY_LIMIT_BYTES = 64 * 1024;

export interface BuildOptions {
  /** Planner to serve; defaults to createAdvisor() from configuration. */
  planner?: Planner;
}

export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const planner = options.planner ?? createAdvisor();
  const turnRpm = config.rateLimits.turnRpm;

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: BODY_LIMIT_BYTES,
    genReqId: (req) => requestIdFromHeaders(req.headers),
  });

  await app.register(rateLimit, {
    global: true,
    max: turnRpm,
    timeWindow: "1 minute",
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
      "retry-after": true,
    },
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn({ event: "rate_limit_hit", max: context.max, request_id: requestId }, "Rate limit exceeded");

      // statusCode is read by @fastify/rate-limit
      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, requestId),
      };
    },
  });

  // X-Request-Id on every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, getRequestId(request));
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error({ error, request_id: errorV1.request_id, method: request.method, url: request.url }, `[${errorV1.code}] ${errorV1.message}`);
    } else {
      app.log.warn({ request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url }, `[${errorV1.code}] ${errorV1.message}`);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send(buildErrorV1("NOT_FOUND", `Route ${request.method} ${request.url} not found`, undefined, getRequestId(request)));
  });

  app.get("/healthz", async () => {
    const breaker = planner.breaker.stats();
    return {
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      llm_provider: config.llm.provider,
      llm_circuit: breaker.state,
      farmers: planner.memoryBank.size,
      logged_turns: planner.interactionLog.size,
    };
  });

  await app.register(advisorTurnRoute, { planner });
  await app.register(advisorInspectRoutes, { planner });

  return app;
}

// If running directly (not imported), start the server
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  build()
    .then(async (app) => {
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          provider: config.llm.provider,
          model: config.llm.model ?? "default",
          rate_limit_rpm: config.rateLimits.turnRpm,
          llm_timeout_ms: config.llm.timeoutMs,
        },
        "Irrigation advisor service starting",
      );

      const shutdown = (signal: string) => {
        app.log.info({ signal }, "Shutting down");
        app
          .close()
          .then(() => flushMetrics())
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            log.error({ error }, "Error during shutdown");
            process.exit(1);
          });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);

      await app.listen({ port: config.server.port, host: config.server.host });
    })
    .catch((err: unknown) => {
      log.fatal({ error: err }, "Failed to start server");
      process.exit(1);
    });
}
