import { randomUUID } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";
import type { FastifyRequest } from "fastify";

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = "X-Request-Id";
export const REQUEST_ID_HEADER_LOWER = "x-request-id";

const VALID_REQUEST_ID = /^[\w.:-]{1,128}$/;

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Incoming X-Request-Id when present and well-formed, otherwise a new one.
 * Used as Fastify's genReqId, so request.id carries it everywhere.
 */
export function requestIdFromHeaders(headers: IncomingHttpHeaders): string {
  const incoming = headers[REQUEST_ID_HEADER_LOWER];
  const value = Array.isArray(incoming) ? incoming[0] : incoming;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (VALID_REQUEST_ID.test(trimmed)) {
      return trimmed;
    }
  }
  return generateRequestId();
}

export function getRequestId(request?: FastifyRequest): string {
  return request?.id || "unknown";
}
