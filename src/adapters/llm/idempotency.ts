import { randomUUID } from "node:crypto";

/**
 * Idempotency key sent with each provider request, so that a retried call
 * is recognised as the same logical request.
 */
export function makeIdempotencyKey(): string {
  return randomUUID();
}
