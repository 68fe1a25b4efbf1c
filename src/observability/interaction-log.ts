/**
 * Interaction log
 *
 * In-memory record of completed turns for inspection (GET /advisor/v1/inspect/logs
 * and the demo script). Bounded: the oldest entries are dropped first.
 */

import type { AnswerSource } from "../memory/session-store.js";
import type { TraceEntry, TurnIssue } from "../orchestrator/types.js";

export interface InteractionLogEntry {
  requestId: string;
  farmerId: string;
  turnIndex: number;
  timestamp: string;
  userMessage: string;
  answer: string;
  answerSource: AnswerSource;
  degraded: boolean;
  issues: TurnIssue[];
  trace: TraceEntry[];
  totalAppliedDemandM3: number | null;
  latencyMs: number;
}

export interface InteractionLogQuery {
  farmerId?: string;
  /** Most recent entries only; oldest first within the result. */
  limit?: number;
}

export class InteractionLog {
  private readonly buffer: InteractionLogEntry[] = [];

  constructor(private readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
      throw new Error(`interaction_log_max_entries must be a positive integer, got ${maxEntries}`);
    }
  }

  record(entry: InteractionLogEntry): void {
    this.buffer.push(structuredClone(entry));
    if (this.buffer.length > this.maxEntries) {
      this.buffer.splice(0, this.buffer.length - this.maxEntries);
    }
  }

  entries(query: InteractionLogQuery = {}): InteractionLogEntry[] {
    const { farmerId, limit } = query;
    let selected = farmerId === undefined ? this.buffer : this.buffer.filter((e) => e.farmerId === farmerId);
    if (limit !== undefined) {
      selected = limit > 0 ? selected.slice(-limit) : [];
    }
    return selected.map((entry) => structuredClone(entry));
  }

  get size(): number {
    return this.buffer.length;
  }
}
