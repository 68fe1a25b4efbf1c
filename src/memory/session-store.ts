/**
 * Session Store
 *
 * Append-only, per-farmer conversation history. Turn indices start at 1 and
 * increase by one per appended turn; turns are never reordered or removed.
 * An unknown farmer simply has an empty history.
 */

import type { Clock } from "./memory-bank.js";

export type AnswerSource = "model" | "template";

export interface SessionTurn {
  turnIndex: number;
  userMessage: string;
  answer: string;
  timestamp: string;
  answerSource: AnswerSource;
  degraded: boolean;
}

export interface NewSessionTurn {
  /** When given, must equal the next index for the farmer. */
  turnIndex?: number;
  userMessage: string;
  answer: string;
  timestamp?: string;
  answerSource?: AnswerSource;
  degraded?: boolean;
}

export interface SessionSummary {
  farmerId: string;
  turns: SessionTurn[];
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionTurn[]>();

  constructor(private readonly clock: Clock = () => new Date()) {}

  nextTurnIndex(farmerId: string): number {
    return (this.sessions.get(farmerId)?.length ?? 0) + 1;
  }

  appendTurn(farmerId: string, turn: NewSessionTurn): SessionTurn {
    const id = farmerId.trim();
    if (!id) {
      throw new Error("farmer_id_required");
    }

    const history = this.sessions.get(id) ?? [];
    const expected = history.length + 1;
    if (turn.turnIndex !== undefined && turn.turnIndex !== expected) {
      throw new Error(`turn_index_out_of_order: expected ${expected}, got ${turn.turnIndex}`);
    }

    const stored: SessionTurn = {
      turnIndex: expected,
      userMessage: turn.userMessage,
      answer: turn.answer,
      timestamp: turn.timestamp ?? this.clock().toISOString(),
      answerSource: turn.answerSource ?? "model",
      degraded: turn.degraded ?? false,
    };
    history.push(stored);
    this.sessions.set(id, history);
    return { ...stored };
  }

  /** Full history, oldest first. */
  getHistory(farmerId: string): SessionTurn[] {
    return (this.sessions.get(farmerId.trim()) ?? []).map((turn) => ({ ...turn }));
  }

  getSession(farmerId: string): SessionTurn[] {
    return this.getHistory(farmerId);
  }

  /** Last `count` turns, oldest first. */
  getRecent(farmerId: string, count: number): SessionTurn[] {
    if (count <= 0) return [];
    return this.getHistory(farmerId).slice(-count);
  }

  listSessions(): SessionSummary[] {
    return [...this.sessions.entries()].map(([farmerId, turns]) => ({
      farmerId,
      turns: turns.map((turn) => ({ ...turn })),
    }));
  }
}
