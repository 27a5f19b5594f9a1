// ═════════════════════════════════════════════════════════════════════════════
// SESSION SERVICE — In-memory conversation history
// ═════════════════════════════════════════════════════════════════════════════

import { ConversationTurn } from "../utils/types";

/**
 * Keeps the most recent turns of each session in process memory, for at most
 * `maxSessions` sessions. The session touched longest ago is dropped first.
 * History is lost on restart.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ConversationTurn[]>();

  constructor(
    private readonly maxTurns: number,
    private readonly maxSessions: number,
  ) {}

  get(sessionId: string): readonly ConversationTurn[] {
    return this.sessions.get(sessionId) ?? [];
  }

  append(sessionId: string, user: string, model: string): void {
    const turns = [...this.get(sessionId), { user, model }];
    // Re-insert so Map order runs from least to most recently used
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, turns.slice(-this.maxTurns));

    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(oldest);
    }
  }

  get size(): number {
    return this.sessions.size;
  }
}
