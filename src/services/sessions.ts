// src/services/sessions.ts
// What: Per-session conversation history for the chat API.
// How: Each session owns an ordered, append-only log of user/assistant turns. Logs live in memory only, keyed by
//      a uuid, and are never fed back into retrieval or the prompt. The store is bounded: when full, the session
//      that was least recently used is dropped.

import { v4 as uuidv4, validate as validateUuid } from 'uuid';

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  at: string; // ISO timestamp
}

export class ConversationLog {
  readonly id: string;
  private readonly entries: ConversationTurn[] = [];

  constructor(id: string) {
    this.id = id;
  }

  append(role: TurnRole, content: string, at: Date = new Date()): ConversationTurn {
    const turn = { role, content, at: at.toISOString() };
    this.entries.push(turn);
    return turn;
  }

  turns(): ConversationTurn[] {
    return this.entries.map((t) => ({ ...t }));
  }

  get length(): number {
    return this.entries.length;
  }
}

export class SessionStore {
  private readonly sessions = new Map<string, ConversationLog>();
  readonly maxSessions: number;

  constructor(maxSessions = 1000) {
    this.maxSessions = Math.max(1, maxSessions);
  }

  /**
   * Return the session for `id`, or open a new one when `id` is missing, malformed or unknown.
   */
  open(id?: string): ConversationLog {
    if (id && validateUuid(id)) {
      const existing = this.sessions.get(id);
      if (existing) {
        this.touch(existing);
        return existing;
      }
    }
    const log = new ConversationLog(uuidv4());
    this.sessions.set(log.id, log);
    this.evict();
    return log;
  }

  get(id: string): ConversationLog | undefined {
    return this.sessions.get(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  // Map keeps insertion order; re-inserting marks the session as most recently used.
  private touch(log: ConversationLog): void {
    this.sessions.delete(log.id);
    this.sessions.set(log.id, log);
  }

  private evict(): void {
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) return;
      this.sessions.delete(oldest.value);
    }
  }
}
