import { RagError } from './errors';
import type { ConversationTurn } from './types';

/** Fixed-capacity FIFO of the most recent turns of one conversation. */
export class ConversationMemory {
  readonly capacity: number;
  private turns: ConversationTurn[] = [];

  constructor(capacity = 3) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RagError('InvalidConfig', `Memory capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  append(turn: ConversationTurn): void {
    this.turns.push({ ...turn });
    if (this.turns.length > this.capacity) {
      this.turns.splice(0, this.turns.length - this.capacity);
    }
  }

  /** The last `n` turns (all by default), oldest first. A count that is not a number selects none. */
  recent(n: number = this.capacity): ConversationTurn[] {
    const count = Number.isNaN(n) ? 0 : Math.max(0, Math.min(Math.floor(n), this.turns.length));
    if (count === 0) {
      return [];
    }
    return this.turns.slice(-count).map((turn) => ({ ...turn }));
  }

  clear(): void {
    this.turns = [];
  }

  get size(): number {
    return this.turns.length;
  }
}

/**
 * Conversation memories keyed by session. Holds at most `maxSessions`; the
 * least recently used session is dropped to make room.
 */
export class SessionMemoryStore {
  private readonly sessions = new Map<string, ConversationMemory>();

  constructor(
    private readonly capacity: number,
    private readonly maxSessions: number
  ) {}

  get(sessionId: string): ConversationMemory {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, existing);
      return existing;
    }

    const memory = new ConversationMemory(this.capacity);
    this.sessions.set(sessionId, memory);
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
    }
    return memory;
  }

  peek(sessionId: string): ConversationTurn[] {
    return this.sessions.get(sessionId)?.recent() ?? [];
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  clearAll(): void {
    this.sessions.clear();
  }

  get size(): number {
    return this.sessions.size;
  }
}
