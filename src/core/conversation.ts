export type Role = 'user' | 'assistant';

export interface Turn {
  readonly role: Role;
  readonly content: string;
}

export class TurnOrderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TurnOrderError';
  }
}

/**
 * Append-only turn log for a single session.
 *
 * Turns alternate strictly, starting with `user`. Entries are frozen on
 * append, so a view returned by {@link ConversationStore.all} never changes
 * underneath the caller.
 */
export class ConversationStore {
  private turns: Turn[] = [];

  append(turn: Turn): Turn {
    const expected: Role = this.turns.length % 2 === 0 ? 'user' : 'assistant';
    if (turn.role !== expected) {
      throw new TurnOrderError(`expected a ${expected} turn, got ${turn.role}`);
    }
    if (turn.role === 'user' && turn.content.trim().length === 0) {
      throw new TurnOrderError('user turn content must not be blank');
    }
    const stored = Object.freeze({ role: turn.role, content: turn.content });
    this.turns.push(stored);
    return stored;
  }

  all(): readonly Turn[] {
    return this.turns.slice();
  }

  get size(): number {
    return this.turns.length;
  }
}
