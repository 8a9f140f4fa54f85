import type { MessageRole, Turn } from "./types.js";

/**
 * Append-only, ordered list of turns for the active conversation.
 *
 * Compaction never touches this store; it only shapes what is sent.
 */
export class HistoryStore {
  private turns: Turn[] = [];
  private nextSequence = 1;

  constructor(turns: Turn[] = [], nextSequence?: number) {
    for (const turn of turns) {
      this.append(turn);
    }
    if (nextSequence !== undefined) {
      this.nextSequence = Math.max(this.nextSequence, nextSequence);
    }
  }

  /**
   * Append an already-built turn. Its sequence number must be greater than
   * every turn already stored.
   */
  append(turn: Turn): void {
    const last = this.turns[this.turns.length - 1];
    if (last && turn.sequenceNumber <= last.sequenceNumber) {
      throw new Error(
        `Turn sequence ${turn.sequenceNumber} is not after ${last.sequenceNumber}`,
      );
    }
    this.turns.push({ ...turn });
    this.nextSequence = Math.max(this.nextSequence, turn.sequenceNumber + 1);
  }

  /**
   * Build a turn with the next sequence number and append it.
   */
  record(role: MessageRole, text: string, createdAt = Date.now()): Turn {
    const turn: Turn = {
      role,
      text,
      sequenceNumber: this.nextSequence,
      createdAt,
    };
    this.append(turn);
    return { ...turn };
  }

  snapshot(): Turn[] {
    return this.turns.map((t) => ({ ...t }));
  }

  size(): number {
    return this.turns.length;
  }

  /**
   * Drop every turn. Sequence numbers keep counting up.
   */
  clear(): void {
    this.turns = [];
  }

  /**
   * Replace the active turns (used after summarisation).
   */
  replace(turns: Turn[]): void {
    this.turns = [];
    for (const turn of [...turns].sort(bySequence)) {
      this.append(turn);
    }
  }

  peekNextSequence(): number {
    return this.nextSequence;
  }
}

export function bySequence(a: Turn, b: Turn): number {
  return a.sequenceNumber - b.sequenceNumber;
}
