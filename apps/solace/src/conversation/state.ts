/**
 * ConversationState - append-only log of turns for one session
 */

import { Role, Turn } from './types';
import { ValidationError } from '../utils/errors';

export class ConversationState {
  private turns: Turn[] = [];
  private sequence = 0;

  /**
   * Append a new turn. Text must contain something other than whitespace.
   */
  append(role: Role, text: string): Turn {
    if (text.trim().length === 0) {
      throw new ValidationError('Turn text cannot be empty');
    }

    this.sequence += 1;
    const turn: Turn = Object.freeze({
      role,
      text,
      timestamp: this.sequence,
      createdAt: new Date().toISOString(),
    });
    this.turns.push(turn);
    return turn;
  }

  /**
   * All turns in conversational order
   */
  getTurns(): readonly Turn[] {
    return [...this.turns];
  }

  /**
   * Turns strictly before the one with the given timestamp
   */
  getTurnsBefore(timestamp: number): readonly Turn[] {
    return this.turns.filter((turn) => turn.timestamp < timestamp);
  }

  /**
   * The last `size` turns (bounded recent-context window)
   */
  recent(size: number): readonly Turn[] {
    if (size <= 0) return [];
    return this.turns.slice(-size);
  }

  last(): Turn | undefined {
    return this.turns[this.turns.length - 1];
  }

  get size(): number {
    return this.turns.length;
  }

  isEmpty(): boolean {
    return this.turns.length === 0;
  }

  /**
   * Drop every turn and restart the sequence
   */
  reset(): void {
    this.turns = [];
    this.sequence = 0;
  }
}
