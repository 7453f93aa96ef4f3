/**
 * Conversation Type Definitions
 */

export type Role = 'user' | 'assistant';

export const Roles = {
  USER: 'user',
  ASSISTANT: 'assistant',
} as const satisfies Record<string, Role>;

/**
 * One immutable exchange entry
 */
export interface Turn {
  readonly role: Role;

  /** Never empty */
  readonly text: string;

  /** Monotonic order marker within one conversation (1-based) */
  readonly timestamp: number;

  /** Wall-clock creation time, for display only */
  readonly createdAt: string;
}

/**
 * Role/text pair presented to a chat API
 */
export interface ChatMessage {
  role: Role;
  text: string;
}
