/**
 * Alternation repair for chat-completion style APIs
 *
 * Chat APIs reject histories that do not go user, assistant, user, ... and
 * end on a user message. A dangling user turn (a turn whose reply was never
 * recorded) breaks that shape, so before each request the history is trimmed
 * from the oldest end until the remainder alternates. Nothing is merged and
 * nothing is invented.
 */

import { ChatMessage, Roles } from './types';

/**
 * True when messages start with a user turn, alternate roles and end with a
 * user turn. An empty sequence is not valid: there is nothing to answer.
 */
export function isStrictlyAlternating(messages: readonly ChatMessage[]): boolean {
  if (messages.length === 0) return false;
  if (messages[0].role !== Roles.USER) return false;
  if (messages[messages.length - 1].role !== Roles.USER) return false;

  for (let i = 1; i < messages.length; i++) {
    if (messages[i].role === messages[i - 1].role) return false;
  }
  return true;
}

/**
 * Keep the longest suffix of `messages` that is strictly alternating.
 *
 * The last message must be the new user turn; if it is not, there is no
 * valid suffix and the result is empty. Running this on its own output
 * returns the same sequence.
 */
export function repairAlternation<T extends ChatMessage>(messages: readonly T[]): T[] {
  const lastIndex = messages.length - 1;
  if (lastIndex < 0 || messages[lastIndex].role !== Roles.USER) {
    return [];
  }

  let start = lastIndex;
  while (start > 0 && messages[start - 1].role !== messages[start].role) {
    start--;
  }

  // The window has to open on a user turn
  if (messages[start].role !== Roles.USER) {
    start++;
  }

  return messages.slice(start);
}

/**
 * Context window plus the new user message, trimmed to a valid shape
 */
export function assembleAlternatingHistory(
  context: readonly ChatMessage[],
  currentText: string
): ChatMessage[] {
  const sequence: ChatMessage[] = [
    ...context.map(({ role, text }) => ({ role, text })),
    { role: Roles.USER, text: currentText },
  ];
  return repairAlternation(sequence);
}
