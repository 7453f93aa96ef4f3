/**
 * Chat request assembly for the remote suggestion tiers
 */

import { assembleAlternatingHistory } from '../conversation/alternation';
import { EmotionResult, NEUTRAL_LABEL } from '../emotion/types';
import { ChatRequest, SuggestionRequest } from './types';

export const SUPPORT_PERSONA = `You are a warm, supportive listening companion. You are not a therapist, doctor or crisis service, and you never diagnose, prescribe or give medical advice.

How to reply:
- Speak naturally and conversationally, as a caring friend would.
- Refer to the specific things the user said; avoid stock phrases such as "thank you for sharing".
- Offer three to five concrete, gentle suggestions the user could try today.
- Keep the tone encouraging and emotionally attentive, in four to eight sentences.
- If the user mentions wanting to harm themselves, encourage them to contact local emergency services or a trusted person right away.`;

/**
 * System instruction with the detected emotion embedded
 */
export function buildSystemInstruction(emotion: EmotionResult): string {
  if (emotion.primaryLabel === NEUTRAL_LABEL) {
    return `${SUPPORT_PERSONA}\n\nNo clear emotion was detected in the latest message; respond to its content.`;
  }
  const percent = Math.round(emotion.confidence * 100);
  return `${SUPPORT_PERSONA}\n\nThe latest message most likely expresses ${emotion.primaryLabel} (${percent}% confidence). Let that shape your tone without naming it as a diagnosis.`;
}

/**
 * Final user message: the user's words plus the detected emotion
 */
export function formatUserPrompt(text: string, emotion: EmotionResult): string {
  return `User message: ${text}\n\nDetected emotion: ${emotion.primaryLabel}\n\nNow speak to the user:`;
}

/**
 * Build the request for a chat API: the last `contextWindowTurns` turns of
 * context plus the current message, trimmed so roles strictly alternate.
 */
export function buildChatRequest(request: SuggestionRequest, contextWindowTurns: number): ChatRequest {
  const window = contextWindowTurns > 0 ? request.context.slice(-contextWindowTurns) : [];
  const messages = assembleAlternatingHistory(window, formatUserPrompt(request.text, request.emotion));

  return {
    systemInstruction: buildSystemInstruction(request.emotion),
    messages,
    emotionLabel: request.emotion.primaryLabel,
  };
}
