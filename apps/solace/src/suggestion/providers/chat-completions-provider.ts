/**
 * OpenAI-compatible chat completions provider (secondary suggestion tier)
 *
 * Defaults to Together AI; any endpoint speaking the `/chat/completions`
 * dialect works. These endpoints reject histories that do not alternate, so
 * the messages arrive already repaired.
 */

import { z } from 'zod';
import { SuggestionTierFailure, errorMessage } from '../../utils/errors';
import { bearerHeaders, parseJsonBody } from '../../utils/http';
import { ChatProvider, ChatRequest, SourceTier, SourceTiers } from '../types';

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable(),
    }),
  })),
});

export interface ChatCompletionsProviderOptions {
  name?: string;
  apiKey: string | null;
  baseUrl: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  topP: number;
  tier?: SourceTier;
  fetchImpl?: typeof fetch;
}

interface WireMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export class ChatCompletionsProvider implements ChatProvider {
  readonly name: string;
  private readonly tier: SourceTier;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: ChatCompletionsProviderOptions) {
    this.name = options.name ?? 'together';
    this.tier = options.tier ?? SourceTiers.SECONDARY_API;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get modelId(): string {
    return this.options.model;
  }

  isConfigured(): boolean {
    return this.options.apiKey !== null;
  }

  async complete(chat: ChatRequest, signal: AbortSignal): Promise<string> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new SuggestionTierFailure(this.tier, 'unavailable', `${this.name} API key not configured`);
    }

    const messages: WireMessage[] = [
      { role: 'system', content: chat.systemInstruction },
      ...chat.messages.map((message) => ({ role: message.role, content: message.text })),
    ];

    const response = await this.fetchImpl(`${this.options.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: bearerHeaders(apiKey),
      body: JSON.stringify({
        model: this.options.model,
        messages,
        max_tokens: this.options.maxOutputTokens,
        temperature: this.options.temperature,
        top_p: this.options.topP,
      }),
      signal,
    });

    if (!response.ok) {
      const detail = await response.text().catch((error: unknown) => `<unreadable body: ${errorMessage(error)}>`);
      throw new SuggestionTierFailure(
        this.tier,
        'http_error',
        `${this.name} API error: ${response.status} ${response.statusText}`,
        { status: response.status, body: detail.slice(0, 500) }
      );
    }

    const parsed = await parseJsonBody(response, completionSchema);
    if (!parsed.ok) {
      throw new SuggestionTierFailure(this.tier, 'malformed_response', `${this.name} response ${parsed.issue}`);
    }

    const content = parsed.data.choices[0]?.message.content ?? '';
    if (!content.trim()) {
      throw new SuggestionTierFailure(this.tier, 'empty_completion', `${this.name} returned no completion`);
    }
    return content;
  }
}
