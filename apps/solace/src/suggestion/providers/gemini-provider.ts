/**
 * Gemini chat provider (primary suggestion tier)
 */

import {
  Content,
  GoogleGenerativeAI,
  ModelParams,
  RequestOptions,
  SingleRequestOptions,
  StartChatParams,
} from '@google/generative-ai';
import { Roles } from '../../conversation/types';
import { SuggestionTierFailure, errorMessage } from '../../utils/errors';
import { ChatProvider, ChatRequest, SourceTiers } from '../types';

/**
 * The slice of the Gemini SDK this provider relies on
 */
export interface GeminiModelFactory {
  getGenerativeModel(
    params: ModelParams,
    requestOptions?: RequestOptions
  ): {
    startChat(params?: StartChatParams): {
      sendMessage(request: string, requestOptions?: SingleRequestOptions): Promise<{ response: { text(): string } }>;
    };
  };
}

export interface GeminiProviderOptions {
  apiKey: string | null;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export class GeminiChatProvider implements ChatProvider {
  readonly name = 'gemini';
  private client: GeminiModelFactory | null;

  constructor(private readonly options: GeminiProviderOptions, client?: GeminiModelFactory) {
    this.client = client ?? (options.apiKey ? new GoogleGenerativeAI(options.apiKey) : null);
  }

  get modelId(): string {
    return this.options.model;
  }

  isConfigured(): boolean {
    return this.options.apiKey !== null && this.client !== null;
  }

  async complete(chat: ChatRequest, signal: AbortSignal): Promise<string> {
    if (!this.client) {
      throw new SuggestionTierFailure(SourceTiers.PRIMARY_API, 'unavailable', 'GEMINI_API_KEY not configured');
    }

    const model = this.client.getGenerativeModel(
      {
        model: this.options.model,
        systemInstruction: chat.systemInstruction,
        generationConfig: {
          temperature: this.options.temperature,
          maxOutputTokens: this.options.maxOutputTokens,
        },
      },
      { timeout: this.options.timeoutMs }
    );

    // Gemini names the assistant role "model"
    const history: Content[] = chat.messages.slice(0, -1).map((message) => ({
      role: message.role === Roles.ASSISTANT ? 'model' : 'user',
      parts: [{ text: message.text }],
    }));
    const current = chat.messages[chat.messages.length - 1];

    signal.throwIfAborted();
    const result = await model.startChat({ history }).sendMessage(current.text, { signal });

    let text: string;
    try {
      text = result.response.text();
    } catch (error) {
      // text() throws when the candidate was blocked
      throw new SuggestionTierFailure(
        SourceTiers.PRIMARY_API,
        'malformed_response',
        `Gemini returned no usable candidate: ${errorMessage(error)}`
      );
    }

    if (!text.trim()) {
      throw new SuggestionTierFailure(SourceTiers.PRIMARY_API, 'empty_completion', 'Gemini returned an empty reply');
    }
    return text;
  }
}
