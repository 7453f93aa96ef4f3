import { ChatCompletionsProvider } from '../../../src/suggestion/providers/chat-completions-provider';
import { ChatRequest } from '../../../src/suggestion/types';
import { SuggestionTierFailure } from '../../../src/utils/errors';
import { FetchMock, createFetchMock, jsonResponse, sentBody, sentUrl, textResponse } from '../../helpers/fakes';

const chat: ChatRequest = {
  systemInstruction: 'Be kind.',
  messages: [
    { role: 'user', text: 'I had a rough day' },
    { role: 'assistant', text: 'I am sorry to hear that.' },
    { role: 'user', text: 'My boss yelled at me' },
  ],
  emotionLabel: 'anger',
};

describe('ChatCompletionsProvider', () => {
  let fetchMock: FetchMock;

  const provider = (apiKey: string | null = 'test-secret') =>
    new ChatCompletionsProvider({
      apiKey,
      baseUrl: 'https://chat.test/v1',
      model: 'test-chat-model',
      temperature: 0.9,
      maxOutputTokens: 600,
      topP: 0.95,
      fetchImpl: fetchMock,
    });

  beforeEach(() => {
    fetchMock = createFetchMock();
  });

  it('should post the system instruction followed by the conversation', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      choices: [{ message: { content: 'That sounds really unfair.' } }],
    }));

    const reply = await provider().complete(chat, new AbortController().signal);

    expect(reply).toBe('That sounds really unfair.');
    expect(sentUrl(fetchMock)).toBe('https://chat.test/v1/chat/completions');
    expect(sentBody(fetchMock)).toEqual({
      model: 'test-chat-model',
      messages: [
        { role: 'system', content: 'Be kind.' },
        { role: 'user', content: 'I had a rough day' },
        { role: 'assistant', content: 'I am sorry to hear that.' },
        { role: 'user', content: 'My boss yelled at me' },
      ],
      max_tokens: 600,
      temperature: 0.9,
      top_p: 0.95,
    });
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
  });

  it('should report HTTP errors with status and body', async () => {
    fetchMock.mockResolvedValue(textResponse('upstream down', 500));

    const failure = provider().complete(chat, new AbortController().signal);

    await expect(failure).rejects.toBeInstanceOf(SuggestionTierFailure);
    await expect(failure).rejects.toMatchObject({
      tier: 'SECONDARY_API',
      reason: 'http_error',
      details: { status: 500, body: 'upstream down' },
    });
  });

  it('should report an unexpected payload as malformed', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ output: 'hello' }));

    await expect(provider().complete(chat, new AbortController().signal)).rejects.toMatchObject({
      reason: 'malformed_response',
    });
  });

  it('should report missing content as an empty completion', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: null } }] }));

    await expect(provider().complete(chat, new AbortController().signal)).rejects.toMatchObject({
      reason: 'empty_completion',
    });
  });

  it('should report an empty choice list as an empty completion', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ choices: [] }));

    await expect(provider().complete(chat, new AbortController().signal)).rejects.toMatchObject({
      reason: 'empty_completion',
    });
  });

  it('should refuse to call the API without a key', async () => {
    const unconfigured = provider(null);

    expect(unconfigured.isConfigured()).toBe(false);
    await expect(unconfigured.complete(chat, new AbortController().signal)).rejects.toMatchObject({
      reason: 'unavailable',
      message: 'together API key not configured',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
