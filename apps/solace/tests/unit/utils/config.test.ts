import { CONFIG, getConfig, hasCredential, validateConfig } from '../../../src/utils/config';
import { ConfigurationError } from '../../../src/utils/errors';

describe('getConfig', () => {
  it('should use defaults and no credentials for an empty environment', () => {
    const config = getConfig({});

    expect(config.credentials).toEqual({
      voyageApiKey: null,
      geminiApiKey: null,
      togetherApiKey: null,
      huggingFaceApiKey: null,
    });
    expect(config.conversation.contextWindowTurns).toBe(4);
    expect(config.emotion.model).toBe('lexicon');
    expect(config.api.port).toBe(3000);
    expect(config.suggestion.primary.timeoutMs).toBe(CONFIG.suggestion.primary.timeoutMs);
  });

  it('should treat blank credentials as missing', () => {
    const config = getConfig({ GEMINI_API_KEY: '   ', TOGETHER_API_KEY: ' test-secret ' });

    expect(hasCredential(config, 'geminiApiKey')).toBe(false);
    expect(hasCredential(config, 'togetherApiKey')).toBe(true);
    expect(config.credentials.togetherApiKey).toBe('test-secret');
  });

  it('should apply environment overrides', () => {
    const config = getConfig({
      CONTEXT_WINDOW_TURNS: '6',
      EMOTION_MODEL: 'huggingface',
      REQUEST_TIMEOUT_MS: '5000',
      GEMINI_MODEL: 'gemini-test',
      TOGETHER_API_URL: 'https://chat.test/v1',
      PORT: '8080',
    });

    expect(config.conversation.contextWindowTurns).toBe(6);
    expect(config.emotion.model).toBe('huggingface');
    expect(config.embedding.timeoutMs).toBe(5000);
    expect(config.suggestion.primary.timeoutMs).toBe(5000);
    expect(config.suggestion.secondary.timeoutMs).toBe(5000);
    expect(config.suggestion.primary.model).toBe('gemini-test');
    expect(config.suggestion.secondary.baseUrl).toBe('https://chat.test/v1');
    expect(config.api.port).toBe(8080);
  });

  it('should read the generic reply phrases as a comma-separated list', () => {
    expect(getConfig({}).suggestion.genericReplyPhrases).toEqual(['thank you for sharing', 'as an ai language model']);
    expect(getConfig({ GENERIC_REPLY_PHRASES: ' i understand , ,thanks for opening up' }).suggestion.genericReplyPhrases).toEqual([
      'i understand',
      'thanks for opening up',
    ]);
    expect(getConfig({ GENERIC_REPLY_PHRASES: '' }).suggestion.genericReplyPhrases).toEqual([]);
  });

  it('should reject an unknown emotion model', () => {
    expect(() => getConfig({ EMOTION_MODEL: 'gpt' })).toThrow(ConfigurationError);
  });

  it('should reject non-numeric integers', () => {
    expect(() => getConfig({ PORT: 'eighty' })).toThrow("Expected an integer but got 'eighty'");
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(() => validateConfig(getConfig({}))).not.toThrow();
  });

  it('should reject a negative context window', () => {
    expect(() => validateConfig(getConfig({ CONTEXT_WINDOW_TURNS: '-1' }))).toThrow(
      'CONTEXT_WINDOW_TURNS must not be negative'
    );
  });

  it('should reject a minimum reply length below one', () => {
    expect(() => validateConfig(getConfig({ MIN_REPLY_LENGTH: '0' }))).toThrow('MIN_REPLY_LENGTH must be at least 1');
  });

  it('should reject a privileged port', () => {
    expect(() => validateConfig(getConfig({ PORT: '80' }))).toThrow('API port must be between 1024 and 65535');
  });

  it('should reject a negative timeout', () => {
    expect(() => validateConfig(getConfig({ REQUEST_TIMEOUT_MS: '-5' }))).toThrow(
      'Request timeouts must be finite and positive'
    );
  });
});
