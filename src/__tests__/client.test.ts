import { describe, it, expect, beforeEach, vi } from 'vitest';
import { chatCompletion, isRetryableError, trimMessages, type ChatMessage } from '../llm/client.js';
import type { LLMProfile } from '../configManager.js';
import { countTokens } from '../utils/tokenCounter.js';

interface ClientOptions {
  apiKey?: string;
  baseURL?: string;
  maxRetries?: number;
}

const { createMock, clientOptions } = vi.hoisted(() => {
  const clientOptions: ClientOptions[] = [];
  return { createMock: vi.fn(), clientOptions };
});

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: createMock } };

    constructor(options: ClientOptions) {
      clientOptions.push(options);
    }
  }
}));

function completion(content: string) {
  return { choices: [{ message: { content } }] };
}

function apiError(status: number, message: string) {
  return Object.assign(new Error(message), { status });
}

describe('LLM Client', () => {
  const mockProfile: LLMProfile = {
    type: 'openai',
    apiKey: 'test-key',
    baseURL: 'http://primary.local/v1',
    model: 'test-model'
  };

  const messages: ChatMessage[] = [
    { role: 'system', content: 'You are a critic.' },
    { role: 'user', content: 'Score it.' }
  ];

  beforeEach(() => {
    createMock.mockReset();
    clientOptions.length = 0;
  });

  it('returns the first choice content', async () => {
    createMock.mockResolvedValueOnce(completion('{"score": 3}'));

    await expect(chatCompletion(mockProfile, messages)).resolves.toBe('{"score": 3}');
    expect(clientOptions).toEqual([{ apiKey: 'test-key', baseURL: 'http://primary.local/v1', maxRetries: 0 }]);
    expect(createMock).toHaveBeenCalledWith(expect.objectContaining({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'You are a critic.' },
        { role: 'user', content: 'Score it.' }
      ],
      n: 1
    }));
  });

  it('asks for a JSON object for json profiles', async () => {
    createMock.mockResolvedValueOnce(completion('{}'));
    await chatCompletion({ ...mockProfile, format: 'json' }, messages);
    expect(createMock.mock.calls[0][0]).toMatchObject({ response_format: { type: 'json_object' } });
  });

  it('passes sampler settings through', async () => {
    createMock.mockResolvedValueOnce(completion('{}'));
    await chatCompletion({ ...mockProfile, sampler: { temperature: 0.2, topP: 0.5, stop: ['END'] } }, messages);
    expect(createMock.mock.calls[0][0]).toMatchObject({ temperature: 0.2, top_p: 0.5, stop: ['END'] });
    expect(createMock.mock.calls[0][0].response_format).toBeUndefined();
  });

  it('returns an empty string when there is no choice', async () => {
    createMock.mockResolvedValueOnce({ choices: [] });
    await expect(chatCompletion(mockProfile, messages)).resolves.toBe('');
  });

  it('retries retryable errors', async () => {
    createMock.mockRejectedValueOnce(apiError(429, 'rate limited'));
    createMock.mockResolvedValueOnce(completion('ok'));

    await expect(chatCompletion(mockProfile, messages, { retryDelayMs: 1 })).resolves.toBe('ok');
    expect(createMock).toHaveBeenCalledTimes(2);
  });

  it('gives up on a profile after three attempts', async () => {
    createMock.mockRejectedValue(apiError(503, 'unavailable'));

    await expect(chatCompletion(mockProfile, messages, { retryDelayMs: 1 })).rejects.toThrow(
      'All LLM profiles failed. Last error: unavailable'
    );
    expect(createMock).toHaveBeenCalledTimes(3);
  });

  it('does not retry other errors', async () => {
    const badRequest = apiError(400, 'bad request');
    createMock.mockRejectedValue(badRequest);

    const error = await chatCompletion(mockProfile, messages, { retryDelayMs: 1 }).catch((reason: unknown) => reason);
    expect(error).toMatchObject({ message: 'All LLM profiles failed. Last error: bad request', cause: badRequest });
    expect(createMock).toHaveBeenCalledTimes(1);
  });

  it('moves on to fallback profiles', async () => {
    const backup: LLMProfile = { type: 'openai', baseURL: 'http://backup.local/v1' };
    createMock.mockRejectedValueOnce(apiError(401, 'unauthorized'));
    createMock.mockResolvedValueOnce(completion('from backup'));

    await expect(chatCompletion(mockProfile, messages, { fallbackProfiles: [backup], retryDelayMs: 1 })).resolves.toBe('from backup');
    expect(clientOptions.map(options => options.baseURL)).toEqual(['http://primary.local/v1', 'http://backup.local/v1']);
    expect(createMock.mock.calls[1][0]).toMatchObject({ model: 'gpt-4o-mini' });
  });

  describe('isRetryableError', () => {
    it('matches network codes and temporary statuses', () => {
      expect(isRetryableError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
      expect(isRetryableError(apiError(502, 'bad gateway'))).toBe(true);
      expect(isRetryableError(apiError(404, 'missing'))).toBe(false);
      expect(isRetryableError(new Error('plain'))).toBe(false);
      expect(isRetryableError(null)).toBe(false);
    });
  });

  describe('trimMessages', () => {
    const history: ChatMessage[] = [
      { role: 'system', content: 'You are a critic.' },
      { role: 'user', content: 'Earlier question' },
      { role: 'assistant', content: 'Earlier answer' },
      { role: 'user', content: 'Score it.' }
    ];

    it('keeps everything when it fits', () => {
      expect(trimMessages(history, 10000)).toEqual(history);
    });

    it('keeps only the system and current user message when nothing else fits', () => {
      const base = countTokens('You are a critic.') + countTokens('Score it.');
      expect(trimMessages(history, base)).toEqual([history[0], history[3]]);
    });

    it('drops the oldest history first', () => {
      const budget = countTokens('You are a critic.') + countTokens('Score it.') + countTokens('Earlier answer');
      expect(trimMessages(history, budget)).toEqual([history[0], history[2], history[3]]);
    });

    it('leaves messages alone without a limit', () => {
      expect(trimMessages(history, 0)).toBe(history);
    });
  });

  describe('Token Counting', () => {
    it('should count tokens', () => {
      const tokenCount = countTokens('Hello world');
      expect(tokenCount).toBeGreaterThan(0);
      expect(tokenCount).toBeLessThan(10);
    });

    it('should handle empty text', () => {
      expect(countTokens('')).toBe(0);
    });
  });
});
