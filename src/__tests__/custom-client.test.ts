import { describe, it, expect, beforeEach, vi } from 'vitest';
import { customLLMRequest } from '../llm/customClient.js';
import type { LLMProfile } from '../configManager.js';

const { postMock } = vi.hoisted(() => ({ postMock: vi.fn() }));

vi.mock('axios', () => ({
  default: { post: postMock }
}));

const profile: LLMProfile = {
  type: 'custom',
  apiKey: 'test-secret',
  baseURL: 'http://localhost:5000/v1',
  model: 'local-model',
  sampler: { temperature: 0.3, stop: ['###'] }
};

describe('customLLMRequest', () => {
  beforeEach(() => {
    postMock.mockReset();
  });

  it('posts the raw prompt to the completions endpoint', async () => {
    postMock.mockResolvedValueOnce({ data: { choices: [{ text: '{"score": 1}' }] } });

    await expect(customLLMRequest(profile, '### Instruction:\nhi')).resolves.toBe('{"score": 1}');
    expect(postMock).toHaveBeenCalledWith(
      'http://localhost:5000/v1/completions',
      {
        prompt: '### Instruction:\nhi',
        model: 'local-model',
        max_tokens: 2048,
        temperature: 0.3,
        top_p: 0.9,
        stop: ['###']
      },
      {
        timeout: 120000,
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' }
      }
    );
  });

  it('reads chat-shaped choices', async () => {
    postMock.mockResolvedValueOnce({ data: { choices: [{ message: { content: 'chat answer' } }] } });
    await expect(customLLMRequest(profile, 'prompt')).resolves.toBe('chat answer');
  });

  it('reads a bare result field', async () => {
    postMock.mockResolvedValueOnce({ data: { result: 'plain result' } });
    await expect(customLLMRequest(profile, 'prompt', { timeout: 50 })).resolves.toBe('plain result');
    expect(postMock.mock.calls[0][2]).toMatchObject({ timeout: 50 });
  });

  it('rejects an unknown response shape', async () => {
    postMock.mockResolvedValueOnce({ data: {} });
    await expect(customLLMRequest(profile, 'prompt')).rejects.toThrow(
      'Unexpected completion response format from http://localhost:5000/v1'
    );
  });
});
