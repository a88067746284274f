import OpenAI from 'openai';
import type { LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { countTokens } from '../utils/tokenCounter.js';
import type { ChatCompletionOptions, ChatMessage } from './types.js';

export type { ChatMessage } from './types.js';

const log = createLogger(NAMESPACES.llm.client);

// Retry configuration
const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;
const BACKOFF_MULTIPLIER = 2;

// Network, rate limit and temporary server errors
const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];
const RETRYABLE_NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT'];

function readField(error: unknown, field: string): unknown {
  if (error === null || typeof error !== 'object') return undefined;
  return Reflect.get(error, field);
}

export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  const code = readField(error, 'code');
  if (typeof code === 'string' && RETRYABLE_NETWORK_CODES.includes(code)) {
    return true;
  }

  const status = readField(error, 'status');
  if (typeof status === 'number' && RETRYABLE_STATUS_CODES.includes(status)) {
    return true;
  }

  return false;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function calculateBackoff(retryCount: number, baseMs: number): number {
  return baseMs * Math.pow(BACKOFF_MULTIPLIER, retryCount);
}

async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function cleanPromptBackslashes(text: string): string {
  // Replace all instances of \\\ with \
  return text.replace(/\\\\\\/g, '\\');
}

function toMessageParam(msg: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  const content = cleanPromptBackslashes(msg.content);
  switch (msg.role) {
    case 'system':
      return { role: 'system', content };
    case 'assistant':
      return { role: 'assistant', content };
    default:
      return { role: 'user', content };
  }
}

/**
 * Keeps the system message and the last user message, then as much recent
 * history as fits in `maxTokens`.
 */
export function trimMessages(messages: ChatMessage[], maxTokens: number): ChatMessage[] {
  if (!maxTokens || messages.length <= 2) return messages;

  const systemMessage = messages.find(msg => msg.role === 'system');
  const userMessages = messages.filter(msg => msg.role === 'user');
  const currentUserMessage = userMessages[userMessages.length - 1];

  if (!systemMessage || !currentUserMessage) return messages;

  const baseTokens = countTokens(systemMessage.content) + countTokens(currentUserMessage.content);
  if (maxTokens - baseTokens <= 0) {
    return [systemMessage, currentUserMessage];
  }

  const trimmed: ChatMessage[] = [systemMessage];
  let usedTokens = baseTokens;
  const historyMessages = messages.filter(msg => msg !== systemMessage && msg !== currentUserMessage);

  for (let i = historyMessages.length - 1; i >= 0; i--) {
    const msg = historyMessages[i];
    const msgTokens = countTokens(msg.content);
    if (usedTokens + msgTokens > maxTokens) break;
    trimmed.splice(1, 0, msg);
    usedTokens += msgTokens;
  }

  trimmed.push(currentUserMessage);
  return trimmed;
}

export async function chatCompletion(
  profile: LLMProfile,
  messages: ChatMessage[],
  options: ChatCompletionOptions = {}
): Promise<string> {
  let lastError: unknown = null;
  const baseDelay = options.retryDelayMs ?? INITIAL_BACKOFF_MS;

  const profilesToTry: LLMProfile[] = [profile, ...(options.fallbackProfiles || [])];

  for (let profileIndex = 0; profileIndex < profilesToTry.length; profileIndex++) {
    const currentProfile = profilesToTry[profileIndex];

    for (let retryCount = 0; retryCount < MAX_RETRIES; retryCount++) {
      try {
        log('Attempt %d/%d on profile %s', retryCount + 1, MAX_RETRIES, currentProfile.baseURL);
        const result = await attemptChatCompletion(currentProfile, messages);
        if (retryCount > 0) {
          log('Retry succeeded on attempt %d', retryCount + 1);
        }
        return result;
      } catch (error) {
        lastError = error;

        if (!isRetryableError(error)) {
          log('Non-retryable error: %s', errorMessage(error));
          break;
        }

        if (retryCount < MAX_RETRIES - 1) {
          const backoffMs = calculateBackoff(retryCount, baseDelay);
          log('Retryable error, waiting %dms before retry: %s', backoffMs, errorMessage(error));
          await sleep(backoffMs);
        } else {
          log('Max retries (%d) reached on this profile', MAX_RETRIES);
        }
      }
    }

    if (profileIndex < profilesToTry.length - 1) {
      log('Profile %s failed, trying fallback profile', currentProfile.baseURL);
    }
  }

  throw new Error(`All LLM profiles failed. Last error: ${lastError ? errorMessage(lastError) : 'Unknown error'}`, { cause: lastError });
}

async function attemptChatCompletion(profile: LLMProfile, messages: ChatMessage[]): Promise<string> {
  const client = new OpenAI({
    apiKey: profile.apiKey || 'dummy',
    baseURL: profile.baseURL,
    maxRetries: 0, // retries are handled by chatCompletion
  });

  const model = profile.model || 'gpt-4o-mini';

  const cleanedMessages = trimMessages(messages, profile.sampler?.maxContextTokens || 0).map(toMessageParam);

  const sampler = profile.sampler;
  const response = await client.chat.completions.create({
    model,
    messages: cleanedMessages,
    temperature: sampler?.temperature,
    top_p: sampler?.topP,
    max_completion_tokens: sampler?.max_completion_tokens,
    frequency_penalty: sampler?.frequencyPenalty,
    presence_penalty: sampler?.presencePenalty,
    stop: sampler?.stop,
    n: sampler?.n || 1,
    ...(profile.format === 'json' || sampler?.forceJson ? { response_format: { type: 'json_object' as const } } : {}),
  });

  log('Completed call to %s at %s', model, profile.baseURL);
  return response.choices[0]?.message?.content || '';
}
