import type { LLMProfile } from '../configManager.js';

/**
 * Chat message format for LLM APIs
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionOptions {
  /** Profiles tried in order once the primary profile has exhausted its retries. */
  fallbackProfiles?: LLMProfile[];
  /** Base backoff between retries; doubles on each attempt. */
  retryDelayMs?: number;
}
