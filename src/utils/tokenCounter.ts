import { encode } from 'gpt-tokenizer';

/**
 * Count tokens with the GPT tokenizer.
 * Falls back to ~4 characters per token if tokenization fails.
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  try {
    return encode(text).length;
  } catch {
    return Math.max(1, Math.round(text.length / 4));
  }
}
