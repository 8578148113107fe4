export const CHARS_PER_TOKEN = 4;

/**
 * Rough token count at four characters per token. This is an approximation,
 * not the provider's tokenizer; a prompt it underestimates can still be
 * rejected by the provider.
 */
export const estimateTokens = (text: string): number =>
  Math.floor(text.length / CHARS_PER_TOKEN) + 1;

export const estimateRequestTokens = (prompt: string, maxOutputTokens: number): number =>
  estimateTokens(prompt) + maxOutputTokens;

export const maxCharsForTokens = (tokens: number): number =>
  tokens < 1 ? 0 : (tokens - 1) * CHARS_PER_TOKEN + (CHARS_PER_TOKEN - 1);
