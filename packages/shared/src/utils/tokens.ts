/**
 * Approximate token counting for text the caller has not measured.
 * Roughly four characters per token.
 */

const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
