/**
 * Whitespace and punctuation cleanup for sentences re-joined from tokens
 */

/**
 * Pull `.,!?;:` and contraction tokens (`n't`, `'s`, `'ll`...) onto the
 * preceding word, close the gap between adjacent marks and collapse whitespace.
 */
export function normalizeSpacing(text: string): string {
  return text
    .replace(/\s+(n['’]t|['’](?:s|re|ve|ll|d|m))\b/gi, '$1')
    .replace(/\s+([.,!?;:])/g, '$1')
    .replace(/([.,!?;:])\s*([.,!?;:])/g, '$1$2')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Space-join tokens into a sentence
 */
export function joinTokens(tokens: readonly string[]): string {
  return normalizeSpacing(tokens.join(' '));
}
