/**
 * Word eligibility for substitution
 */

/**
 * Function words that are never substituted
 */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
  'of', 'with', 'by', 'is', 'are', 'was', 'were', 'be', 'been', 'have',
  'has', 'had', 'do', 'does', 'did', 'will', 'would', 'could', 'should',
  'this', 'that', 'these', 'those', 'it', 'its', 'he', 'she', 'they',
]);

/**
 * Function words ignored when deciding whether a sentence still carries content
 */
export const FUNCTION_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
  'of', 'with', 'by', 'is', 'are', 'was', 'were', 'be', 'been', 'have',
  'has', 'had', 'do', 'does', 'did', 'will', 'would', 'could', 'should',
]);

const ALPHANUMERIC = /^[\p{L}\p{N}]+$/u;
const CONTENT_TAG = /^[NVJR]/;
const TRAILING_POSSESSIVE = /'s?$/i;
const LEADING_UPPERCASE = /^\p{Lu}/u;

/**
 * True when the token is non-empty and made only of letters and digits
 */
export function isAlphanumeric(token: string): boolean {
  return ALPHANUMERIC.test(token);
}

export function startsUppercase(token: string): boolean {
  return LEADING_UPPERCASE.test(token);
}

/**
 * Uppercase first letter, lowercase the rest
 */
export function capitalize(word: string): string {
  if (word.length === 0) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Decide whether a token may be swapped for a synonym.
 * Content words only: nouns, verbs, adjectives and adverbs when a tag is known.
 */
export function shouldReplaceWord(word: string, tag?: string | null): boolean {
  if (!word) return false;

  if (!isAlphanumeric(word.replace(TRAILING_POSSESSIVE, ''))) {
    return false;
  }

  if (word.length < 3) return false;

  if (STOP_WORDS.has(word.toLowerCase())) return false;

  if (tag) {
    return CONTENT_TAG.test(tag.toUpperCase());
  }
  return true;
}
