/**
 * Penn Treebank tag -> lexicon word class
 */

import type { WordClass } from '../types/lexicon.js';

/**
 * Map a tagger label onto a lexicon word class.
 * Unrecognized or missing tags mean "no restriction".
 */
export function toWordClass(tag: string | null | undefined): WordClass | undefined {
  if (!tag) return undefined;
  const upper = tag.toUpperCase();
  if (upper.startsWith('N')) return 'noun';
  if (upper.startsWith('V')) return 'verb';
  if (upper.startsWith('J')) return 'adjective';
  if (upper.startsWith('R')) return 'adverb';
  return undefined;
}
