/**
 * Replacement map: which words of a tagged sentence may change, and to what
 */

import { getSynonymsForWord } from '../synonyms/expander.js';
import type { LexicalSource } from '../types/lexicon.js';
import type { TaggedToken } from '../types/text.js';
import { shouldReplaceWord } from './eligibility.js';
import type { ParaphraseStyle, ReplaceableWord, ReplacementMap } from './types.js';

export const MAP_MAX_SYNONYMS = 15;

export interface ReplacementMapOptions {
  style: ParaphraseStyle;
  maxSynonyms?: number;
}

export interface ReplacementPlan {
  replacements: ReplacementMap;
  /** Only words that received at least one candidate */
  replaceable: ReplaceableWord[];
}

/**
 * Look up candidates for every eligible token. A word seen twice keeps the
 * list fetched for its last occurrence; each occurrence stays replaceable.
 */
export function buildReplacementMap(
  lexicon: LexicalSource,
  tagged: readonly TaggedToken[],
  options: ReplacementMapOptions
): ReplacementPlan {
  const replacements = new Map<string, readonly string[]>();
  const replaceable: ReplaceableWord[] = [];
  const maxSynonyms = options.maxSynonyms ?? MAP_MAX_SYNONYMS;

  tagged.forEach(({ token, tag }, index) => {
    if (!shouldReplaceWord(token, tag)) return;

    const candidates = getSynonymsForWord(lexicon, token, tag, { maxSynonyms, style: options.style });
    if (candidates.length === 0) return;

    replacements.set(token.toLowerCase(), candidates);
    replaceable.push({ index, word: token, tag });
  });

  return { replacements, replaceable };
}

/**
 * Plain-object copy of the map with each list sorted alphabetically
 */
export function sortedReplacements(replacements: ReplacementMap): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  for (const [word, candidates] of replacements) {
    result[word] = [...candidates].sort();
  }
  return result;
}
