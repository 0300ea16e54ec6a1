/**
 * Replacement candidate lookup for a single word
 */

import type { LexicalSource, Synset } from '../types/lexicon.js';
import { toWordClass } from '../lexicon/pos-map.js';
import type { SynonymConfig } from './types.js';
import { DEFAULT_SYNONYM_CONFIG } from './types.js';
import { rankByStyle } from './scorer.js';

/**
 * Lemma form as a plain lowercase word or phrase
 */
export function lemmaToText(lemma: string): string {
  return lemma.replace(/_/g, ' ').toLowerCase();
}

function isSingleWord(text: string): boolean {
  return text.split(' ').length === 1;
}

/**
 * Same two leading letters and nearly the same length: most likely an
 * inflection of the source word rather than a real alternative.
 */
export function isTooSimilar(candidate: string, source: string): boolean {
  return candidate.slice(0, 2) === source.slice(0, 2)
    && Math.abs(candidate.length - source.length) <= 1;
}

function findSenses(lexicon: LexicalSource, word: string, tag?: string | null): Synset[] {
  const wordClass = toWordClass(tag);
  let senses: Synset[] = [];
  if (wordClass) {
    senses = lexicon.synsetsFor(word, wordClass);
  }
  if (senses.length === 0) {
    senses = lexicon.synsetsFor(word);
  }
  return senses;
}

/**
 * Ranked single-word alternatives for `word`, most relevant first.
 * Falls back to the first hypernym of the leading senses when fewer than
 * `minBeforeHypernyms` direct synonyms exist.
 */
export function getSynonymsForWord(
  lexicon: LexicalSource,
  word: string,
  tag?: string | null,
  config: Partial<SynonymConfig> = {}
): string[] {
  const fullConfig: SynonymConfig = { ...DEFAULT_SYNONYM_CONFIG, ...config };
  const source = word.toLowerCase();

  const senses = findSenses(lexicon, source, tag);
  if (senses.length === 0) {
    return [];
  }

  const synonyms = new Set<string>();

  collect: for (const sense of senses.slice(0, fullConfig.maxSenses)) {
    for (const lemma of sense.lemmas) {
      const candidate = lemmaToText(lemma);
      if (
        candidate !== source
        && isSingleWord(candidate)
        && candidate.length >= 2
        && !isTooSimilar(candidate, source)
      ) {
        synonyms.add(candidate);
      }
      if (synonyms.size >= fullConfig.maxSynonyms) break collect;
    }
  }

  if (synonyms.size < fullConfig.minBeforeHypernyms) {
    backfill: for (const sense of senses.slice(0, fullConfig.maxHypernymSenses)) {
      for (const hypernym of sense.hypernyms().slice(0, 1)) {
        for (const lemma of hypernym.lemmas) {
          const candidate = lemmaToText(lemma);
          if (candidate !== source && isSingleWord(candidate) && candidate.length >= 3) {
            synonyms.add(candidate);
            if (synonyms.size >= fullConfig.maxSynonyms) break backfill;
          }
        }
      }
    }
  }

  return rankByStyle([...synonyms], fullConfig.style).slice(0, fullConfig.maxSynonyms);
}
