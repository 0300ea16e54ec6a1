/**
 * Word lookup: synonyms, antonyms, related words and usage examples
 */

import type { LexicalSource } from '../types/lexicon.js';
import { lemmaToText } from '../synonyms/expander.js';

export interface WordLookupResult {
  word: string;
  synonyms: string[];
  antonyms: string[];
  related: string[];
  examples: string[];
}

function sortedWithout(values: Set<string>, word: string): string[] {
  values.delete(word);
  return [...values].sort();
}

/**
 * Everything the lexicon knows about a single word, across all senses
 */
export function lookupWord(lexicon: LexicalSource, rawWord: string): WordLookupResult {
  const word = rawWord.trim().toLowerCase();
  if (!word) {
    return { word: '', synonyms: [], antonyms: [], related: [], examples: [] };
  }

  const synonyms = new Set<string>();
  const antonyms = new Set<string>();
  const related = new Set<string>();
  const examples = new Set<string>();

  for (const sense of lexicon.synsetsFor(word)) {
    for (const lemma of sense.lemmas) {
      synonyms.add(lemmaToText(lemma));
    }
    for (const antonym of sense.antonyms) {
      antonyms.add(lemmaToText(antonym));
    }
    for (const relation of [...sense.hypernyms(), ...sense.hyponyms()]) {
      for (const lemma of relation.lemmas) {
        related.add(lemmaToText(lemma));
      }
    }
    for (const example of sense.examples) {
      const sentence = example.trim();
      if (sentence) examples.add(sentence);
    }
  }

  return {
    word,
    synonyms: sortedWithout(synonyms, word),
    antonyms: sortedWithout(antonyms, word),
    related: sortedWithout(related, word),
    examples: [...examples].sort(),
  };
}
