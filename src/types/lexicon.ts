/**
 * Lexical knowledge base types
 */

/**
 * Word classes a sense group can belong to
 */
export type WordClass = 'noun' | 'verb' | 'adjective' | 'adverb';

/**
 * A single distinct meaning of a word, bundling its synonymous lemma forms
 * and its position in the hypernym/hyponym hierarchy.
 */
export interface Synset {
  /** Stable identifier, unique within one lexicon */
  id: string;
  wordClass: WordClass;
  /** Lemma forms; underscores join the parts of multi-word phrases */
  lemmas: readonly string[];
  definition: string;
  examples: readonly string[];
  /** Antonym lemma forms of any lemma in this sense */
  antonyms: readonly string[];
  hypernyms(): Synset[];
  hyponyms(): Synset[];
}

/**
 * Read-only provider of sense groups for a word.
 * Implementations must be safe to share between concurrent callers.
 */
export interface LexicalSource {
  synsetsFor(word: string, wordClass?: WordClass): Synset[];
}
