export type { WordClass, Synset, LexicalSource } from './lexicon.js';
export type { TaggedToken, TextAnalyzer } from './text.js';
