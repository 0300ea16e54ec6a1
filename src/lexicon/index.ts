/**
 * Lexicon adapters and bootstrap
 */

export {
  InMemoryLexicon,
  createInMemoryLexicon,
  normalizeLemma,
  lexiconFileSchema,
  synsetRecordSchema,
  type SynsetRecord,
  type LexiconFile,
} from './in-memory.js';

export { WordNetLexicon, WORD_CLASSES, type WordNetFiles } from './wordnet/lexicon.js';
export { morphy } from './wordnet/morphy.js';

export {
  loadLexicon,
  resetLexiconCache,
  resolveWordNetPath,
  type LexiconOptions,
  type LexiconSourceKind,
} from './loader.js';

export { lookupWord, type WordLookupResult } from './lookup.js';
export { toWordClass } from './pos-map.js';
