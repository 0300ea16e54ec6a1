/**
 * Synonym lookup and style ranking for paraphrasing
 */

// Type exports
export type { SynonymConfig, FormalityScore } from './types.js';

export { DEFAULT_SYNONYM_CONFIG } from './types.js';

// Candidate lookup
export { getSynonymsForWord, isTooSimilar, lemmaToText } from './expander.js';

// Style ranking
export { formalityScore, rankByStyle } from './scorer.js';
