/**
 * Type definitions for synonym lookup and ranking
 */

import type { ParaphraseStyle } from '../paraphrase/types.js';

/**
 * Configuration for fetching replacement candidates
 */
export interface SynonymConfig {
  /** Upper bound on returned candidates */
  maxSynonyms: number;
  style: ParaphraseStyle;
  /** Sense groups inspected for lemma forms */
  maxSenses: number;
  /** Sense groups whose first hypernym backfills a short list */
  maxHypernymSenses: number;
  /** A list shorter than this is backfilled from hypernyms */
  minBeforeHypernyms: number;
}

/**
 * Default synonym configuration
 */
export const DEFAULT_SYNONYM_CONFIG: SynonymConfig = {
  maxSynonyms: 10,
  style: 'balanced',
  maxSenses: 5,
  maxHypernymSenses: 2,
  minBeforeHypernyms: 3,
};

/**
 * A candidate with its formality estimate
 */
export interface FormalityScore {
  word: string;
  score: number;
}
