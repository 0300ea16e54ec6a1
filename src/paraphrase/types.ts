/**
 * Type definitions for the paraphrase engine
 */

/**
 * Synonym preference applied while ranking candidates
 */
export type ParaphraseStyle = 'balanced' | 'formal' | 'casual' | 'academic' | 'simple';

/**
 * Character-length band the returned variants should fall in
 */
export type LengthPreference = 'same' | 'shorter' | 'longer';

export const PARAPHRASE_STYLES: readonly ParaphraseStyle[] = ['balanced', 'formal', 'casual', 'academic', 'simple'];
export const LENGTH_PREFERENCES: readonly LengthPreference[] = ['same', 'shorter', 'longer'];

/**
 * Lowercase word -> ranked replacement candidates (best first).
 * Built once per sentence and never modified afterwards.
 */
export type ReplacementMap = ReadonlyMap<string, readonly string[]>;

/**
 * A token position eligible for substitution
 */
export interface ReplaceableWord {
  index: number;
  word: string;
  tag: string;
}

/**
 * A generated sentence plus the token sequence it was joined from
 */
export interface Variant {
  text: string;
  tokens: readonly string[];
}

export interface ChangedWord {
  from: string;
  to: string;
}

export interface VariantStats {
  similarityPercent: number;
  wordChanges: number;
  changedWords: ChangedWord[];
  lengthDiff: number;
  lengthPercent: number;
  originalLength: number;
  variationLength: number;
  score: number;
}

export interface ParaphraseResult {
  original: string;
  /** Accepted variants, best first */
  variations: string[];
  /** Parallel to `variations` */
  variationStats: VariantStats[];
  bestVariation: string;
  bestScore: number;
  /** The dedicated high-divergence candidate, when anti-detection produced one */
  antiDetectionVariant: string | null;
  style: ParaphraseStyle;
  lengthPreference: LengthPreference;
  antiDetection: boolean;
  /** Candidate lists used for this sentence, each sorted alphabetically */
  wordReplacements: Record<string, string[]>;
}

export interface ParaphraseOptions {
  numVariations: number;
  style: ParaphraseStyle;
  lengthPreference: LengthPreference;
  antiDetection: boolean;
}

export const DEFAULT_PARAPHRASE_OPTIONS: ParaphraseOptions = {
  numVariations: 5,
  style: 'balanced',
  lengthPreference: 'same',
  antiDetection: false,
};

/**
 * Acceptance thresholds for aggressive ("anti-detection") generation.
 * All values are change rates in [0,1] except `candidateMaxBigramOverlap`.
 */
export interface DivergenceThresholds {
  /** Dedicated candidate: minimum combined change rate */
  minCombinedChange: number;
  /** Dedicated candidate: minimum word change rate */
  minWordChange: number;
  /** Dedicated candidate: minimum bigram change rate */
  minBigramChange: number;
  /** Dedicated candidate: minimum trigram change rate */
  minTrigramChange: number;
  /** Looser rule accepted when the strict gate fails */
  fallbackWordChange: number;
  /** Loop candidates: minimum word change rate */
  candidateMinWordChange: number;
  /** Loop candidates: maximum bigram overlap */
  candidateMaxBigramOverlap: number;
}

export const DEFAULT_DIVERGENCE_THRESHOLDS: DivergenceThresholds = {
  minCombinedChange: 0.65,
  minWordChange: 0.7,
  minBigramChange: 0.6,
  minTrigramChange: 0.5,
  fallbackWordChange: 0.75,
  candidateMinWordChange: 0.7,
  candidateMaxBigramOverlap: 0.55,
};
