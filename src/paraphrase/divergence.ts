/**
 * Word and n-gram divergence between an original sentence and a rewrite
 */

import { isAlphanumeric } from './eligibility.js';
import type { DivergenceThresholds } from './types.js';
import { DEFAULT_DIVERGENCE_THRESHOLDS } from './types.js';

export interface DivergenceReport {
  wordChange: number;
  bigramChange: number;
  trigramChange: number;
  /** 0.4 word + 0.3 bigram + 0.3 trigram */
  combinedChange: number;
  /** Share of original bigrams still present */
  bigramOverlap: number;
}

/**
 * `strict` and `fallback` accept the rewrite; `rejected` discards it
 */
export type GateVerdict = 'strict' | 'fallback' | 'rejected';

/**
 * Lowercased tokens made only of letters and digits, in order
 */
export function contentWords(tokens: readonly string[]): string[] {
  return tokens.filter(isAlphanumeric).map(t => t.toLowerCase());
}

/**
 * Whitespace-split words of a rendered sentence, as `contentWords`
 */
export function sentenceWords(text: string): string[] {
  return contentWords(text.split(/\s+/));
}

export function ngrams(words: readonly string[], n: number): Set<string> {
  const grams = new Set<string>();
  for (let i = 0; i + n <= words.length; i++) {
    grams.add(words.slice(i, i + n).join(' '));
  }
  return grams;
}

function overlapRatio(original: ReadonlySet<string>, candidate: ReadonlySet<string>): number {
  let shared = 0;
  for (const item of original) {
    if (candidate.has(item)) shared++;
  }
  return shared / original.size;
}

/**
 * 1 - |shared words| / |original words|; 0 when the original has no words
 */
export function wordChangeRate(originalWords: readonly string[], candidateWords: readonly string[]): number {
  const original = new Set(originalWords);
  if (original.size === 0) return 0;
  return 1 - overlapRatio(original, new Set(candidateWords));
}

/**
 * Compare word sequences. An n-gram rate falls back to the word rate when
 * the original is too short to have n-grams of that size.
 */
export function measureDivergence(
  originalWords: readonly string[],
  candidateWords: readonly string[]
): DivergenceReport {
  const wordChange = wordChangeRate(originalWords, candidateWords);

  const originalBigrams = ngrams(originalWords, 2);
  const bigramOverlap = originalBigrams.size > 0
    ? overlapRatio(originalBigrams, ngrams(candidateWords, 2))
    : 1 - wordChange;
  const bigramChange = 1 - bigramOverlap;

  const originalTrigrams = ngrams(originalWords, 3);
  const trigramChange = originalTrigrams.size > 0
    ? 1 - overlapRatio(originalTrigrams, ngrams(candidateWords, 3))
    : wordChange;

  return {
    wordChange,
    bigramChange,
    trigramChange,
    combinedChange: wordChange * 0.4 + bigramChange * 0.3 + trigramChange * 0.3,
    bigramOverlap,
  };
}

/**
 * Acceptance rule for the dedicated high-divergence rewrite.
 * `textDiffers` must already account for case-insensitive equality.
 */
export function evaluateDivergenceGate(
  report: DivergenceReport,
  textDiffers: boolean,
  thresholds: DivergenceThresholds = DEFAULT_DIVERGENCE_THRESHOLDS
): GateVerdict {
  if (!textDiffers) return 'rejected';

  if (
    report.wordChange >= thresholds.minWordChange
    && report.bigramChange >= thresholds.minBigramChange
    && report.trigramChange >= thresholds.minTrigramChange
    && report.combinedChange >= thresholds.minCombinedChange
  ) {
    return 'strict';
  }

  if (report.wordChange >= thresholds.fallbackWordChange) {
    return 'fallback';
  }

  return 'rejected';
}

/**
 * Acceptance rule for aggressive loop candidates: enough new words and
 * few surviving bigrams. An original without bigrams only needs the word rule.
 */
export function passesCandidateGate(
  originalWords: readonly string[],
  candidateWords: readonly string[],
  thresholds: DivergenceThresholds = DEFAULT_DIVERGENCE_THRESHOLDS
): boolean {
  if (new Set(originalWords).size === 0) return true;

  if (wordChangeRate(originalWords, candidateWords) < thresholds.candidateMinWordChange) {
    return false;
  }

  const originalBigrams = ngrams(originalWords, 2);
  if (originalBigrams.size === 0) return true;
  return overlapRatio(originalBigrams, ngrams(candidateWords, 2)) <= thresholds.candidateMaxBigramOverlap;
}
