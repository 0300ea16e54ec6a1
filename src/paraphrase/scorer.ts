/**
 * Quality score for a candidate paraphrase.
 *
 * A good variant keeps the meaning and the rough shape of the original while
 * changing a moderate share of its words, preferably to top-ranked synonyms.
 */

import type { LexicalSource, Synset } from '../types/lexicon.js';
import { FUNCTION_WORDS, isAlphanumeric } from './eligibility.js';
import type { ReplacementMap } from './types.js';

export const SCORE_WEIGHTS = {
  overlap: 0.2,
  replacement: 0.25,
  synonymQuality: 0.25,
  semantic: 0.2,
  length: 0.05,
  wordCount: 0.05,
} as const;

export interface ScoreInput {
  original: string;
  candidate: string;
  originalTokens: readonly string[];
  candidateTokens: readonly string[];
  replacements: ReplacementMap;
}

export interface ScoreBreakdown {
  overlap: number;
  replacement: number;
  synonymQuality: number;
  semantic: number;
  length: number;
  wordCount: number;
  /** Verified synonym substitutions */
  replacements: number;
  score: number;
}

interface VerifiedReplacement {
  from: string;
  to: string;
  /** Position in the source word's candidate list, -1 when not found */
  rank: number;
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function wordSet(tokens: readonly string[]): Set<string> {
  return new Set(tokens.filter(isAlphanumeric).map(t => t.toLowerCase()));
}

/**
 * 1 inside [low, high], a linear ramp from 0 below, a linear decay above
 */
function bandScore(value: number, low: number, high: number): number {
  if (value < low) return value / low;
  if (value > high) return 1 - (value - high) / (1 - high);
  return 1;
}

function rankBonus(rank: number): number {
  if (rank < 0) return 0.4;
  if (rank < 3) return 1;
  if (rank < 5) return 0.8;
  return 0.6;
}

/**
 * Position-aligned token changes that are candidates for the original word
 */
function verifiedReplacements(input: ScoreInput): VerifiedReplacement[] {
  const verified: VerifiedReplacement[] = [];

  input.candidateTokens.forEach((token, index) => {
    const source = input.originalTokens[index];
    if (source === undefined) return;

    const from = source.toLowerCase();
    const to = token.toLowerCase();
    if (from === to || !isAlphanumeric(token)) return;

    const candidates = input.replacements.get(from);
    if (!candidates) return;

    const ranked = candidates.map(c => c.toLowerCase());
    if (ranked.includes(to)) {
      verified.push({ from, to, rank: ranked.indexOf(to) });
    }
  });

  return verified;
}

function relationsOf(synsets: readonly Synset[]): Set<string> {
  const ids = new Set<string>();
  for (const synset of synsets) {
    for (const related of [...synset.hypernyms(), ...synset.hyponyms()]) {
      ids.add(related.id);
    }
  }
  return ids;
}

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const item of a) {
    if (b.has(item)) return true;
  }
  return false;
}

/**
 * Full credit for a shared sense, half for a shared or direct
 * hypernym/hyponym link; pairs unknown to the lexicon are not counted.
 */
export function semanticPreservation(lexicon: LexicalSource, pairs: readonly { from: string; to: string }[]): number {
  let shared = 0;
  let checked = 0;

  for (const { from, to } of pairs) {
    const fromSynsets = lexicon.synsetsFor(from);
    const toSynsets = lexicon.synsetsFor(to);
    if (fromSynsets.length === 0 || toSynsets.length === 0) continue;

    checked++;
    const fromIds = new Set(fromSynsets.map(s => s.id));
    const toIds = new Set(toSynsets.map(s => s.id));
    if (intersects(fromIds, toIds)) {
      shared += 1;
      continue;
    }

    const fromRelated = relationsOf(fromSynsets);
    const toRelated = relationsOf(toSynsets);
    if (intersects(fromRelated, toRelated) || intersects(fromRelated, toIds) || intersects(toRelated, fromIds)) {
      shared += 0.5;
    }
  }

  return checked > 0 ? shared / checked : 1;
}

function hasContentWord(words: ReadonlySet<string>): boolean {
  for (const word of words) {
    if (!FUNCTION_WORDS.has(word)) return true;
  }
  return false;
}

const ZERO_BREAKDOWN: ScoreBreakdown = {
  overlap: 0,
  replacement: 0,
  synonymQuality: 0,
  semantic: 0,
  length: 0,
  wordCount: 0,
  replacements: 0,
  score: 0,
};

/**
 * Score a candidate with every component, in [0, 1].
 * Empty or unchanged candidates (ignoring case) score 0.
 */
export function scoreBreakdown(lexicon: LexicalSource, input: ScoreInput): ScoreBreakdown {
  const { original, candidate } = input;
  if (!candidate || candidate.toLowerCase() === original.toLowerCase()) {
    return ZERO_BREAKDOWN;
  }

  const originalWords = wordSet(input.originalTokens);
  const candidateWords = wordSet(input.candidateTokens);
  if (originalWords.size === 0) {
    return ZERO_BREAKDOWN;
  }

  let sharedWords = 0;
  for (const word of originalWords) {
    if (candidateWords.has(word)) sharedWords++;
  }
  const overlap = clamp(bandScore(sharedWords / originalWords.size, 0.3, 0.85));

  const verified = verifiedReplacements(input);
  const eligible = input.originalTokens
    .filter(t => isAlphanumeric(t) && input.replacements.has(t.toLowerCase()))
    .length;
  let replacement: number;
  if (eligible > 0) {
    replacement = clamp(bandScore(verified.length / eligible, 0.2, 0.7));
  } else {
    replacement = verified.length > 0 ? 1 : 0;
  }

  const synonymQuality = verified.length > 0
    ? clamp(verified.reduce((sum, v) => sum + rankBonus(v.rank), 0) / verified.length)
    : 0;

  let semantic = 1;
  if (hasContentWord(originalWords) && hasContentWord(candidateWords)) {
    try {
      semantic = clamp(semanticPreservation(lexicon, verified));
    } catch (error) {
      console.error('Semantic check failed:', error instanceof Error ? error.message : String(error));
      semantic = 1;
    }
  }

  const lengthRatio = original.length > 0 ? candidate.length / original.length : 1;
  const length = lengthRatio < 0.7 || lengthRatio > 1.3 ? 0.5 : 1;

  const sizeDelta = Math.abs(originalWords.size - candidateWords.size);
  const wordCount = clamp(1 - (sizeDelta / Math.max(originalWords.size, 1)) * 0.5);

  let score = overlap * SCORE_WEIGHTS.overlap
    + replacement * SCORE_WEIGHTS.replacement
    + synonymQuality * SCORE_WEIGHTS.synonymQuality
    + semantic * SCORE_WEIGHTS.semantic
    + length * SCORE_WEIGHTS.length
    + wordCount * SCORE_WEIGHTS.wordCount;

  if (verified.length >= 2 && verified.length <= 5) {
    score *= 1.1;
  } else if (verified.length === 0) {
    score *= 0.3;
  }

  return {
    overlap,
    replacement,
    synonymQuality,
    semantic,
    length,
    wordCount,
    replacements: verified.length,
    score: clamp(score),
  };
}

export function scoreVariant(lexicon: LexicalSource, input: ScoreInput): number {
  return scoreBreakdown(lexicon, input).score;
}
