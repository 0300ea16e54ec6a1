/**
 * Formality estimates and style-based candidate ordering
 */

import type { ParaphraseStyle } from '../paraphrase/types.js';
import type { FormalityScore } from './types.js';

const INFORMAL_WORDS: ReadonlySet<string> = new Set([
  'guy', 'kid', 'cool', 'awesome', 'stuff', 'thing', 'get', 'got', 'gonna',
  'wanna', 'yeah', 'yep', 'nah', 'nope', 'huge', 'tiny', 'big', 'small',
]);

const FORMAL_WORDS: ReadonlySet<string> = new Set([
  'individual', 'personnel', 'utilize', 'facilitate', 'implement',
  'substantial', 'considerable', 'significant', 'demonstrate', 'exhibit',
]);

/**
 * Estimate how formal a word sounds: higher is more formal.
 * Longer words lean formal; a few known words are pinned.
 */
export function formalityScore(word: string): number {
  const normalized = word.toLowerCase();
  if (INFORMAL_WORDS.has(normalized)) return 0.2;
  if (FORMAL_WORDS.has(normalized)) return 0.9;
  return Math.min(1, 0.5 + word.length / 20);
}

type Comparator = (a: FormalityScore, b: FormalityScore) => number;

const STYLE_COMPARATORS: Record<Exclude<ParaphraseStyle, 'balanced'>, Comparator> = {
  formal: (a, b) => b.score - a.score,
  casual: (a, b) => a.score - b.score,
  academic: (a, b) => b.score - a.score || b.word.length - a.word.length,
  simple: (a, b) => a.word.length - b.word.length || a.score - b.score,
};

/**
 * Reorder candidates for a style. `balanced` keeps relevance order;
 * ties keep their relative order.
 */
export function rankByStyle(candidates: readonly string[], style: ParaphraseStyle = 'balanced'): string[] {
  if (style === 'balanced') {
    return [...candidates];
  }

  const scored: FormalityScore[] = candidates.map(word => ({ word, score: formalityScore(word) }));
  scored.sort(STYLE_COMPARATORS[style]);
  return scored.map(s => s.word);
}
