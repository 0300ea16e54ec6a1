/**
 * Candidate generation by randomized synonym substitution.
 *
 * Each attempt is a pure function of (random source, context) that yields a
 * variant or nothing; `generateVariants` calls attempts up to a fixed budget.
 */

import { joinTokens } from '../text/punctuation.js';
import { capitalize, startsUppercase } from './eligibility.js';
import {
  contentWords,
  evaluateDivergenceGate,
  measureDivergence,
  passesCandidateGate,
  sentenceWords,
  type DivergenceReport,
  type GateVerdict,
} from './divergence.js';
import type { RandomSource } from './random.js';
import { pick, randomInt, sample, uniform } from './random.js';
import { rewriteStructure, type RewriteReport } from './structure.js';
import type { DivergenceThresholds, ReplaceableWord, ReplacementMap, Variant } from './types.js';
import { DEFAULT_DIVERGENCE_THRESHOLDS } from './types.js';

export type GenerationMode = 'standard' | 'aggressive';

/**
 * Everything an attempt needs about one sentence
 */
export interface GenerationContext {
  original: string;
  tokens: readonly string[];
  /** Tags parallel to `tokens` */
  tags: readonly string[];
  replacements: ReplacementMap;
  replaceable: readonly ReplaceableWord[];
  thresholds?: DivergenceThresholds;
}

export type Attempt = (random: RandomSource, context: GenerationContext) => Variant | null;

/** Multiplier on the requested count bounding the number of attempts */
export const ATTEMPTS_PER_VARIANT = 5;

const AGGRESSIVE_MIN_SHARE = 0.85;
const AGGRESSIVE_MAX_SHARE = 0.95;

function matchCase(source: string, replacement: string): string {
  return startsUppercase(source) ? capitalize(replacement) : replacement;
}

function candidatesFor(context: GenerationContext, word: string): readonly string[] {
  return context.replacements.get(word.toLowerCase()) ?? [];
}

/**
 * Prefer the least common alternatives: the last third of a list of four or
 * more, the last entry of a shorter list, the only entry of a single one.
 */
export function pickLeastCommon(random: RandomSource, candidates: readonly string[]): string | undefined {
  const count = candidates.length;
  if (count >= 4) {
    const start = Math.max(count - Math.floor(count / 3), Math.floor(count / 2));
    return pick(random, candidates.slice(start));
  }
  if (count >= 2) {
    return candidates[count - 1];
  }
  return candidates[0];
}

function substitute(
  context: GenerationContext,
  selected: readonly ReplaceableWord[],
  choose: (candidates: readonly string[]) => string | undefined
): { tokens: string[]; replaced: number } {
  const tokens = [...context.tokens];
  let replaced = 0;

  for (const { index, word } of selected) {
    const replacement = choose(candidatesFor(context, word));
    if (replacement === undefined) continue;
    tokens[index] = matchCase(word, replacement);
    replaced++;
  }

  return { tokens, replaced };
}

/**
 * Pick 85-95% of the eligible words (at least one)
 */
export function selectAggressive(random: RandomSource, replaceable: readonly ReplaceableWord[]): ReplaceableWord[] {
  const share = uniform(random, AGGRESSIVE_MIN_SHARE, AGGRESSIVE_MAX_SHARE);
  const count = Math.max(1, Math.floor(replaceable.length * share));
  return sample(random, replaceable, Math.min(count, replaceable.length));
}

/**
 * Replace a random non-empty subset of eligible words with random candidates
 */
export const attemptStandard: Attempt = (random, context) => {
  if (context.replaceable.length === 0) return null;

  const count = randomInt(random, 1, context.replaceable.length);
  const selected = sample(random, context.replaceable, count);
  const { tokens, replaced } = substitute(context, selected, candidates => pick(random, candidates));
  if (replaced === 0) return null;

  return { text: joinTokens(tokens), tokens };
};

/**
 * Replace most eligible words with uncommon candidates; keep the result
 * only when it clears the loop divergence gate.
 */
export const attemptAggressive: Attempt = (random, context) => {
  if (context.replaceable.length === 0) return null;

  const selected = selectAggressive(random, context.replaceable);
  const { tokens, replaced } = substitute(context, selected, candidates => pickLeastCommon(random, candidates));
  if (replaced === 0) return null;

  const text = joinTokens(tokens);
  const gate = passesCandidateGate(
    contentWords(context.tokens),
    sentenceWords(text),
    context.thresholds ?? DEFAULT_DIVERGENCE_THRESHOLDS
  );
  return gate ? { text, tokens } : null;
};

export const ATTEMPTS: Record<GenerationMode, Attempt> = {
  standard: attemptStandard,
  aggressive: attemptAggressive,
};

export interface GenerationState {
  accepted: Variant[];
  /** Lowercased texts already taken for this sentence */
  seen: Set<string>;
}

/**
 * Add `variant` unless it matches the original or an earlier variant,
 * ignoring case. Returns whether it was added.
 */
export function acceptVariant(state: GenerationState, original: string, variant: Variant): boolean {
  const key = variant.text.toLowerCase();
  if (!variant.text || key === original.toLowerCase() || state.seen.has(key)) {
    return false;
  }
  state.accepted.push(variant);
  state.seen.add(key);
  return true;
}

/**
 * Run attempts until `target` variants are accepted or
 * `target * ATTEMPTS_PER_VARIANT` attempts have been spent.
 */
export function generateVariants(
  random: RandomSource,
  context: GenerationContext,
  target: number,
  mode: GenerationMode,
  state: GenerationState = { accepted: [], seen: new Set() }
): GenerationState {
  const attempt = ATTEMPTS[mode];
  const budget = target * ATTEMPTS_PER_VARIANT;

  for (let i = 0; i < budget; i++) {
    if (state.accepted.length >= target) break;
    const variant = attempt(random, context);
    if (variant) {
      acceptVariant(state, context.original, variant);
    }
  }

  return state;
}

/**
 * Replace only the first eligible word with its top-ranked candidate
 */
export function forceSingleReplacement(context: GenerationContext): Variant | null {
  const first = context.replaceable[0];
  if (!first) return null;

  const { tokens, replaced } = substitute(context, [first], candidates => candidates[0]);
  if (replaced === 0) return null;

  const text = joinTokens(tokens);
  return text.toLowerCase() === context.original.toLowerCase() ? null : { text, tokens };
}

export interface DivergentRewrite {
  text: string;
  verdict: Exclude<GateVerdict, 'rejected'>;
  divergence: DivergenceReport;
  structure: RewriteReport;
}

/**
 * The dedicated high-divergence rewrite: aggressive substitution, then
 * structural reshaping, then the strict (or fallback) divergence gate.
 */
export function createDivergentRewrite(random: RandomSource, context: GenerationContext): DivergentRewrite | null {
  if (context.replaceable.length === 0) return null;

  const selected = selectAggressive(random, context.replaceable);
  const { tokens } = substitute(context, selected, candidates => pickLeastCommon(random, candidates));
  const structure = rewriteStructure(tokens, context.tags, random);

  const originalWords = contentWords(context.tokens);
  if (originalWords.length === 0) return null;

  const divergence = measureDivergence(originalWords, sentenceWords(structure.text));
  const textDiffers = structure.text.length > 0
    && structure.text.toLowerCase() !== context.original.toLowerCase();
  const verdict = evaluateDivergenceGate(divergence, textDiffers, context.thresholds ?? DEFAULT_DIVERGENCE_THRESHOLDS);

  if (verdict === 'rejected') return null;
  return { text: structure.text, verdict, divergence, structure };
}
