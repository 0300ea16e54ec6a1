/**
 * Structural rewriting for aggressive paraphrases.
 *
 * Each step is total: a step that throws leaves its input untouched and
 * the failure is reported alongside the result.
 */

import { normalizeSpacing } from '../text/punctuation.js';
import type { RandomSource } from './random.js';
import { pick } from './random.js';

/**
 * A pattern plus the rewrite applied to its first match
 */
export interface RewriteRule {
  name: string;
  pattern: RegExp;
  rewrite: (match: RegExpExecArray, random: RandomSource) => string;
}

export interface StepOutcome<T> {
  value: T;
  applied: boolean;
  error?: string;
}

export interface RewriteReport {
  text: string;
  tokens: string[];
  /** Names of the steps that changed something */
  applied: string[];
  /** `step: message` for steps that failed and were skipped */
  failures: string[];
}

export const TRANSITIONS: readonly string[] = ['Furthermore,', 'Additionally,', 'Moreover,', 'Notably,', 'Specifically,'];
const SENTENCE_STARTERS: readonly string[] = ['this', 'such', 'one'];
const TRANSITION_PROBABILITY = 0.3;

const group = (match: RegExpExecArray, index: number): string => match[index] ?? '';

/**
 * Ordered sentence-shape rules; only the first matching rule is applied.
 * Add new shapes here, the dispatch in `applyFirstRule` stays unchanged.
 */
export const STRUCTURAL_RULES: readonly RewriteRule[] = [
  {
    name: 'passive-to-active',
    pattern: /\b(the|a|an)?\s*(\w+)\s+(is|are|was|were)\s+(\w+ed)\s+by\s+(\w+)/i,
    rewrite: m => `${group(m, 5)} ${group(m, 4)} ${group(m, 2)}`,
  },
  {
    name: 'drop-passive-auxiliary',
    pattern: /\b(is|are|was|were)\s+(\w+ed)\s+by\s+(\w+)/i,
    rewrite: m => `${group(m, 3)} ${group(m, 2)}`,
  },
  {
    name: 'adverb-after-object',
    pattern: /\b(\w+)\s+(\w+ly)\s+(\w+)/i,
    rewrite: m => `${group(m, 1)} ${group(m, 3)} ${group(m, 2)}`,
  },
  {
    name: 'auxiliary-adverb',
    pattern: /\b(is|are|was|were)\s+(\w+ly)\s+(\w+)/i,
    rewrite: m => `${group(m, 3)} ${group(m, 2)}`,
  },
  {
    name: 'drop-intensifier',
    pattern: /\b(very|quite|rather|extremely)\s+(\w+)\s+(\w+)/i,
    rewrite: m => `${group(m, 3)} ${group(m, 2)}`,
  },
  {
    name: 'demonstrative-copula',
    pattern: /\b(it|this|that)\s+is\s+/i,
    rewrite: () => 'this demonstrates ',
  },
  {
    name: 'leading-article',
    pattern: /^(the|a|an)\s+/i,
    rewrite: (_m, random) => `${pick(random, SENTENCE_STARTERS) ?? 'this'} `,
  },
  {
    name: 'leading-pronoun',
    pattern: /^(this|that|it)\s+/i,
    rewrite: () => 'the aforementioned ',
  },
];

export const PREPOSITION_RULE: RewriteRule = {
  name: 'prepositional-phrase',
  pattern: /\b(\w+)\s+(\w+)\s+(in|on|at|by|with|for|to|from|of|about|under|over)\s+(\w+(?:\s+\w+){0,3})/i,
  rewrite: m => `${group(m, 1)} ${group(m, 3)} ${group(m, 4)} ${group(m, 2)}`,
};

/**
 * Run a step; a thrown error becomes "no change"
 */
export function runStep<T>(input: T, step: (value: T) => T): StepOutcome<T> {
  try {
    const value = step(input);
    return { value, applied: value !== input };
  } catch (error) {
    return {
      value: input,
      applied: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

function replaceMatch(text: string, match: RegExpExecArray, replacement: string): string {
  return text.slice(0, match.index) + replacement + text.slice(match.index + match[0].length);
}

export function applyRule(text: string, rule: RewriteRule, random: RandomSource): string | null {
  const match = rule.pattern.exec(text);
  if (!match) return null;
  return replaceMatch(text, match, rule.rewrite(match, random));
}

/**
 * Apply the first rule that matches, once. Returns the rule name used.
 * A rule that throws counts as no match; `onFailure` hears about it.
 */
export function applyFirstRule(
  text: string,
  rules: readonly RewriteRule[],
  random: RandomSource,
  onFailure?: (rule: string, message: string) => void
): { text: string; rule: string | null } {
  for (const rule of rules) {
    const outcome = runStep<string | null>(null, () => applyRule(text, rule, random));
    if (outcome.error) {
      onFailure?.(rule.name, outcome.error);
    }
    if (outcome.value !== null) {
      return { text: outcome.value, rule: rule.name };
    }
  }
  return { text, rule: null };
}

/**
 * Swap the first two adjectives when they are apart, then move the first
 * inner adverb to the end. Positions come from the original tags.
 */
export function rearrangeTokens(tokens: readonly string[], tags: readonly string[]): string[] {
  if (tokens.length < 4) return [...tokens];

  let result = [...tokens];
  const adjectives: number[] = [];
  const nouns: number[] = [];
  const adverbs: number[] = [];

  tags.forEach((tag, i) => {
    if (i >= tokens.length) return;
    const upper = tag.toUpperCase();
    if (upper.startsWith('JJ')) adjectives.push(i);
    else if (upper.startsWith('NN')) nouns.push(i);
    else if (upper.startsWith('RB')) adverbs.push(i);
  });

  const [firstAdj, secondAdj] = adjectives;
  if (firstAdj !== undefined && secondAdj !== undefined && tokens.length > 5 && Math.abs(firstAdj - secondAdj) > 1) {
    const first = result[firstAdj];
    const second = result[secondAdj];
    if (first !== undefined && second !== undefined) {
      result[firstAdj] = second;
      result[secondAdj] = first;
    }
  }

  const adverbIndex = adverbs[0];
  if (adverbIndex !== undefined && nouns.length > 0 && result.length > 3) {
    if (adverbIndex > 0 && adverbIndex < result.length - 1) {
      const adverb = result[adverbIndex];
      if (adverb !== undefined) {
        result = result.filter((_, i) => i !== adverbIndex);
        result.push(adverb);
      }
    }
  }

  return result;
}

export function startsWithTransition(text: string): boolean {
  const first = text.split(/\s+/)[0] ?? '';
  return TRANSITIONS.includes(first);
}

/**
 * With 30% probability prefix a transition to sentences over six words
 */
export function addTransition(text: string, random: RandomSource): string {
  if (text.split(/\s+/).length <= 6 || startsWithTransition(text)) {
    return text;
  }
  if (random() >= TRANSITION_PROBABILITY) {
    return text;
  }
  const transition = pick(random, TRANSITIONS) ?? 'Moreover,';
  return `${transition} ${text.charAt(0).toLowerCase()}${text.slice(1)}`;
}

/**
 * Reshape a substituted token sequence: token moves, one sentence-shape
 * rule, an optional transition, a prepositional-phrase move, then spacing.
 */
export function rewriteStructure(
  tokens: readonly string[],
  tags: readonly string[],
  random: RandomSource,
  rules: readonly RewriteRule[] = STRUCTURAL_RULES
): RewriteReport {
  const applied: string[] = [];
  const failures: string[] = [];
  const record = <T>(name: string, outcome: StepOutcome<T>): T => {
    if (outcome.applied) applied.push(name);
    if (outcome.error) failures.push(`${name}: ${outcome.error}`);
    return outcome.value;
  };

  const arranged = record('rearrange', runStep([...tokens], t => {
    const moved = rearrangeTokens(t, tags);
    return moved.some((token, i) => token !== t[i]) ? moved : t;
  }));

  let text = arranged.join(' ');

  const ruled = applyFirstRule(text, rules, random, (name, message) => {
    failures.push(`${name}: ${message}`);
  });
  if (ruled.rule) applied.push(ruled.rule);
  text = ruled.text;

  text = record('transition', runStep(text, current => addTransition(current, random)));
  text = record(PREPOSITION_RULE.name, runStep(text, current => applyRule(current, PREPOSITION_RULE, random) ?? current));
  text = normalizeSpacing(text);

  return { text, tokens: arranged, applied, failures };
}
