/**
 * Sentence paraphraser: replacement map, candidate generation, length
 * filtering, scoring and ranking.
 *
 * A call never throws for its input. Adapter or internal failures degrade
 * to the original sentence as the only variant with score 0.
 */

import type { LexicalSource } from '../types/lexicon.js';
import type { TextAnalyzer } from '../types/text.js';
import {
  acceptVariant,
  createDivergentRewrite,
  forceSingleReplacement,
  generateVariants,
  type GenerationContext,
  type GenerationState,
} from './candidates.js';
import { contentWords, sentenceWords, wordChangeRate } from './divergence.js';
import type { RandomSource } from './random.js';
import { defaultRandom } from './random.js';
import { buildReplacementMap, sortedReplacements, MAP_MAX_SYNONYMS } from './replacement-map.js';
import { scoreVariant } from './scorer.js';
import { calculateVariantStats } from './stats.js';
import type {
  DivergenceThresholds,
  LengthPreference,
  ParaphraseOptions,
  ParaphraseResult,
  VariantStats,
} from './types.js';
import { DEFAULT_DIVERGENCE_THRESHOLDS, DEFAULT_PARAPHRASE_OPTIONS } from './types.js';

export interface ParaphraserDeps {
  lexicon: LexicalSource;
  analyzer: TextAnalyzer;
  random?: RandomSource;
  thresholds?: Partial<DivergenceThresholds>;
  /** Candidates fetched per eligible word */
  maxSynonyms?: number;
}

/**
 * Character-length ratio bands; `same` is only reported, never filtered on
 */
export const LENGTH_BANDS: Record<LengthPreference, (ratio: number) => boolean> = {
  shorter: ratio => ratio < 0.95,
  longer: ratio => ratio > 1.05,
  same: ratio => ratio >= 0.9 && ratio <= 1.1,
};

/**
 * Keep variants in the preferred length band, up to `limit`.
 * An empty band keeps the input untouched.
 */
export function filterByLength(
  variants: readonly string[],
  original: string,
  preference: LengthPreference,
  limit: number
): string[] {
  if (preference === 'same') return [...variants];

  const inBand = LENGTH_BANDS[preference];
  const filtered = variants.filter(variant => {
    const ratio = original.length > 0 ? variant.length / original.length : 1;
    return inBand(ratio);
  });

  return filtered.length > 0 ? filtered.slice(0, limit) : [...variants];
}

/**
 * Floor `numVariations` and keep it at least 1
 */
export function resolveOptions(options: Partial<ParaphraseOptions> = {}): ParaphraseOptions {
  const defaults = DEFAULT_PARAPHRASE_OPTIONS;
  const requested = options.numVariations ?? defaults.numVariations;
  return {
    numVariations: Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : defaults.numVariations,
    style: options.style ?? defaults.style,
    lengthPreference: options.lengthPreference ?? defaults.lengthPreference,
    antiDetection: options.antiDetection ?? defaults.antiDetection,
  };
}

export class Paraphraser {
  private readonly lexicon: LexicalSource;
  private readonly analyzer: TextAnalyzer;
  private readonly random: RandomSource;
  private readonly thresholds: DivergenceThresholds;
  private readonly maxSynonyms: number;

  constructor(deps: ParaphraserDeps) {
    this.lexicon = deps.lexicon;
    this.analyzer = deps.analyzer;
    this.random = deps.random ?? defaultRandom;
    this.thresholds = { ...DEFAULT_DIVERGENCE_THRESHOLDS, ...deps.thresholds };
    this.maxSynonyms = deps.maxSynonyms ?? MAP_MAX_SYNONYMS;
  }

  paraphrase(sentence: string, options: Partial<ParaphraseOptions> = {}): ParaphraseResult {
    const settings = resolveOptions(options);
    const original = sentence.trim();

    if (!original) {
      return {
        ...this.echo(settings),
        original: '',
        variations: [],
        variationStats: [],
        bestVariation: '',
        bestScore: 0,
        antiDetectionVariant: null,
        wordReplacements: {},
      };
    }

    try {
      return this.run(original, settings);
    } catch (error) {
      console.error('Paraphrase failed:', error instanceof Error ? error.message : String(error));
      return this.unchanged(original, original.split(/\s+/), settings);
    }
  }

  private run(original: string, settings: ParaphraseOptions): ParaphraseResult {
    const tokens = this.analyzer.tokenize(original);
    const tags = this.analyzer.tag(tokens);
    const tagged = tokens.map((token, i) => ({ token, tag: tags[i] ?? '' }));

    const { replacements, replaceable } = buildReplacementMap(this.lexicon, tagged, {
      style: settings.style,
      maxSynonyms: this.maxSynonyms,
    });

    if (replaceable.length === 0) {
      return this.unchanged(original, tokens, settings);
    }

    const context: GenerationContext = {
      original,
      tokens,
      tags,
      replacements,
      replaceable,
      thresholds: this.thresholds,
    };
    const target = settings.numVariations;
    const state: GenerationState = { accepted: [], seen: new Set() };

    let antiDetectionVariant: string | null = null;
    if (settings.antiDetection) {
      const rewrite = createDivergentRewrite(this.random, context);
      if (rewrite && acceptVariant(state, original, { text: rewrite.text, tokens: rewrite.structure.tokens })) {
        antiDetectionVariant = rewrite.text;
      }
    }

    generateVariants(this.random, context, target, settings.antiDetection ? 'aggressive' : 'standard', state);

    let variations = state.accepted.map(v => v.text);
    if (variations.length === 0) {
      const forced = forceSingleReplacement(context);
      if (forced && (!settings.antiDetection || this.divergesEnough(tokens, forced.text))) {
        variations = [forced.text];
      }
    }
    if (variations.length === 0) {
      variations = [original];
    }

    variations = filterByLength(variations, original, settings.lengthPreference, target * 2);

    const ranked = variations
      .map(text => {
        const variationTokens = this.analyzer.tokenize(text);
        const score = scoreVariant(this.lexicon, {
          original,
          candidate: text,
          originalTokens: tokens,
          candidateTokens: variationTokens,
          replacements,
        });
        return { text, score, stats: calculateVariantStats(original, text, tokens, variationTokens, score) };
      })
      .sort((a, b) => b.score - a.score)
      .slice(0, target);

    const best = ranked[0];
    return {
      ...this.echo(settings),
      original,
      variations: ranked.map(r => r.text),
      variationStats: ranked.map(r => r.stats),
      bestVariation: best?.text ?? original,
      bestScore: best ? Math.round(best.score * 1000) / 1000 : 0,
      antiDetectionVariant,
      wordReplacements: sortedReplacements(replacements),
    };
  }

  /**
   * Looser divergence rule applied to the forced single-word variant
   */
  private divergesEnough(tokens: readonly string[], text: string): boolean {
    return wordChangeRate(contentWords(tokens), sentenceWords(text)) >= this.thresholds.fallbackWordChange;
  }

  private unchanged(original: string, tokens: readonly string[], settings: ParaphraseOptions): ParaphraseResult {
    const stats: VariantStats = calculateVariantStats(original, original, tokens, tokens, 0);
    return {
      ...this.echo(settings),
      original,
      variations: [original],
      variationStats: [stats],
      bestVariation: original,
      bestScore: 0,
      antiDetectionVariant: null,
      wordReplacements: {},
    };
  }

  private echo(settings: ParaphraseOptions): Pick<ParaphraseResult, 'style' | 'lengthPreference' | 'antiDetection'> {
    return {
      style: settings.style,
      lengthPreference: settings.lengthPreference,
      antiDetection: settings.antiDetection,
    };
  }
}
