/**
 * snake_case JSON shapes for results leaving the process
 */

import type { BulkFailure, BulkResult, BulkSuccess } from './bulk.js';
import type { ChangedWord, ParaphraseResult, VariantStats } from './types.js';

export interface WireVariantStats {
  similarity_percent: number;
  word_changes: number;
  changed_words: ChangedWord[];
  length_diff: number;
  length_percent: number;
  original_length: number;
  variation_length: number;
  score: number;
}

export interface WireParaphraseResult {
  original: string;
  variations: string[];
  variation_stats: WireVariantStats[];
  best_variation: string;
  best_score: number;
  anti_detection_variant: string | null;
  style: string;
  length_preference: string;
  anti_detection: boolean;
  word_replacements: Record<string, string[]>;
}

export interface WireBulkResult {
  success: number;
  errors: number;
  results: Array<Omit<BulkSuccess, 'result'> & { result: WireParaphraseResult }>;
  errors_detail: BulkFailure[];
  settings: {
    num_variations: number;
    style: string;
    length_preference: string;
  };
}

export function toWireStats(stats: VariantStats): WireVariantStats {
  return {
    similarity_percent: stats.similarityPercent,
    word_changes: stats.wordChanges,
    changed_words: stats.changedWords,
    length_diff: stats.lengthDiff,
    length_percent: stats.lengthPercent,
    original_length: stats.originalLength,
    variation_length: stats.variationLength,
    score: stats.score,
  };
}

export function toWireResult(result: ParaphraseResult): WireParaphraseResult {
  return {
    original: result.original,
    variations: result.variations,
    variation_stats: result.variationStats.map(toWireStats),
    best_variation: result.bestVariation,
    best_score: result.bestScore,
    anti_detection_variant: result.antiDetectionVariant,
    style: result.style,
    length_preference: result.lengthPreference,
    anti_detection: result.antiDetection,
    word_replacements: result.wordReplacements,
  };
}

export function toWireBulkResult(bulk: BulkResult): WireBulkResult {
  return {
    success: bulk.success,
    errors: bulk.errors,
    results: bulk.results.map(entry => ({ ...entry, result: toWireResult(entry.result) })),
    errors_detail: bulk.errorsDetail,
    settings: {
      num_variations: bulk.settings.numVariations,
      style: bulk.settings.style,
      length_preference: bulk.settings.lengthPreference,
    },
  };
}
