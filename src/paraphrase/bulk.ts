/**
 * Paraphrase a batch of paragraphs with shared settings
 */

import type { Paraphraser } from './paraphraser.js';
import type { LengthPreference, ParaphraseResult, ParaphraseStyle } from './types.js';

export const MAX_BULK_PARAGRAPHS = 50;
export const DEFAULT_BULK_VARIATIONS = 3;

export interface BulkOptions {
  numVariations?: number;
  style?: ParaphraseStyle;
  lengthPreference?: LengthPreference;
  maxParagraphs?: number;
}

export interface BulkSuccess {
  index: number;
  original: string;
  success: true;
  result: ParaphraseResult;
}

export interface BulkFailure {
  index: number;
  /** First 100 characters, absent for empty paragraphs */
  original?: string;
  error: string;
}

export interface BulkSettings {
  numVariations: number;
  style: ParaphraseStyle;
  lengthPreference: LengthPreference;
}

export interface BulkResult {
  /** Number of paragraphs paraphrased */
  success: number;
  /** Number of paragraphs skipped or failed */
  errors: number;
  results: BulkSuccess[];
  errorsDetail: BulkFailure[];
  settings: BulkSettings;
}

export function bulkParaphrase(
  paraphraser: Pick<Paraphraser, 'paraphrase'>,
  paragraphs: readonly string[],
  options: BulkOptions = {}
): BulkResult {
  const maxParagraphs = options.maxParagraphs ?? MAX_BULK_PARAGRAPHS;
  if (paragraphs.length === 0) {
    throw new Error('Paragraphs must be a non-empty array.');
  }
  if (paragraphs.length > maxParagraphs) {
    throw new Error(`Maximum ${maxParagraphs} paragraphs allowed at once.`);
  }

  const settings: BulkSettings = {
    numVariations: options.numVariations ?? DEFAULT_BULK_VARIATIONS,
    style: options.style ?? 'balanced',
    lengthPreference: options.lengthPreference ?? 'same',
  };

  const results: BulkSuccess[] = [];
  const errorsDetail: BulkFailure[] = [];

  paragraphs.forEach((paragraph, index) => {
    const original = paragraph.trim();
    if (!original) {
      errorsDetail.push({ index, error: 'Empty paragraph' });
      return;
    }

    try {
      const result = paraphraser.paraphrase(original, settings);
      results.push({ index, original, success: true, result });
    } catch (error) {
      console.error(`Paraphrase failed for paragraph ${index}:`, error instanceof Error ? error.message : String(error));
      errorsDetail.push({ index, original: original.slice(0, 100), error: 'Processing failed' });
    }
  });

  return {
    success: results.length,
    errors: errorsDetail.length,
    results,
    errorsDetail,
    settings,
  };
}
