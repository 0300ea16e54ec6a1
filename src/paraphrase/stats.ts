/**
 * Per-variant statistics reported alongside the score
 */

import { isAlphanumeric } from './eligibility.js';
import type { ChangedWord, VariantStats } from './types.js';

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function calculateVariantStats(
  original: string,
  variation: string,
  originalTokens: readonly string[],
  variationTokens: readonly string[],
  score = 0
): VariantStats {
  const originalWords = new Set(originalTokens.filter(isAlphanumeric).map(t => t.toLowerCase()));
  const variationWords = new Set(variationTokens.filter(isAlphanumeric).map(t => t.toLowerCase()));

  let shared = 0;
  for (const word of originalWords) {
    if (variationWords.has(word)) shared++;
  }
  const similarity = originalWords.size > 0 ? (shared / originalWords.size) * 100 : 0;

  const changedWords: ChangedWord[] = [];
  const aligned = Math.min(originalTokens.length, variationTokens.length);
  for (let i = 0; i < aligned; i++) {
    const from = originalTokens[i] ?? '';
    const to = variationTokens[i] ?? '';
    if (from.toLowerCase() !== to.toLowerCase() && isAlphanumeric(from) && isAlphanumeric(to)) {
      changedWords.push({ from, to });
    }
  }

  const lengthDiff = variation.length - original.length;
  const lengthPercent = original.length > 0 ? (lengthDiff / original.length) * 100 : 0;

  return {
    similarityPercent: round(similarity, 1),
    wordChanges: changedWords.length,
    changedWords,
    lengthDiff,
    lengthPercent: round(lengthPercent, 1),
    originalLength: original.length,
    variationLength: variation.length,
    score: round(score, 3),
  };
}
