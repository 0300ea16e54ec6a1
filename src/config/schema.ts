/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const lexiconConfigSchema = z.object({
  source: z.enum(['wordnet', 'json']).default('wordnet'),
  // WordNet dict directory or JSON lexicon file; defaults to the wordnet-db package
  path: z.string().optional(),
});

export const paraphraseConfigSchema = z.object({
  numVariations: z.number().int().min(1).max(20).default(5),
  style: z.enum(['balanced', 'formal', 'casual', 'academic', 'simple']).default('balanced'),
  lengthPreference: z.enum(['same', 'shorter', 'longer']).default('same'),
  antiDetection: z.boolean().default(false),
  maxSynonyms: z.number().int().min(1).max(50).default(15),
  seed: z.number().int().optional(),
});

const rate = (value: number) => z.number().min(0).max(1).default(value);

export const thresholdsConfigSchema = z.object({
  minCombinedChange: rate(0.65),
  minWordChange: rate(0.7),
  minBigramChange: rate(0.6),
  minTrigramChange: rate(0.5),
  fallbackWordChange: rate(0.75),
  candidateMinWordChange: rate(0.7),
  candidateMaxBigramOverlap: rate(0.55),
});

export const bulkConfigSchema = z.object({
  maxParagraphs: z.number().int().min(1).default(50),
  numVariations: z.number().int().min(1).max(20).default(3),
});

export const configSchema = z.object({
  lexicon: lexiconConfigSchema.default({}),
  paraphrase: paraphraseConfigSchema.default({}),
  thresholds: thresholdsConfigSchema.default({}),
  bulk: bulkConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type LexiconConfig = z.infer<typeof lexiconConfigSchema>;
export type ParaphraseConfig = z.infer<typeof paraphraseConfigSchema>;
export type ThresholdsConfig = z.infer<typeof thresholdsConfigSchema>;
export type BulkConfig = z.infer<typeof bulkConfigSchema>;
