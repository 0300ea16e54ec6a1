/**
 * Paraphrase engine
 */

// Type exports
export type {
  ParaphraseStyle,
  LengthPreference,
  ReplacementMap,
  ReplaceableWord,
  Variant,
  ChangedWord,
  VariantStats,
  ParaphraseResult,
  ParaphraseOptions,
  DivergenceThresholds,
} from './types.js';

export {
  PARAPHRASE_STYLES,
  LENGTH_PREFERENCES,
  DEFAULT_PARAPHRASE_OPTIONS,
  DEFAULT_DIVERGENCE_THRESHOLDS,
} from './types.js';

// Orchestration
export { Paraphraser, filterByLength, resolveOptions, type ParaphraserDeps } from './paraphraser.js';
export {
  bulkParaphrase,
  MAX_BULK_PARAGRAPHS,
  DEFAULT_BULK_VARIATIONS,
  type BulkOptions,
  type BulkResult,
  type BulkSuccess,
  type BulkFailure,
  type BulkSettings,
} from './bulk.js';
export {
  toWireResult,
  toWireBulkResult,
  toWireStats,
  type WireParaphraseResult,
  type WireBulkResult,
  type WireVariantStats,
} from './serialize.js';

// Building blocks
export { buildReplacementMap, sortedReplacements, type ReplacementPlan } from './replacement-map.js';
export {
  generateVariants,
  attemptStandard,
  attemptAggressive,
  forceSingleReplacement,
  createDivergentRewrite,
  pickLeastCommon,
  type GenerationContext,
  type GenerationMode,
  type DivergentRewrite,
} from './candidates.js';
export { rewriteStructure, STRUCTURAL_RULES, TRANSITIONS, type RewriteRule, type RewriteReport } from './structure.js';
export {
  measureDivergence,
  evaluateDivergenceGate,
  passesCandidateGate,
  type DivergenceReport,
  type GateVerdict,
} from './divergence.js';
export { scoreVariant, scoreBreakdown, type ScoreBreakdown, type ScoreInput } from './scorer.js';
export { calculateVariantStats } from './stats.js';
export { shouldReplaceWord, STOP_WORDS } from './eligibility.js';
export { createSeededRandom, defaultRandom, type RandomSource } from './random.js';
