/**
 * Integration tests: WordNet lexicon -> app context -> paraphrase and lookup
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { getDefaultConfig } from '../../src/config/loader.js';
import { createAppContext, type AppContext } from '../../src/context.js';
import { lookupWord } from '../../src/lexicon/lookup.js';
import { bulkParaphrase } from '../../src/paraphrase/bulk.js';
import { toWireResult } from '../../src/paraphrase/serialize.js';
import { WORDNET_FIXTURE_DIR, createStubAnalyzer } from '../helpers/fixtures.js';

describe('Paraphrase workflow over WordNet', () => {
  let context: AppContext;

  beforeAll(async () => {
    const config = getDefaultConfig();
    config.lexicon = { source: 'wordnet', path: WORDNET_FIXTURE_DIR };
    config.paraphrase.seed = 5;
    context = await createAppContext(config, { analyzer: createStubAnalyzer() });
  });

  it('looks up inflected words', () => {
    const result = lookupWord(context.lexicon, 'cats');

    expect(result.synonyms).toContain('hombre');
    expect(result.related).toContain('feline');
  });

  it('produces ranked, distinct variations that differ from the input', () => {
    const result = context.paraphraser.paraphrase('The cat sat on the mat.', { numVariations: 4 });

    const lowered = result.variations.map(v => v.toLowerCase());
    expect(lowered.length).toBeGreaterThan(0);
    expect(new Set(lowered).size).toBe(lowered.length);
    expect(lowered).not.toContain('the cat sat on the mat.');
    expect(result.bestVariation).toBe(result.variations[0]);
    expect(result.bestScore).toBeCloseTo(result.variationStats[0]?.score ?? -1, 2);
    expect(Object.keys(result.wordReplacements)).toContain('cat');
  });

  it('serializes a result for the wire', () => {
    const result = context.paraphraser.paraphrase('The cat sat.', { numVariations: 2, style: 'formal' });
    const wire = toWireResult(result);

    expect(wire.original).toBe('The cat sat.');
    expect(wire.style).toBe('formal');
    expect(wire.variation_stats).toHaveLength(wire.variations.length);
  });

  it('paraphrases paragraphs in bulk', () => {
    const bulk = bulkParaphrase(context.paraphraser, ['The cat sat.', '', 'The mat.'], { numVariations: 2 });

    expect(bulk.success).toBe(2);
    expect(bulk.errorsDetail).toEqual([{ index: 1, error: 'Empty paragraph' }]);
    expect(bulk.results.map(r => r.original)).toEqual(['The cat sat.', 'The mat.']);
  });
});

describe('Paraphrase workflow with the Treebank analyzer', () => {
  it('keeps contractions and possessives attached to their words', async () => {
    const config = getDefaultConfig();
    config.lexicon = { source: 'wordnet', path: WORDNET_FIXTURE_DIR };
    config.paraphrase.seed = 5;
    const context = await createAppContext(config);

    const result = context.paraphraser.paraphrase("The cat's mat isn't red.", { numVariations: 3 });

    for (const variation of result.variations) {
      expect(variation).toContain("isn't red.");
      expect(variation).toMatch(/\w's /);
      expect(variation).not.toMatch(/\s'|'\s/);
    }
  });
});
