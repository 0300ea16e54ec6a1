import { describe, it, expect, vi, afterEach } from 'vitest';
import { bulkParaphrase } from '../../../src/paraphrase/bulk.js';
import type { ParaphraseOptions, ParaphraseResult } from '../../../src/paraphrase/types.js';

function resultFor(original: string): ParaphraseResult {
  return {
    original,
    variations: [`${original} (v)`],
    variationStats: [],
    bestVariation: `${original} (v)`,
    bestScore: 0.5,
    antiDetectionVariant: null,
    style: 'balanced',
    lengthPreference: 'same',
    antiDetection: false,
    wordReplacements: {},
  };
}

function fakeParaphraser() {
  return {
    paraphrase: vi.fn((sentence: string, _options?: Partial<ParaphraseOptions>): ParaphraseResult => {
      if (sentence.startsWith('boom')) {
        throw new Error('exploded');
      }
      return resultFor(sentence);
    }),
  };
}

describe('bulkParaphrase', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('paraphrases every paragraph with shared settings', () => {
    const paraphraser = fakeParaphraser();

    const bulk = bulkParaphrase(paraphraser, ['First one.', '  Second one.  '], { numVariations: 2, style: 'casual' });

    expect(bulk.success).toBe(2);
    expect(bulk.errors).toBe(0);
    expect(bulk.results.map(r => [r.index, r.original, r.success])).toEqual([
      [0, 'First one.', true],
      [1, 'Second one.', true],
    ]);
    expect(bulk.settings).toEqual({ numVariations: 2, style: 'casual', lengthPreference: 'same' });
    expect(paraphraser.paraphrase).toHaveBeenCalledWith('Second one.', {
      numVariations: 2,
      style: 'casual',
      lengthPreference: 'same',
    });
  });

  it('defaults to three variations, balanced, same length', () => {
    const bulk = bulkParaphrase(fakeParaphraser(), ['One.']);

    expect(bulk.settings).toEqual({ numVariations: 3, style: 'balanced', lengthPreference: 'same' });
  });

  it('records empty and failing paragraphs without stopping', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const bulk = bulkParaphrase(fakeParaphraser(), ['First one.', '   ', 'boom goes the paragraph', 'Last one.']);

    expect(bulk.success).toBe(2);
    expect(bulk.errors).toBe(2);
    expect(bulk.results.map(r => r.index)).toEqual([0, 3]);
    expect(bulk.errorsDetail).toEqual([
      { index: 1, error: 'Empty paragraph' },
      { index: 2, original: 'boom goes the paragraph', error: 'Processing failed' },
    ]);
    expect(errorSpy).toHaveBeenCalledWith('Paraphrase failed for paragraph 2:', 'exploded');
  });

  it('truncates the echoed text of a failed paragraph', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const long = `boom ${'x'.repeat(200)}`;

    const bulk = bulkParaphrase(fakeParaphraser(), [long]);

    expect(bulk.errorsDetail[0]?.original).toBe(long.slice(0, 100));
    expect(bulk.errorsDetail[0]?.original).toHaveLength(100);
  });

  it('rejects an empty batch', () => {
    expect(() => bulkParaphrase(fakeParaphraser(), [])).toThrow('Paragraphs must be a non-empty array.');
  });

  it('rejects batches over the limit', () => {
    const paragraphs = Array.from({ length: 51 }, (_, i) => `Paragraph ${i}.`);

    expect(() => bulkParaphrase(fakeParaphraser(), paragraphs)).toThrow('Maximum 50 paragraphs allowed at once.');
    expect(() => bulkParaphrase(fakeParaphraser(), ['a', 'b', 'c'], { maxParagraphs: 2 }))
      .toThrow('Maximum 2 paragraphs allowed at once.');
  });
});
