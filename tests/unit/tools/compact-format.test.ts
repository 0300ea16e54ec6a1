import { describe, expect, it } from 'vitest';
import {
  TRUNCATION_MARKER,
  compactDocument,
  formatCompactHeader,
  formatCompactTable,
} from '../../../src/server/tools/compact-format.js';

describe('compact-format helpers', () => {
  it('renders records as TSV with header row', () => {
    const output = formatCompactTable(['relation', 'count'], [
      { relation: 'synonyms', count: 2 },
      { relation: 'antonyms', count: 0 },
    ]);

    expect(output).toBe('relation\tcount\nsynonyms\t2\nantonyms\t0');
  });

  it('flattens tabs, newlines, and nullish values', () => {
    const output = formatCompactTable(['col1', 'col2', 'col3', 'col4'], [
      {
        col1: 'a\tb',
        col2: 'line1\r\nline2',
        col3: null,
        col4: undefined,
      },
    ]);

    expect(output).toBe('col1\tcol2\tcol3\tcol4\na    b\tline1\\nline2\t\t');
  });

  it('follows the column order and leaves missing fields empty', () => {
    expect(formatCompactTable(['a', 'b', 'c'], [{ b: '2', a: '1' }])).toBe('a\tb\tc\n1\t2\t');
  });

  it('renders only the header row when there are no records', () => {
    expect(formatCompactTable(['index', 'error'], [])).toBe('index\terror');
  });

  it('renders section headers with key=value pairs', () => {
    expect(formatCompactHeader('PARAPHRASE', { best_score: 0.8, style: 'formal', seed: undefined }))
      .toBe('[PARAPHRASE] best_score=0.8 style=formal');
    expect(formatCompactHeader('ERRORS')).toBe('[ERRORS]');
  });

  describe('compactDocument', () => {
    it('joins sections line by line', () => {
      expect(compactDocument(['[WORD] word=cat', 'relation\tcount'])).toBe('[WORD] word=cat\nrelation\tcount');
    });

    it('cuts output over the budget and marks it', () => {
      const output = compactDocument(['[A]', 'x'.repeat(100)], 25);

      expect(output).toBe(`[A]\n${'x'.repeat(6)}${TRUNCATION_MARKER}`);
      expect(Buffer.byteLength(output, 'utf8')).toBe(25);
    });

    it('does not split a multi-byte character', () => {
      expect(compactDocument(['é'.repeat(20)], 20)).toBe(`éé${TRUNCATION_MARKER}`);
    });

    it('returns part of the marker when the budget cannot hold it', () => {
      expect(compactDocument(['x'.repeat(50)], 10)).toBe('\n...[trunc');
    });

    it('leaves output within budget untouched', () => {
      expect(compactDocument(['short'], 25)).toBe('short');
      expect(compactDocument(['short'], 0)).toBe('');
    });

    it('caps tool output at 4000 bytes by default', () => {
      const output = compactDocument(['y'.repeat(5000)]);

      expect(Buffer.byteLength(output, 'utf8')).toBe(4000);
      expect(output.endsWith(TRUNCATION_MARKER)).toBe(true);
    });
  });
});
