import { describe, it, expect } from 'vitest';
import { formalityScore, rankByStyle } from '../../../src/synonyms/scorer.js';

describe('synonym style ranking', () => {
  describe('formalityScore', () => {
    it('pins known informal and formal words', () => {
      expect(formalityScore('Guy')).toBe(0.2);
      expect(formalityScore('utilize')).toBe(0.9);
    });

    it('grows with length up to 1', () => {
      expect(formalityScore('bozo')).toBeCloseTo(0.7);
      expect(formalityScore('hombre')).toBeCloseTo(0.8);
      expect(formalityScore('x'.repeat(30))).toBe(1);
    });
  });

  describe('rankByStyle', () => {
    const candidates = ['guy', 'hombre', 'bozo'];

    it('keeps relevance order for balanced', () => {
      expect(rankByStyle(candidates, 'balanced')).toEqual(['guy', 'hombre', 'bozo']);
      expect(rankByStyle(candidates)).toEqual(['guy', 'hombre', 'bozo']);
    });

    it('puts formal words first for formal and academic', () => {
      expect(rankByStyle(candidates, 'formal')).toEqual(['hombre', 'bozo', 'guy']);
      expect(rankByStyle(candidates, 'academic')).toEqual(['hombre', 'bozo', 'guy']);
    });

    it('puts casual words first for casual', () => {
      expect(rankByStyle(candidates, 'casual')).toEqual(['guy', 'bozo', 'hombre']);
    });

    it('puts short words first for simple', () => {
      expect(rankByStyle(['padding', 'pad', 'doormat'], 'simple')).toEqual(['pad', 'padding', 'doormat']);
    });

    it('breaks academic ties by length', () => {
      expect(rankByStyle(['implement', 'utilize'], 'academic')).toEqual(['implement', 'utilize']);
    });

    it('does not modify the input', () => {
      const input = ['guy', 'hombre'];
      rankByStyle(input, 'formal');
      expect(input).toEqual(['guy', 'hombre']);
    });
  });
});
