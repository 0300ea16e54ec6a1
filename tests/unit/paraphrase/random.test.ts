import { describe, it, expect } from 'vitest';
import { createSeededRandom, pick, randomInt, sample, uniform } from '../../../src/paraphrase/random.js';
import { sequenceRandom } from '../../helpers/fixtures.js';

describe('random sources', () => {
  describe('createSeededRandom', () => {
    it('replays the same sequence for the same seed', () => {
      const first = createSeededRandom(42);
      const second = createSeededRandom(42);

      const a = [first(), first(), first(), first()];
      const b = [second(), second(), second(), second()];

      expect(a).toEqual(b);
    });

    it('differs between seeds', () => {
      expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
    });

    it('stays within [0, 1)', () => {
      const random = createSeededRandom(7);
      for (let i = 0; i < 500; i++) {
        const value = random();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe('randomInt', () => {
    it('covers both bounds', () => {
      expect(randomInt(() => 0, 1, 4)).toBe(1);
      expect(randomInt(() => 0.999, 1, 4)).toBe(4);
      expect(randomInt(() => 0.5, 1, 4)).toBe(3);
    });
  });

  describe('uniform', () => {
    it('scales into the range', () => {
      expect(uniform(() => 0, 0.85, 0.95)).toBe(0.85);
      expect(uniform(() => 0.5, 0, 10)).toBe(5);
    });
  });

  describe('pick', () => {
    it('returns undefined for an empty list', () => {
      expect(pick(() => 0.3, [])).toBeUndefined();
    });

    it('indexes by the random value', () => {
      expect(pick(() => 0, ['a', 'b', 'c'])).toBe('a');
      expect(pick(() => 0.5, ['a', 'b', 'c'])).toBe('b');
      expect(pick(() => 0.99, ['a', 'b', 'c'])).toBe('c');
    });
  });

  describe('sample', () => {
    it('keeps order when every draw takes the current slot', () => {
      expect(sample(() => 0, ['a', 'b', 'c', 'd'], 2)).toEqual(['a', 'b']);
    });

    it('draws distinct items', () => {
      // i=0: j=0+floor(0.99*3)=2 -> [c,b,a]; i=1: j=1+floor(0.99*2)=2 -> [c,a,b]
      expect(sample(sequenceRandom([0.99]), ['a', 'b', 'c'], 2)).toEqual(['c', 'a']);
    });

    it('clamps the count to the list size', () => {
      expect(sample(() => 0, ['a', 'b'], 5)).toEqual(['a', 'b']);
      expect(sample(() => 0, ['a', 'b'], -1)).toEqual([]);
    });

    it('does not modify the input', () => {
      const items = ['a', 'b', 'c'];
      sample(() => 0.99, items, 3);
      expect(items).toEqual(['a', 'b', 'c']);
    });
  });
});
