// src/tests/tokenEstimator.test.ts
import { estimateTokens, extractTailTokens, isCJK, truncateToTokens } from '../utils/tokenEstimator';

describe('tokenEstimator', () => {
  describe('estimateTokens', () => {
    it('should return 0 for the empty string', () => {
      expect(estimateTokens('')).toBe(0);
    });

    it('should return at least 1 for any non-empty text', () => {
      expect(estimateTokens('a')).toBe(1);
      expect(estimateTokens(' ')).toBe(1);
    });

    it('should weight latin text at a quarter token per character', () => {
      expect(estimateTokens('abcdefgh')).toBe(2);
      expect(estimateTokens('a'.repeat(400))).toBe(100);
    });

    it('should weight CJK characters more heavily', () => {
      // 2 * 0.67 = 1.34
      expect(estimateTokens('专利')).toBe(2);
      // 0.5 + 1.34 = 1.84
      expect(estimateTokens('ab专利')).toBe(2);
      // 100 * 0.67 = 67
      expect(estimateTokens('权'.repeat(100))).toBe(67);
    });

    it('should classify fullwidth punctuation as CJK', () => {
      expect(isCJK('。'.codePointAt(0) ?? 0)).toBe(true);
      expect(isCJK('，'.codePointAt(0) ?? 0)).toBe(true);
      expect(isCJK('a'.codePointAt(0) ?? 0)).toBe(false);
    });
  });

  describe('truncateToTokens', () => {
    const text = 'First sentence here. Second one is longer than that.';

    it('should return the text unchanged when it fits', () => {
      expect(truncateToTokens(text, 13)).toBe(text);
    });

    it('should return an empty string for a zero budget', () => {
      expect(truncateToTokens(text, 0)).toBe('');
    });

    it('should cut back to a sentence boundary past the midpoint', () => {
      expect(truncateToTokens(text, 7)).toBe('First sentence here.');
    });

    it('should hard-cut when the last boundary is in the first half', () => {
      expect(truncateToTokens(text, 10)).toBe('First sentence here. Second one is longe');
    });

    it('should never exceed the budget', () => {
      for (const budget of [1, 3, 5, 8, 12]) {
        expect(estimateTokens(truncateToTokens(text, budget))).toBeLessThanOrEqual(budget);
      }
    });
  });

  describe('extractTailTokens', () => {
    it('should return nothing for a zero count', () => {
      expect(extractTailTokens('some text', 0)).toBe('');
    });

    it('should return short text whole', () => {
      expect(extractTailTokens('short', 5)).toBe('short');
    });

    it('should return a tail within the requested size', () => {
      const tail = extractTailTokens('alpha beta gamma delta epsilon zeta eta theta', 4);
      expect(estimateTokens(tail)).toBeLessThanOrEqual(4);
      expect('alpha beta gamma delta epsilon zeta eta theta'.endsWith(tail)).toBe(true);
    });
  });
});
