/**
 * Tests for Name Similarity Calculation
 */

import {
  calculateNameSimilarity,
  calculatePartialRatio,
  calculateRatio,
  calculateTokenSortRatio,
  explainNameSimilarity,
} from '../../src/matching/nameSimilarity';

// Only natural's Levenshtein module may load; its package entry pulls ESM-only lexicons.
jest.mock('natural', () => {
  throw new Error('natural package entry must not be loaded');
});

describe('distance module', () => {
  it('should score through the standalone Levenshtein module', () => {
    // "tun" -> "tuan" is one insertion
    expect(calculateRatio('tun', 'tuan')).toBe(86);
  });
});

describe('calculateRatio', () => {
  it('should return 100 for identical strings', () => {
    expect(calculateRatio('tuan', 'tuan')).toBe(100);
  });

  it('should score one missing letter', () => {
    // indel distance 1 over 7 characters
    expect(calculateRatio('tun', 'tuan')).toBe(86);
  });

  it('should score names sharing one letter', () => {
    expect(calculateRatio('minh', 'tuan')).toBe(25);
  });

  it('should return 0 when either side is empty', () => {
    expect(calculateRatio('', 'tuan')).toBe(0);
    expect(calculateRatio('tuan', '')).toBe(0);
  });
});

describe('calculatePartialRatio', () => {
  it('should return 100 for a name contained in a longer one', () => {
    expect(calculatePartialRatio('tuan', 'anh tuan')).toBe(100);
    expect(calculatePartialRatio('anh tuan', 'tuan')).toBe(100);
  });

  it('should use windows hanging off the left edge', () => {
    // best window is "tu"
    expect(calculatePartialRatio('tun', 'tuan')).toBe(80);
  });

  it('should use windows hanging off the right edge', () => {
    // best window is "n"
    expect(calculatePartialRatio('minh', 'tuan')).toBe(40);
  });

  it('should return 0 for empty input', () => {
    expect(calculatePartialRatio('', 'tuan')).toBe(0);
  });
});

describe('calculateTokenSortRatio', () => {
  it('should ignore word order', () => {
    expect(calculateTokenSortRatio('duy khanh', 'khanh duy')).toBe(100);
  });

  it('should treat punctuation as a separator', () => {
    expect(calculateTokenSortRatio('duy-khanh', 'khanh duy')).toBe(100);
  });
});

describe('calculateNameSimilarity', () => {
  describe('exact matches', () => {
    it('should return 100 for identical names', () => {
      expect(calculateNameSimilarity('Khánh Duy', 'Khánh Duy')).toBe(100);
    });

    it('should be case-insensitive', () => {
      expect(calculateNameSimilarity('TUAN', 'tuan')).toBe(100);
    });

    it('should ignore extra whitespace', () => {
      expect(calculateNameSimilarity('  khanh   duy ', 'Khanh Duy')).toBe(100);
    });
  });

  describe('similar names', () => {
    it('should score an abbreviation above the default threshold', () => {
      expect(calculateNameSimilarity('Tun', 'Tuan')).toBe(86);
    });

    it('should score reordered names as exact', () => {
      expect(calculateNameSimilarity('Duy Khanh', 'Khanh Duy')).toBe(100);
    });
  });

  describe('different names', () => {
    it('should score unrelated names low', () => {
      expect(calculateNameSimilarity('Minh', 'Tuan')).toBe(40);
    });

    it('should keep diacritics distinct', () => {
      expect(calculateNameSimilarity('Tuấn', 'Tuan')).toBeLessThan(100);
    });
  });

  describe('edge cases', () => {
    it('should return 0 for empty strings', () => {
      expect(calculateNameSimilarity('', 'Tuan')).toBe(0);
      expect(calculateNameSimilarity('Tuan', '')).toBe(0);
      expect(calculateNameSimilarity('', '')).toBe(0);
    });

    it('should return 0 for whitespace-only input', () => {
      expect(calculateNameSimilarity('   ', 'Tuan')).toBe(0);
    });

    it('should be symmetric for equal-length names', () => {
      expect(calculateNameSimilarity('minh', 'tuan')).toBe(calculateNameSimilarity('tuan', 'minh'));
    });

    it('should stay within 0-100', () => {
      const pairs: Array<[string, string]> = [
        ['a', 'b'],
        ['an', 'anh tuan nguyen'],
        ['béo', 'bao'],
        ['x', 'x'],
      ];

      for (const [a, b] of pairs) {
        const score = calculateNameSimilarity(a, b);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(100);
        expect(Number.isInteger(score)).toBe(true);
      }
    });
  });
});

describe('explainNameSimilarity', () => {
  it('should report each strategy and their maximum', () => {
    expect(explainNameSimilarity('Tun', 'Tuan')).toEqual({
      ratio: 86,
      partialRatio: 80,
      tokenSortRatio: 86,
      score: 86,
    });
  });
});
