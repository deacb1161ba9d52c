/**
 * Tests for Layered Debtor Resolution
 */

import { findByAlias, findByName, resolveAgainst } from '../../src/matching/resolveDebtor';
import type { MatchableDebtor } from '../../src/matching/types';

const debtors: MatchableDebtor[] = [
  { id: 1, name: 'Tuan', aliases: ['Béo'] },
  { id: 2, name: 'Khanh Duy', aliases: [] },
  { id: 3, name: 'Béo', aliases: [] },
];

describe('findByAlias', () => {
  it('should match aliases case-insensitively', () => {
    expect(findByAlias('BÉO', debtors)?.id).toBe(1);
  });

  it('should return null without a hit', () => {
    expect(findByAlias('Tuan', debtors)).toBeNull();
  });
});

describe('findByName', () => {
  it('should return the first debtor with the name', () => {
    const duplicates: MatchableDebtor[] = [...debtors, { id: 4, name: 'tuan', aliases: [] }];

    expect(findByName('TUAN', duplicates)?.id).toBe(1);
  });
});

describe('resolveAgainst', () => {
  describe('layered', () => {
    it('should let an alias beat a debtor with the same name', () => {
      const result = resolveAgainst('béo', debtors);

      expect(result.matchKind).toBe('alias');
      expect(result.exactMatch?.id).toBe(1);
    });

    it('should fall back to an exact name', () => {
      const result = resolveAgainst('khanh duy', debtors);

      expect(result).toEqual({ exactMatch: debtors[1], candidates: [], matchKind: 'name' });
    });

    it('should rank fuzzy candidates without choosing', () => {
      const result = resolveAgainst('tun', debtors);

      expect(result.exactMatch).toBeNull();
      expect(result.matchKind).toBe('fuzzy');
      expect(result.candidates.map((c) => c.debtor.id)).toEqual([1]);
    });

    it('should not treat a perfect fuzzy score as exact', () => {
      const result = resolveAgainst('duy khanh', debtors);

      expect(result.matchKind).toBe('fuzzy');
      expect(result.candidates[0]).toMatchObject({ score: 100, matchedOn: 'Khanh Duy' });
    });

    it('should report none for an empty debtor list', () => {
      expect(resolveAgainst('tuan', [])).toEqual({ exactMatch: null, candidates: [], matchKind: 'none' });
    });
  });

  describe('plain', () => {
    it('should take the first perfect score as exact', () => {
      const result = resolveAgainst('khanh', debtors, { aliasAware: false });

      expect(result.matchKind).toBe('name');
      expect(result.exactMatch?.id).toBe(2);
    });

    it('should not look at aliases', () => {
      const result = resolveAgainst('béo', debtors, { aliasAware: false });

      expect(result.exactMatch?.id).toBe(3);
    });

    it('should return candidates below a perfect score', () => {
      const result = resolveAgainst('tun', debtors, { aliasAware: false });

      expect(result.matchKind).toBe('fuzzy');
      expect(result.candidates.map((c) => [c.debtor.id, c.score])).toEqual([[1, 86]]);
    });
  });
});
