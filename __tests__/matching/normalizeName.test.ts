/**
 * Tests for Name Normalization
 */

import { cleanDisplayName, namesEqual, normalizeName, tokenizeName } from '../../src/matching/normalizeName';

describe('normalizeName', () => {
  it('should lower-case and collapse whitespace', () => {
    expect(normalizeName('  Khánh   Duy ')).toBe('khánh duy');
  });

  it('should compose decomposed diacritics', () => {
    const decomposed = 'Tua\u0302\u0301n';
    expect(normalizeName(decomposed)).toBe('tu\u1ea5n');
  });

  it('should return an empty string for empty input', () => {
    expect(normalizeName('')).toBe('');
    expect(normalizeName('   ')).toBe('');
  });
});

describe('namesEqual', () => {
  it('should compare case-insensitively', () => {
    expect(namesEqual('TUẤN', 'tuấn')).toBe(true);
  });

  it('should keep diacritics significant', () => {
    expect(namesEqual('Tuấn', 'Tuan')).toBe(false);
  });

  it('should never treat blanks as equal', () => {
    expect(namesEqual('', '')).toBe(false);
    expect(namesEqual('  ', ' ')).toBe(false);
  });
});

describe('tokenizeName', () => {
  it('should split on whitespace and punctuation', () => {
    expect(tokenizeName('Duy-Khanh  Nguyen.')).toEqual(['duy', 'khanh', 'nguyen']);
  });

  it('should return no tokens for punctuation only', () => {
    expect(tokenizeName('--')).toEqual([]);
  });
});

describe('cleanDisplayName', () => {
  it('should tidy spacing and keep case', () => {
    expect(cleanDisplayName('  Khánh   Duy ')).toBe('Khánh Duy');
  });
});
