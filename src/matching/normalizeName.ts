/**
 * Name Normalization for Debtor Matching
 *
 * Names arrive from chat messages and dashboard forms with arbitrary casing,
 * stray whitespace and (for Vietnamese names) either composed or decomposed
 * diacritics. Everything that compares names goes through here first.
 *
 * Example transformations:
 * - "  Khánh   Duy " → "khánh duy"
 * - "TUẤN"          → "tuấn"
 */

/**
 * Normalizes a name for comparison by:
 * 1. Composing diacritics (NFC) so "ấ" is one character
 * 2. Lower-casing
 * 3. Collapsing runs of whitespace and trimming
 *
 * Diacritics are kept: "tuấn" and "tuan" are different names that only
 * fuzzy matching may bring together.
 *
 * @example
 * normalizeName("  Khánh   Duy ") // "khánh duy"
 */
export function normalizeName(input: string): string {
  if (!input) {
    return '';
  }

  return input.normalize('NFC').toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Case-insensitive equality on normalized names.
 */
export function namesEqual(a: string, b: string): boolean {
  const left = normalizeName(a);
  return left.length > 0 && left === normalizeName(b);
}

/**
 * Splits a name into word tokens for order-insensitive comparison.
 * Punctuation acts as a separator ("Duy-Khanh" → ["duy", "khanh"]).
 */
export function tokenizeName(input: string): string[] {
  return normalizeName(input)
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(' ')
    .filter((token) => token.length > 0);
}

/**
 * Tidies a name for storage: composed diacritics, single spaces, no padding.
 * Case is kept as typed.
 *
 * @example
 * cleanDisplayName("  Khánh   Duy ") // "Khánh Duy"
 */
export function cleanDisplayName(input: string): string {
  return input.normalize('NFC').replace(/\s+/g, ' ').trim();
}
