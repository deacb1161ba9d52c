/**
 * Name Similarity Scorer for Debtor Matching
 *
 * Three strategies run on the same normalized pair and the highest wins:
 * - ratio:          whole-string similarity, catches typos ("tuna" vs "tuan")
 * - partial ratio:  best alignment of the shorter name inside the longer one,
 *                   catches abbreviations and substrings ("tun" vs "tuan")
 * - token sort:     ratio after sorting words, catches reordered names
 *                   ("duy khanh" vs "khanh duy")
 *
 * Taking the max favours recall: a wrong candidate is cheap to reject in the
 * confirmation step, a missed one forces the user to retype.
 */

/// <reference path="../types/natural-distance.d.ts" />
import { LevenshteinDistance } from 'natural/lib/natural/distance/levenshtein_distance';
import { normalizeName, tokenizeName } from './normalizeName';
import { MAX_SCORE, MIN_SCORE } from './constants';
import type { SimilarityBreakdown } from './types';

/**
 * A substitution costs as much as a deletion plus an insertion, which turns the
 * Levenshtein distance into the insert/delete (Indel) distance.
 */
const INDEL_COSTS = {
  insertion_cost: 1,
  deletion_cost: 1,
  substitution_cost: 2,
};

function indelDistance(a: string, b: string): number {
  const distance: unknown = LevenshteinDistance(a, b, INDEL_COSTS);

  if (typeof distance !== 'number') {
    throw new TypeError('LevenshteinDistance did not return a number');
  }
  return distance;
}

/**
 * Normalized Indel similarity scaled to 0-100, unrounded.
 */
function rawRatio(a: string, b: string): number {
  const lengthSum = a.length + b.length;
  if (lengthSum === 0) {
    return MIN_SCORE;
  }
  return (1 - indelDistance(a, b) / lengthSum) * MAX_SCORE;
}

function toScore(raw: number): number {
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, Math.round(raw)));
}

/**
 * Whole-string similarity.
 *
 * @example
 * calculateRatio("tun", "tuan")  // 86
 * calculateRatio("minh", "tuan") // 25
 */
export function calculateRatio(a: string, b: string): number {
  if (!a || !b) {
    return MIN_SCORE;
  }
  if (a === b) {
    return MAX_SCORE;
  }
  return toScore(rawRatio(a, b));
}

/**
 * Best ratio of the shorter string against every same-length window of the
 * longer one, including the partial windows hanging off either end.
 *
 * @example
 * calculatePartialRatio("tuan", "anh tuan") // 100
 * calculatePartialRatio("tun", "tuan")      // 80
 */
export function calculatePartialRatio(a: string, b: string): number {
  if (!a || !b) {
    return MIN_SCORE;
  }

  const best =
    a.length === b.length
      ? Math.max(bestWindowRatio(a, b), bestWindowRatio(b, a))
      : a.length < b.length
        ? bestWindowRatio(a, b)
        : bestWindowRatio(b, a);

  return toScore(best);
}

function bestWindowRatio(needle: string, haystack: string): number {
  const needleLength = needle.length;
  const haystackLength = haystack.length;
  let best = 0;

  const consider = (window: string): boolean => {
    const score = rawRatio(needle, window);
    if (score > best) {
      best = score;
    }
    return best >= MAX_SCORE;
  };

  // Windows growing in from the left edge
  for (let end = 1; end < needleLength; end++) {
    if (consider(haystack.slice(0, end))) return best;
  }

  // Full-length windows
  for (let start = 0; start <= haystackLength - needleLength; start++) {
    if (consider(haystack.slice(start, start + needleLength))) return best;
  }

  // Windows shrinking towards the right edge
  for (let start = haystackLength - needleLength + 1; start < haystackLength; start++) {
    if (consider(haystack.slice(start))) return best;
  }

  return best;
}

/**
 * Ratio after sorting the words of each name.
 *
 * @example
 * calculateTokenSortRatio("duy khanh", "khanh duy") // 100
 */
export function calculateTokenSortRatio(a: string, b: string): number {
  const sortedA = tokenizeName(a).sort().join(' ');
  const sortedB = tokenizeName(b).sort().join(' ');
  return calculateRatio(sortedA, sortedB);
}

/**
 * Scores every strategy for a pair of names.
 */
export function explainNameSimilarity(query: string, candidate: string): SimilarityBreakdown {
  const a = normalizeName(query);
  const b = normalizeName(candidate);

  const ratio = calculateRatio(a, b);
  const partialRatio = calculatePartialRatio(a, b);
  const tokenSortRatio = calculateTokenSortRatio(a, b);

  return {
    ratio,
    partialRatio,
    tokenSortRatio,
    score: Math.max(ratio, partialRatio, tokenSortRatio),
  };
}

/**
 * Similarity between a query and a stored name, 0-100.
 *
 * Pure and deterministic; case-insensitive because both sides are normalized.
 *
 * @example
 * calculateNameSimilarity("Tun", "Tuan")             // 86
 * calculateNameSimilarity("Duy Khanh", "Khánh Duy")  // below 100: diacritics differ
 * calculateNameSimilarity("", "Tuan")                // 0
 */
export function calculateNameSimilarity(query: string, candidate: string): number {
  return explainNameSimilarity(query, candidate).score;
}

export default calculateNameSimilarity;
