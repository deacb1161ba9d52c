/**
 * Candidate Ranker
 *
 * Scores a name query against every debtor of one user and returns those at or
 * above the threshold, best first. A debtor's score is the maximum over its own
 * name and (optionally) each of its aliases, so a debtor appears at most once.
 *
 * Ties keep the order of the input list (Array.prototype.sort is stable). The
 * store returns debtors in creation order, so equal scores list older debtors
 * first.
 */

import { calculateNameSimilarity } from './nameSimilarity';
import { DEFAULT_MATCH_THRESHOLD } from './constants';
import type { MatchableDebtor, RankOptions, RankedCandidate } from './types';

/**
 * Best score of a debtor for a query, with the label that produced it.
 * The debtor's own name wins ties against its aliases.
 */
export function scoreDebtor(
  query: string,
  debtor: MatchableDebtor,
  includeAliases = true
): { score: number; matchedOn: string } {
  let best = { score: calculateNameSimilarity(query, debtor.name), matchedOn: debtor.name };

  if (includeAliases) {
    for (const alias of debtor.aliases) {
      const score = calculateNameSimilarity(query, alias);
      if (score > best.score) {
        best = { score, matchedOn: alias };
      }
    }
  }

  return best;
}

/**
 * Ranks debtors against a query.
 *
 * @param query - Free-form name typed by the user
 * @param debtors - All debtors of one user
 * @returns Candidates with score >= threshold, sorted by score descending
 *
 * @example
 * rankCandidates('tun', [{ id: 1, name: 'Tuan', aliases: [] }])
 * // [{ debtor: { id: 1, ... }, score: 86, matchedOn: 'Tuan' }]
 */
export function rankCandidates<T extends MatchableDebtor>(
  query: string,
  debtors: readonly T[],
  options: RankOptions = {}
): RankedCandidate<T>[] {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const includeAliases = options.includeAliases ?? true;

  const seen = new Set<number>();
  const candidates: RankedCandidate<T>[] = [];

  for (const debtor of debtors) {
    if (seen.has(debtor.id)) {
      continue;
    }
    seen.add(debtor.id);

    const { score, matchedOn } = scoreDebtor(query, debtor, includeAliases);
    if (score >= threshold) {
      candidates.push({ debtor, score, matchedOn });
    }
  }

  return candidates.sort((a, b) => b.score - a.score);
}

export default rankCandidates;
