/**
 * Debtor Resolver
 *
 * Turns a name query into one of three outcomes for one user's debtors:
 * an exact debtor, a ranked candidate list, or nothing.
 *
 * Layered priority (only one branch runs):
 * 1. Alias exact  - user-curated nicknames beat any coincidental fuzzy overlap
 * 2. Name exact   - case-insensitive equality with a debtor's own name
 * 3. Fuzzy        - ranked candidates over names and aliases
 *
 * Candidates are never auto-resolved by picking the top score; the caller must
 * confirm one.
 */

import { namesEqual } from './normalizeName';
import { rankCandidates } from './rankCandidates';
import { DEFAULT_MATCH_THRESHOLD, EXACT_MATCH_SCORE } from './constants';
import type { MatchableDebtor, Resolution, ResolveOptions } from './types';

/**
 * First debtor (input order) owning an alias equal to the query.
 */
export function findByAlias<T extends MatchableDebtor>(query: string, debtors: readonly T[]): T | null {
  return debtors.find((debtor) => debtor.aliases.some((alias) => namesEqual(alias, query))) ?? null;
}

/**
 * First debtor (input order) whose name equals the query.
 * Duplicate names are tolerated; the oldest debtor wins.
 */
export function findByName<T extends MatchableDebtor>(query: string, debtors: readonly T[]): T | null {
  return debtors.find((debtor) => namesEqual(debtor.name, query)) ?? null;
}

function layered<T extends MatchableDebtor>(
  query: string,
  debtors: readonly T[],
  threshold: number
): Resolution<T> {
  const aliasMatch = findByAlias(query, debtors);
  if (aliasMatch) {
    return { exactMatch: aliasMatch, candidates: [], matchKind: 'alias' };
  }

  const nameMatch = findByName(query, debtors);
  if (nameMatch) {
    return { exactMatch: nameMatch, candidates: [], matchKind: 'name' };
  }

  const candidates = rankCandidates(query, debtors, { threshold, includeAliases: true });
  if (candidates.length > 0) {
    return { exactMatch: null, candidates, matchKind: 'fuzzy' };
  }

  return { exactMatch: null, candidates: [], matchKind: 'none' };
}

/**
 * Plain variant: fuzzy over names only, a score of 100 counts as exact.
 * Note the partial ratio also scores 100 for a query contained in a name.
 */
function plain<T extends MatchableDebtor>(
  query: string,
  debtors: readonly T[],
  threshold: number
): Resolution<T> {
  const candidates = rankCandidates(query, debtors, { threshold, includeAliases: false });

  const exact = candidates.find((candidate) => candidate.score === EXACT_MATCH_SCORE);
  if (exact) {
    return { exactMatch: exact.debtor, candidates: [], matchKind: 'name' };
  }

  if (candidates.length > 0) {
    return { exactMatch: null, candidates, matchKind: 'fuzzy' };
  }

  return { exactMatch: null, candidates: [], matchKind: 'none' };
}

/**
 * Resolves a name query against a user's debtors.
 *
 * @param query - Name or nickname as typed
 * @param debtors - All debtors of one user, with aliases, in creation order
 *
 * @example
 * resolveAgainst('Béo', debtors)
 * // { exactMatch: <debtor owning alias "béo">, candidates: [], matchKind: 'alias' }
 */
export function resolveAgainst<T extends MatchableDebtor>(
  query: string,
  debtors: readonly T[],
  options: ResolveOptions = {}
): Resolution<T> {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;

  return options.aliasAware === false
    ? plain(query, debtors, threshold)
    : layered(query, debtors, threshold);
}

export default resolveAgainst;
