/**
 * Debtor Matching Engine
 *
 * Pure, deterministic functions that map a typed name onto a user's debtors:
 * - Name similarity (ratio / partial ratio / token sort, max wins)
 * - Candidate ranking with alias awareness and dedup
 * - Layered resolution: alias exact → name exact → fuzzy
 *
 * Usage:
 * ```typescript
 * import { resolveAgainst } from './matching';
 *
 * const result = resolveAgainst('tun', debtors);
 * console.log(result.matchKind); // 'alias' | 'name' | 'fuzzy' | 'none'
 * ```
 */

export { resolveAgainst, findByAlias, findByName } from './resolveDebtor';
export { rankCandidates, scoreDebtor } from './rankCandidates';
export {
  calculateNameSimilarity,
  calculateRatio,
  calculatePartialRatio,
  calculateTokenSortRatio,
  explainNameSimilarity,
} from './nameSimilarity';
export { normalizeName, namesEqual, tokenizeName, cleanDisplayName } from './normalizeName';

export {
  DEFAULT_MATCH_THRESHOLD,
  LINK_MATCH_THRESHOLD,
  EXACT_MATCH_SCORE,
  MIN_SCORE,
  MAX_SCORE,
  MAX_CONFIRMATION_CANDIDATES,
} from './constants';

export type {
  MatchableDebtor,
  MatchKind,
  RankOptions,
  RankedCandidate,
  Resolution,
  ResolveOptions,
  SimilarityBreakdown,
} from './types';
