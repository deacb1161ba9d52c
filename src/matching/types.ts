/**
 * Type Definitions for the Debtor Matching Engine
 *
 * The engine is pure and deterministic - it works on debtor snapshots handed
 * to it and never touches the store.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * The minimum a debtor record must carry to be matched.
 * Services pass full Debtor rows; the engine hands the same objects back.
 */
export interface MatchableDebtor {
  id: number;
  name: string;
  aliases: string[];
}

export interface RankOptions {
  /** Minimum score (0-100) for a debtor to be returned */
  threshold?: number;
  /** Score aliases as well as the debtor's own name (default true) */
  includeAliases?: boolean;
}

export interface ResolveOptions {
  threshold?: number;
  /**
   * Layered resolution (alias exact → name exact → fuzzy) when true.
   * When false: plain fuzzy ranking over names only, exact = first score of 100.
   */
  aliasAware?: boolean;
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * How a name query was resolved.
 * - alias: exact (case-insensitive) alias hit
 * - name:  exact (case-insensitive) debtor name hit
 * - fuzzy: no exact hit, ranked candidates need confirmation
 * - none:  nothing reached the threshold
 */
export type MatchKind = 'alias' | 'name' | 'fuzzy' | 'none';

export interface RankedCandidate<T extends MatchableDebtor = MatchableDebtor> {
  debtor: T;
  score: number;
  /** The name or alias that produced the score */
  matchedOn: string;
}

export interface Resolution<T extends MatchableDebtor = MatchableDebtor> {
  exactMatch: T | null;
  candidates: RankedCandidate<T>[];
  matchKind: MatchKind;
}

/**
 * Per-strategy scores, kept for debugging and candidate explanations.
 */
export interface SimilarityBreakdown {
  ratio: number;
  partialRatio: number;
  tokenSortRatio: number;
  score: number;
}
