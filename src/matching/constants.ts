/**
 * Constants for the Debtor Matching Engine
 *
 * Scores are integers on a 0-100 scale. A debtor is a candidate when its best
 * score (own name or any alias) reaches the threshold.
 */

// ============================================
// THRESHOLDS
// ============================================

/**
 * Default minimum score for a debtor to be offered as a candidate.
 *
 * Examples:
 * - "tun" vs "tuan"          = 86 → candidate
 * - "duy khanh" vs "khanh duy" = 100 (token sort) → candidate
 * - "minh" vs "tuan"         = 40 → excluded
 */
export const DEFAULT_MATCH_THRESHOLD = 60;

/**
 * Stricter threshold used when silently linking an existing debtor to an
 * external identity. No confirmation step follows, so it must be tighter.
 */
export const LINK_MATCH_THRESHOLD = 80;

/**
 * The top of the scale. In the plain (non alias-aware) resolution variant a
 * candidate at this score is treated as the exact match.
 */
export const EXACT_MATCH_SCORE = 100;

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

// ============================================
// CANDIDATE PRESENTATION
// ============================================

/**
 * How many fuzzy candidates are offered for confirmation.
 */
export const MAX_CONFIRMATION_CANDIDATES = 5;
