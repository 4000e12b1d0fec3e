/**
 * Reconciliation Matching Engine
 *
 * Pure, deterministic functions for deciding whether an invoice and a bank
 * transaction describe the same payment:
 * - Amount agreement (exact or within a one-cent tolerance)
 * - Date proximity
 * - Ratcliff/Obershelp text similarity
 *
 * Usage:
 * ```typescript
 * import { scoreMatch, selectBestCandidates } from './matching';
 *
 * const { score, reason } = scoreMatch(invoice, transaction);
 * const candidates = selectBestCandidates(openInvoices, unmatchedTransactions);
 * ```
 */

// Main functions
export { scoreMatch } from './scoreMatch';
export { selectBestCandidates } from './selectCandidates';

// Individual scoring functions (for testing/debugging)
export { scoreAmount } from './amountScore';
export { scoreDateProximity, daysBetween } from './dateProximity';
export {
  scoreTextSimilarity,
  calculateTextSimilarity,
  buildInvoiceText,
  buildTransactionText,
} from './textSimilarity';
export { similarityRatio, getMatchingBlocks } from './sequenceMatcher';

// Constants
export {
  EXACT_AMOUNT_WEIGHT,
  AMOUNT_TOLERANCE_WEIGHT,
  AMOUNT_TOLERANCE,
  DATE_PROXIMITY_WEIGHT,
  DATE_TOLERANCE_DAYS,
  TEXT_SIMILARITY_WEIGHT,
  CONTAINMENT_SIMILARITY_FLOOR,
  MAX_SCORE,
  MIN_SCORE_THRESHOLD,
  LOW_CONFIDENCE_REASON,
} from './constants';

// Types
export type {
  ScoringInvoice,
  ScoringTransaction,
  TermScore,
  ScoreBreakdown,
  MatchScore,
  MatchCandidate,
} from './types';
export type { MatchingBlock } from './sequenceMatcher';
