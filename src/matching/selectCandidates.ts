/**
 * Candidate Selection for Reconciliation
 *
 * Scores every same-currency invoice × transaction pair and keeps, per
 * invoice, the single best transaction at or above MIN_SCORE_THRESHOLD.
 *
 * A transaction may be the best candidate for several invoices; nothing
 * here enforces a one-to-one assignment.
 */

import { MIN_SCORE_THRESHOLD } from './constants';
import { scoreMatch } from './scoreMatch';
import type { MatchCandidate, ScoringInvoice, ScoringTransaction } from './types';

/**
 * Picks at most one candidate per invoice.
 *
 * Ties keep the first transaction encountered, so callers that pass
 * transactions ordered by id get the lowest id on a tie.
 *
 * @returns Candidates in invoice input order
 */
export function selectBestCandidates(
  invoices: readonly ScoringInvoice[],
  transactions: readonly ScoringTransaction[]
): MatchCandidate[] {
  const candidates: MatchCandidate[] = [];

  for (const invoice of invoices) {
    let best: MatchCandidate | null = null;

    for (const transaction of transactions) {
      if (invoice.currency !== transaction.currency) {
        continue;
      }

      const { score, reason } = scoreMatch(invoice, transaction);
      if (score.lt(MIN_SCORE_THRESHOLD)) {
        continue;
      }

      if (best === null || score.gt(best.score)) {
        best = { invoiceId: invoice.id, transactionId: transaction.id, score, reason };
      }
    }

    if (best !== null) {
      candidates.push(best);
    }
  }

  return candidates;
}

export default selectBestCandidates;
