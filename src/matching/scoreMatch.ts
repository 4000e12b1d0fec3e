/**
 * Pair Scoring for Reconciliation
 *
 * Combines the amount, date and text terms into one 0–100 score with a
 * human-readable reason. Pure and deterministic.
 *
 * Callers must not pass pairs with different currencies: those pairs are
 * excluded from matching, not scored as zero.
 */

import { Decimal } from 'decimal.js';
import { scoreAmount } from './amountScore';
import { scoreDateProximity } from './dateProximity';
import { scoreTextSimilarity } from './textSimilarity';
import { LOW_CONFIDENCE_REASON, MAX_SCORE, REASON_SEPARATOR } from './constants';
import { MONEY_ROUNDING, MONEY_SCALE } from '../utils/money';
import type { MatchScore, ScoringInvoice, ScoringTransaction } from './types';

/**
 * Scores one invoice against one bank transaction.
 *
 * @example
 * scoreMatch(
 *   { id: 1, amount: new Decimal('200.00'), currency: 'USD', invoiceDate: new Date('2024-03-10'),
 *     invoiceNumber: null, description: null, vendorName: null },
 *   { id: 9, amount: new Decimal('200.00'), currency: 'USD', postedAt: new Date('2024-03-07'),
 *     description: null }
 * )
 * // { score: 50.00, reason: 'exact amount match; date within 3 days', ... }
 */
export function scoreMatch(invoice: ScoringInvoice, transaction: ScoringTransaction): MatchScore {
  const amount = scoreAmount(invoice.amount, transaction.amount);
  const date = scoreDateProximity(invoice.invoiceDate, transaction.postedAt);
  const text = scoreTextSimilarity(invoice, transaction);

  const total = Decimal.min(amount.points.plus(date.points).plus(text.points), MAX_SCORE);

  const reasons = [amount.reason, date.reason, text.reason].filter(
    (reason): reason is string => reason !== null
  );

  return {
    score: total.toDecimalPlaces(MONEY_SCALE, MONEY_ROUNDING),
    reason: reasons.length > 0 ? reasons.join(REASON_SEPARATOR) : LOW_CONFIDENCE_REASON,
    breakdown: {
      amountPoints: amount.points,
      datePoints: date.points,
      textPoints: text.points,
      textSimilarity: text.similarity,
      daysApart: date.daysApart,
    },
  };
}

export default scoreMatch;
