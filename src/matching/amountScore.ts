/**
 * Amount Scoring for Reconciliation
 *
 * The amount is the strongest signal that an invoice and a bank
 * transaction describe the same payment.
 *
 * - Exact match: +50
 * - Within tolerance (≤0.01): up to +30, falling linearly to 0 at the tolerance edge
 * - Anything further apart: 0
 */

import { Decimal } from 'decimal.js';
import { AMOUNT_TOLERANCE, AMOUNT_TOLERANCE_WEIGHT, EXACT_AMOUNT_WEIGHT } from './constants';
import type { TermScore } from './types';

/**
 * Scores how closely two amounts agree.
 *
 * @example
 * scoreAmount(new Decimal('100.00'), new Decimal('100.00'))
 * // { points: 50, reason: 'exact amount match' }
 *
 * scoreAmount(new Decimal('100.00'), new Decimal('100.01'))
 * // { points: 0, reason: 'amount within tolerance (0.01)' }
 */
export function scoreAmount(invoiceAmount: Decimal, transactionAmount: Decimal): TermScore {
  const difference = invoiceAmount.minus(transactionAmount).abs();

  if (difference.isZero()) {
    return { points: EXACT_AMOUNT_WEIGHT, reason: 'exact amount match' };
  }

  if (difference.lte(AMOUNT_TOLERANCE)) {
    // 30 × (1 − d / tolerance), written to stay exact in decimal arithmetic
    const points = AMOUNT_TOLERANCE_WEIGHT.times(AMOUNT_TOLERANCE.minus(difference)).div(
      AMOUNT_TOLERANCE
    );
    return {
      points: Decimal.min(points, AMOUNT_TOLERANCE_WEIGHT),
      reason: `amount within tolerance (${difference.toString()})`,
    };
  }

  return { points: new Decimal(0), reason: 'amount mismatch' };
}

export default scoreAmount;
