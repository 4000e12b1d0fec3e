/**
 * Tests for Amount Scoring
 */

import { Decimal } from 'decimal.js';
import { scoreAmount } from '../../src/matching/amountScore';

describe('scoreAmount', () => {
  it('should give 50 for an exact match', () => {
    const result = scoreAmount(new Decimal('100.00'), new Decimal('100'));

    expect(result.points.toNumber()).toBe(50);
    expect(result.reason).toBe('exact amount match');
  });

  it('should scale linearly inside the tolerance', () => {
    const result = scoreAmount(new Decimal('100.00'), new Decimal('100.005'));

    expect(result.points.toNumber()).toBe(15);
    expect(result.reason).toBe('amount within tolerance (0.005)');
  });

  it('should give 0 at the tolerance boundary', () => {
    const result = scoreAmount(new Decimal('100.00'), new Decimal('100.01'));

    expect(result.points.isZero()).toBe(true);
    expect(result.reason).toBe('amount within tolerance (0.01)');
  });

  it('should be symmetric', () => {
    const over = scoreAmount(new Decimal('100.00'), new Decimal('99.995'));
    expect(over.points.toNumber()).toBe(15);
  });

  it.each(['100.02', '150.00', '1.00'])('should give exactly 0 for %s against 100.00', (amount) => {
    const result = scoreAmount(new Decimal('100.00'), new Decimal(amount));

    expect(result.points.isZero()).toBe(true);
    expect(result.reason).toBe('amount mismatch');
  });
});
