/**
 * Tests for Date Proximity Scoring
 */

import { daysBetween, scoreDateProximity } from '../../src/matching/dateProximity';

describe('daysBetween', () => {
  it('should return 0 for same date', () => {
    const date = new Date('2024-01-15');
    expect(daysBetween(date, date)).toBe(0);
  });

  it('should be symmetric (order independent)', () => {
    const date1 = new Date('2024-01-10');
    const date2 = new Date('2024-01-15');
    expect(daysBetween(date1, date2)).toBe(5);
    expect(daysBetween(date2, date1)).toBe(5);
  });

  it('should count calendar days, not 24h periods', () => {
    const late = new Date('2024-01-10T23:00:00Z');
    const early = new Date('2024-01-11T01:00:00Z');
    expect(daysBetween(late, early)).toBe(1);
  });

  it('should handle year boundaries', () => {
    expect(daysBetween(new Date('2023-12-30'), new Date('2024-01-05'))).toBe(6);
  });
});

describe('scoreDateProximity', () => {
  const invoiceDate = new Date('2024-03-10');

  it('should give 15 for the same day', () => {
    const result = scoreDateProximity(invoiceDate, new Date('2024-03-10T15:30:00Z'));

    expect(result.points.toNumber()).toBe(15);
    expect(result.reason).toBe('date within 0 days');
    expect(result.daysApart).toBe(0);
  });

  it('should fall off linearly', () => {
    expect(scoreDateProximity(invoiceDate, new Date('2024-03-11')).points.toNumber()).toBe(10);
    expect(scoreDateProximity(invoiceDate, new Date('2024-03-08')).points.toNumber()).toBe(5);
  });

  it('should give 0 at exactly 3 days with a "within" reason', () => {
    const result = scoreDateProximity(invoiceDate, new Date('2024-03-07'));

    expect(result.points.isZero()).toBe(true);
    expect(result.reason).toBe('date within 3 days');
  });

  it('should report the difference beyond the tolerance', () => {
    const result = scoreDateProximity(invoiceDate, new Date('2024-03-20'));

    expect(result.points.isZero()).toBe(true);
    expect(result.reason).toBe('date difference 10 days');
  });

  it('should contribute nothing when the invoice date is missing', () => {
    const result = scoreDateProximity(null, new Date('2024-03-10'));

    expect(result.points.isZero()).toBe(true);
    expect(result.reason).toBeNull();
    expect(result.daysApart).toBeNull();
  });
});
