/**
 * Date Proximity Scoring for Reconciliation
 *
 * A payment usually posts within a few days of the invoice date.
 *
 * Scoring logic:
 * - 0 days apart: +15
 * - 1–3 days apart: linear falloff, 15 × (1 − days / 3), reaching 0 at 3 days
 * - More than 3 days: 0
 * - Either date missing: 0 and no reason
 */

import { Decimal } from 'decimal.js';
import { DATE_PROXIMITY_WEIGHT, DATE_TOLERANCE_DAYS } from './constants';
import type { TermScore } from './types';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Calculates the number of calendar days between two instants, in UTC.
 * Returns absolute value (always positive).
 *
 * @example
 * daysBetween(new Date('2024-01-10T23:00:00Z'), new Date('2024-01-11T01:00:00Z')) // 1
 */
export function daysBetween(date1: Date, date2: Date): number {
  const utc1 = Date.UTC(date1.getUTCFullYear(), date1.getUTCMonth(), date1.getUTCDate());
  const utc2 = Date.UTC(date2.getUTCFullYear(), date2.getUTCMonth(), date2.getUTCDate());

  return Math.abs(Math.round((utc2 - utc1) / MS_PER_DAY));
}

/**
 * Scores the distance between the invoice date and the posting date.
 *
 * @returns Points in [0, 15] and a reason, or a null reason when a date is missing
 */
export function scoreDateProximity(invoiceDate: Date | null, postedAt: Date | null): TermScore & {
  daysApart: number | null;
} {
  if (!invoiceDate || !postedAt) {
    return { points: new Decimal(0), reason: null, daysApart: null };
  }

  const days = daysBetween(invoiceDate, postedAt);

  if (days <= DATE_TOLERANCE_DAYS) {
    const points = DATE_PROXIMITY_WEIGHT.times(DATE_TOLERANCE_DAYS - days).div(DATE_TOLERANCE_DAYS);
    return { points, reason: `date within ${days} days`, daysApart: days };
  }

  return { points: new Decimal(0), reason: `date difference ${days} days`, daysApart: days };
}

export default scoreDateProximity;
