/**
 * Fixed-point helpers for 2-decimal monetary values.
 *
 * Amounts travel as strings ("100.00") between the API, the store and the
 * matching engine; arithmetic happens on decimal.js values only.
 */

import { Decimal } from 'decimal.js';

export const MONEY_SCALE = 2;

/**
 * Rounding used for every amount and score: half away from zero.
 */
export const MONEY_ROUNDING = Decimal.ROUND_HALF_UP;

export function toDecimal(value: Decimal.Value): Decimal {
  return new Decimal(value);
}

/**
 * Renders a value with exactly two decimal places, e.g. 100 → "100.00"
 */
export function formatMoney(value: Decimal.Value): string {
  return new Decimal(value).toFixed(MONEY_SCALE, MONEY_ROUNDING);
}

/**
 * True when the value carries no more than two decimal places
 */
export function hasMoneyScale(value: Decimal.Value): boolean {
  return new Decimal(value).decimalPlaces() <= MONEY_SCALE;
}
