/**
 * Constants for the Reconciliation Matching Engine
 *
 * Scoring is additive. Each term is capped at its weight before the terms
 * are summed, and the total is capped at MAX_SCORE.
 *
 *   amount (exact)          50
 *   amount (tolerance)      up to 30
 *   date proximity          up to 15
 *   text similarity         up to 5
 *
 * Changing any value here changes every score the engine emits.
 */

import { Decimal } from 'decimal.js';

// ============================================
// AMOUNT
// ============================================

/** Points for a zero amount difference */
export const EXACT_AMOUNT_WEIGHT = new Decimal('50.00');

/** Maximum points for a non-zero difference inside AMOUNT_TOLERANCE, scaled linearly to 0 at the edge */
export const AMOUNT_TOLERANCE_WEIGHT = new Decimal('30.00');

/** Largest absolute amount difference still considered a near match */
export const AMOUNT_TOLERANCE = new Decimal('0.01');

// ============================================
// DATE PROXIMITY
// ============================================

/** Maximum points when invoice date and posting date fall on the same day */
export const DATE_PROXIMITY_WEIGHT = new Decimal('15.00');

/** Days beyond which the date term contributes nothing */
export const DATE_TOLERANCE_DAYS = 3;

// ============================================
// TEXT SIMILARITY
// ============================================

/** Points for a similarity ratio of 1.0 */
export const TEXT_SIMILARITY_WEIGHT = new Decimal('5.00');

/**
 * Lower bound applied to the similarity ratio when one text contains the other.
 * "inv-1001" inside "ach payment inv-1001 acme" is a strong signal even though
 * the character-level ratio is low.
 */
export const CONTAINMENT_SIMILARITY_FLOOR = 0.8;

// ============================================
// TOTALS & SELECTION
// ============================================

export const MAX_SCORE = new Decimal('100.00');

/** Candidates scoring below this are discarded by the orchestrator */
export const MIN_SCORE_THRESHOLD = new Decimal('20.00');

/** Reason used when no scoring term produced a note */
export const LOW_CONFIDENCE_REASON = 'low confidence match';

export const REASON_SEPARATOR = '; ';
