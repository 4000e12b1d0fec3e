/**
 * Type Definitions for the Reconciliation Matching Engine
 *
 * The engine is pure and deterministic: these are plain values,
 * detached from any database row shape.
 */

import type { Decimal } from 'decimal.js';

// ============================================
// INPUT TYPES
// ============================================

/**
 * The invoice side of a pair.
 */
export interface ScoringInvoice {
  id: number;
  amount: Decimal;
  /** ISO 4217 code, upper-case */
  currency: string;
  invoiceDate: Date | null;
  invoiceNumber: string | null;
  description: string | null;
  /** Name of the linked vendor, if any */
  vendorName: string | null;
}

/**
 * The bank side of a pair.
 */
export interface ScoringTransaction {
  id: number;
  amount: Decimal;
  currency: string;
  postedAt: Date;
  description: string | null;
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * Contribution of one scoring term. `reason` is null when the term
 * has nothing to say (e.g. a missing invoice date).
 */
export interface TermScore {
  points: Decimal;
  reason: string | null;
}

/**
 * Per-term contributions behind a score, for auditing and debugging.
 */
export interface ScoreBreakdown {
  amountPoints: Decimal;
  datePoints: Decimal;
  textPoints: Decimal;
  /** Raw similarity ratio in [0, 1] after the containment floor */
  textSimilarity: number;
  /** Whole days between invoice date and posting date; null when either is missing */
  daysApart: number | null;
}

export interface MatchScore {
  /** 0.00–100.00, rounded half-up to 2 places */
  score: Decimal;
  reason: string;
  breakdown: ScoreBreakdown;
}

/**
 * Best transaction found for one invoice.
 */
export interface MatchCandidate {
  invoiceId: number;
  transactionId: number;
  score: Decimal;
  reason: string;
}
