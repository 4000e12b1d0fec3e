/**
 * Text Similarity for Reconciliation
 *
 * Compares what the invoice says about itself (number, description, vendor)
 * with the free-text narrative on the bank line.
 */

import { Decimal } from 'decimal.js';
import { CONTAINMENT_SIMILARITY_FLOOR, TEXT_SIMILARITY_WEIGHT } from './constants';
import { similarityRatio } from './sequenceMatcher';
import type { ScoringInvoice, ScoringTransaction, TermScore } from './types';

/**
 * Lower-cased invoice number, description and vendor name, space-separated.
 * Missing or blank fields are skipped.
 *
 * @example
 * buildInvoiceText({ invoiceNumber: 'INV-7', description: null, vendorName: 'Acme' }) // "inv-7 acme"
 */
export function buildInvoiceText(
  invoice: Pick<ScoringInvoice, 'invoiceNumber' | 'description' | 'vendorName'>
): string {
  return [invoice.invoiceNumber, invoice.description, invoice.vendorName]
    .filter((part): part is string => typeof part === 'string' && part.length > 0)
    .map((part) => part.toLowerCase())
    .join(' ');
}

export function buildTransactionText(transaction: Pick<ScoringTransaction, 'description'>): string {
  return (transaction.description ?? '').toLowerCase();
}

/**
 * Similarity ratio in [0, 1] between the two texts.
 *
 * - Either side empty: 0
 * - One text contained in the other: at least 0.8
 */
export function calculateTextSimilarity(invoiceText: string, transactionText: string): number {
  if (!invoiceText || !transactionText) {
    return 0;
  }

  const ratio = similarityRatio(invoiceText, transactionText);

  if (invoiceText.includes(transactionText) || transactionText.includes(invoiceText)) {
    return Math.max(ratio, CONTAINMENT_SIMILARITY_FLOOR);
  }

  return ratio;
}

/**
 * Scores textual agreement: 5 × similarity.
 */
export function scoreTextSimilarity(
  invoice: ScoringInvoice,
  transaction: ScoringTransaction
): TermScore & { similarity: number } {
  const similarity = calculateTextSimilarity(
    buildInvoiceText(invoice),
    buildTransactionText(transaction)
  );

  if (similarity <= 0) {
    return { points: new Decimal(0), reason: null, similarity: 0 };
  }

  return {
    points: Decimal.min(TEXT_SIMILARITY_WEIGHT.times(similarity), TEXT_SIMILARITY_WEIGHT),
    reason: 'text similarity match',
    similarity,
  };
}

export default scoreTextSimilarity;
