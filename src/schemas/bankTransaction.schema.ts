import { z } from 'zod';
import { currencyCode, isoInstant, moneyAmount, optionalText, positiveId } from './common.schema';

export const MAX_IMPORT_ITEMS = 5000;

export const idempotencyKey = z.string().trim().min(1).max(255);

export const importTransactionItemSchema = z.object({
  external_id: optionalText(255),
  posted_at: isoInstant('posted_at'),
  amount: moneyAmount,
  currency: currencyCode,
  description: optionalText(),
});

export const importTransactionsSchema = z
  .array(importTransactionItemSchema)
  .min(1, 'at least one transaction is required')
  .max(MAX_IMPORT_ITEMS, `at most ${MAX_IMPORT_ITEMS} transactions per import`);

/**
 * Request body: either a bare array or `{ transactions, idempotency_key? }`
 */
export const importRequestBodySchema = z.union([
  z.object({
    transactions: importTransactionsSchema,
    idempotency_key: idempotencyKey.optional(),
  }),
  importTransactionsSchema.transform((transactions) => ({
    transactions,
    idempotency_key: undefined,
  })),
]);

export const transactionParams = z.object({
  tenantId: positiveId('tenantId'),
  transactionId: positiveId('transactionId'),
});

export type ImportTransactionItemInput = z.input<typeof importTransactionItemSchema>;
export type ImportTransactionItem = z.output<typeof importTransactionItemSchema>;
