import { z } from 'zod';
import { INVOICE_STATUSES } from '../db/schema';
import {
  currencyCode,
  isoInstant,
  moneyAmount,
  optionalText,
  paginationQuery,
  positiveId,
} from './common.schema';

export const createInvoiceSchema = z.object({
  vendor_id: positiveId('vendor_id').nullish().transform((value) => value ?? null),
  invoice_number: optionalText(100),
  amount: moneyAmount,
  currency: currencyCode,
  invoice_date: isoInstant('invoice_date').nullish().transform((value) => value ?? null),
  description: optionalText(),
});

const optionalAmountFilter = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, 'must be a decimal number')
  .optional();

export const listInvoicesQuerySchema = paginationQuery.extend({
  status: z.enum(INVOICE_STATUSES).optional(),
  vendor_id: positiveId('vendor_id').optional(),
  date_from: isoInstant('date_from').optional(),
  date_to: isoInstant('date_to').optional(),
  amount_min: optionalAmountFilter,
  amount_max: optionalAmountFilter,
});

export const invoiceParams = z.object({
  tenantId: positiveId('tenantId'),
  invoiceId: positiveId('invoiceId'),
});

export type CreateInvoiceInput = z.input<typeof createInvoiceSchema>;
export type ListInvoicesQuery = z.output<typeof listInvoicesQuerySchema>;
