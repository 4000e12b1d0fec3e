import { z } from 'zod';
import { formatMoney, hasMoneyScale, toDecimal } from '../utils/money';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Required text field: trimmed, must not be empty afterwards
 */
export const requiredText = (field: string, max = 255) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be empty`)
    .max(max, `${field} must be at most ${max} characters`);

/**
 * Optional text field: blank strings become null
 */
export const optionalText = (max = 1000) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform((value) => (value ? value : null));

/**
 * Positive amount with at most two decimal places, normalized to "100.00"
 */
export const moneyAmount = z.union([z.string().trim(), z.number()]).transform((value, ctx) => {
  const text = String(value);

  if (!DECIMAL_PATTERN.test(text)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'amount must be a decimal number' });
    return z.NEVER;
  }
  if (!toDecimal(text).gt(0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'amount must be greater than 0' });
    return z.NEVER;
  }
  if (!hasMoneyScale(text)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'amount must have at most 2 decimal places',
    });
    return z.NEVER;
  }

  return formatMoney(text);
});

/**
 * ISO 4217 style code, stored upper-case
 */
export const currencyCode = z
  .string({ required_error: 'currency is required' })
  .trim()
  .regex(/^[A-Za-z]{3}$/, 'currency must be a 3-letter code')
  .transform((value) => value.toUpperCase());

/**
 * Date or date-time string, stored as an ISO-8601 instant
 */
export const isoInstant = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} is required`)
    .refine((value) => !Number.isNaN(Date.parse(value)), { message: `${field} must be a valid date` })
    .transform((value) => new Date(value).toISOString());

export const positiveId = (field: string) =>
  z.coerce
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .positive(`${field} must be positive`);

export const paginationQuery = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

export const tenantParams = z.object({
  tenantId: positiveId('tenantId'),
});

export type PaginationQuery = z.output<typeof paginationQuery>;
