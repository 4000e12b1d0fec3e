import { Request, Response } from 'express';
import { z } from 'zod';
import { bankTransactionService } from '../services';
import { AppError, asyncHandler, sendPaginated, sendSuccess } from '../utils';
import { validateInput } from '../utils/validation';
import {
  currencyCode,
  idempotencyKey,
  importRequestBodySchema,
  paginationQuery,
  tenantParams,
  transactionParams,
} from '../schemas';

export const IDEMPOTENCY_HEADER = 'Idempotency-Key';

const csvFormSchema = z.object({
  idempotency_key: idempotencyKey.optional(),
  default_currency: currencyCode.optional(),
});

/**
 * A non-blank header wins over any key sent in the body
 */
const resolveIdempotencyKey = (req: Request, bodyKey: string | undefined): string | undefined => {
  const header = req.get(IDEMPOTENCY_HEADER);
  if (header === undefined || header.trim() === '') {
    return bodyKey;
  }
  return validateInput(idempotencyKey, header);
};

/**
 * Bank transaction controller
 */
export class BankTransactionController {
  /**
   * POST /tenants/:tenantId/bank-transactions/import
   * Body: [item, ...] or { transactions: [item, ...], idempotency_key? }
   * 201 on a fresh import, 200 on a replay
   */
  importTransactions = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const body = validateInput(importRequestBodySchema, req.body);
    const key = resolveIdempotencyKey(req, body.idempotency_key);

    const { transactions, replayed } = await bankTransactionService.importTransactions(
      tenantId,
      body.transactions,
      key
    );

    sendSuccess(
      res,
      { transactions, replayed },
      replayed ? 'Import replayed' : 'Transactions imported',
      replayed ? 200 : 201
    );
  });

  /**
   * POST /tenants/:tenantId/bank-transactions/import/csv
   * multipart/form-data: file, idempotency_key?, default_currency?
   */
  importCsv = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);

    if (!req.file) {
      throw AppError.validation('No file uploaded. Please upload a CSV file in the "file" field.');
    }

    const form = validateInput(csvFormSchema, req.body ?? {});
    const key = resolveIdempotencyKey(req, form.idempotency_key);

    const { transactions, replayed } = await bankTransactionService.importTransactionsCsv(
      tenantId,
      req.file.buffer,
      key,
      { defaultCurrency: form.default_currency }
    );

    sendSuccess(
      res,
      { transactions, replayed },
      replayed ? 'Import replayed' : 'Statement imported',
      replayed ? 200 : 201
    );
  });

  /**
   * GET /tenants/:tenantId/bank-transactions
   */
  listTransactions = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const pageRequest = validateInput(paginationQuery, req.query);
    const { transactions, total } = await bankTransactionService.listTransactions(
      tenantId,
      pageRequest
    );
    sendPaginated(res, transactions, pageRequest, total);
  });

  /**
   * GET /tenants/:tenantId/bank-transactions/:transactionId
   */
  getTransaction = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId, transactionId } = validateInput(transactionParams, req.params);
    const transaction = await bankTransactionService.getTransaction(tenantId, transactionId);
    sendSuccess(res, transaction);
  });
}

export const bankTransactionController = new BankTransactionController();

export default bankTransactionController;
