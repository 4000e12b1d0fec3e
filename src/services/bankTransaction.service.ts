/**
 * Bank Transaction Service
 *
 * Idempotent bulk import of bank transactions.
 *
 * Two layers of deduplication:
 * - Item level: a non-empty external_id is the natural key. An incoming item
 *   whose (tenant, external_id) already exists reuses the stored row.
 * - Batch level: an optional idempotency key ties a request payload to the
 *   ids it produced, so a retried request replays instead of re-importing.
 *
 * The unique index on (tenant_id, external_id) is the final arbiter under
 * concurrency. The existence check before insert only saves a round trip.
 *
 * Transactions are never mutated after import.
 */

import { db, AppError, getLogger, type DB, type PageRequest } from '../utils';
import { errorMessage, toPersistenceError } from '../db/errors';
import type { BankTransactionRow } from '../db/schema';
import {
  importTransactionsSchema,
  idempotencyKey as idempotencyKeySchema,
  type ImportTransactionItem,
  type ImportTransactionItemInput,
} from '../schemas';
import { validateInput } from '../utils/validation';
import { parseBankStatement, type CsvParseOptions, type ParsedStatement } from '../utils/csv';
import { requireTenant } from './tenant.service';
import { decodeResult, findRecord, hashPayload, storeResult } from './idempotency.service';

const logger = getLogger('BankTransactionService');

// ============================================
// Types
// ============================================

export interface ImportResult {
  /** One row per input item, in input order. Reused rows may repeat. */
  transactions: BankTransactionRow[];
  /** True only when the idempotency key short-circuited the import */
  replayed: boolean;
}

// ============================================
// Helpers
// ============================================

/**
 * Hash over the normalized, field-complete, order-preserving item list
 */
export function hashImportPayload(items: readonly ImportTransactionItem[]): string {
  return hashPayload(
    items.map((item) => ({
      amount: item.amount,
      currency: item.currency,
      description: item.description,
      external_id: item.external_id,
      posted_at: item.posted_at,
    }))
  );
}

/**
 * Loads rows by id, preserving order and duplicates.
 *
 * @returns null when any id no longer resolves for the tenant
 */
async function resolveTransactions(
  tenantId: number,
  ids: readonly number[]
): Promise<BankTransactionRow[] | null> {
  if (ids.length === 0) {
    return null;
  }

  const rows = await db
    .selectFrom('bank_transactions')
    .selectAll()
    .where('tenant_id', '=', tenantId)
    .where('id', 'in', [...new Set(ids)])
    .execute();

  const byId = new Map(rows.map((row) => [row.id, row]));
  const resolved: BankTransactionRow[] = [];

  for (const id of ids) {
    const row = byId.get(id);
    if (!row) {
      return null;
    }
    resolved.push(row);
  }

  return resolved;
}

async function findByExternalId(
  executor: DB,
  tenantId: number,
  externalId: string
): Promise<BankTransactionRow | undefined> {
  return executor
    .selectFrom('bank_transactions')
    .selectAll()
    .where('tenant_id', '=', tenantId)
    .where('external_id', '=', externalId)
    .executeTakeFirst();
}

/**
 * Inserts one item, or returns the existing row sharing its external_id.
 *
 * A concurrent insert of the same natural key surfaces as an ignored
 * conflict; the winner's row is read back and reused.
 */
export async function insertOrReuse(
  executor: DB,
  tenantId: number,
  item: ImportTransactionItem
): Promise<BankTransactionRow> {
  if (item.external_id) {
    const existing = await findByExternalId(executor, tenantId, item.external_id);
    if (existing) {
      return existing;
    }
  }

  const inserted = await executor
    .insertInto('bank_transactions')
    .values({
      tenant_id: tenantId,
      external_id: item.external_id,
      posted_at: item.posted_at,
      amount: item.amount,
      currency: item.currency,
      description: item.description,
      created_at: new Date().toISOString(),
    })
    .onConflict((oc) => oc.columns(['tenant_id', 'external_id']).doNothing())
    .returningAll()
    .executeTakeFirst();

  if (inserted) {
    return inserted;
  }

  const winner = item.external_id
    ? await findByExternalId(executor, tenantId, item.external_id)
    : undefined;

  if (!winner) {
    throw AppError.persistence('Bank transaction insert was ignored and no existing row was found');
  }

  return winner;
}

// ============================================
// Import
// ============================================

interface InFlightImport {
  payloadHash: string;
  result: Promise<ImportResult>;
}

/**
 * Keyed imports currently running in this process, by `${tenantId}:${key}`.
 * A retry that arrives before the first attempt has recorded its key waits
 * for that attempt instead of importing the batch a second time.
 */
const inFlightImports = new Map<string, InFlightImport>();

async function insertBatch(
  tenantId: number,
  items: readonly ImportTransactionItem[]
): Promise<BankTransactionRow[]> {
  try {
    return await db.transaction().execute(async (trx) => {
      const rows: BankTransactionRow[] = [];
      for (const item of items) {
        rows.push(await insertOrReuse(trx, tenantId, item));
      }
      return rows;
    });
  } catch (error) {
    throw toPersistenceError(error, logger, 'import bank transactions');
  }
}

async function importWithKey(
  tenantId: number,
  key: string,
  payloadHash: string,
  items: readonly ImportTransactionItem[]
): Promise<ImportResult> {
  const record = await findRecord(tenantId, key);

  if (record) {
    if (record.payload_hash !== payloadHash) {
      throw AppError.conflict('Idempotency key reused with different payload');
    }

    const stored = decodeResult(record.result_data);
    const replay = stored ? await resolveTransactions(tenantId, stored.transactionIds) : null;

    if (replay) {
      logger.info('Replaying idempotent import', { tenantId, idempotencyKey: key });
      return { transactions: replay, replayed: true };
    }
  }

  const transactions = await insertBatch(tenantId, items);
  logger.info('Bank transactions imported', { tenantId, count: transactions.length });

  await storeResult(tenantId, key, payloadHash, {
    transactionIds: transactions.map((transaction) => transaction.id),
  });

  return { transactions, replayed: false };
}

/**
 * Joins an import already running under the same key.
 *
 * @returns null when that attempt failed, so the caller runs its own
 */
async function joinInFlight(
  tenantId: number,
  key: string,
  pending: InFlightImport,
  payloadHash: string
): Promise<ImportResult | null> {
  if (pending.payloadHash !== payloadHash) {
    throw AppError.conflict('Idempotency key reused with different payload');
  }

  try {
    const { transactions } = await pending.result;
    logger.info('Replaying concurrent idempotent import', { tenantId, idempotencyKey: key });
    return { transactions, replayed: true };
  } catch (error) {
    logger.warn('Concurrent import under the same key failed, retrying', {
      tenantId,
      idempotencyKey: key,
      error: errorMessage(error),
    });
    return null;
  }
}

/**
 * Imports a batch of bank transactions.
 *
 * With an idempotency key:
 * - stored hash differs: Conflict, nothing written
 * - stored hash matches and every stored id still exists: those rows,
 *   `replayed: true`, nothing written
 * - same key still being imported by another request: same hash waits for
 *   it and replays its rows, different hash is a Conflict
 * - otherwise: normal import, then the key is recorded
 *
 * All inserts of one call commit together. Recording the key happens after
 * the commit and its failure is only logged.
 */
export async function importTransactions(
  tenantId: number,
  items: readonly ImportTransactionItemInput[],
  idempotencyKey?: string | null
): Promise<ImportResult> {
  const normalized = validateInput(importTransactionsSchema, items);
  const key =
    idempotencyKey === undefined || idempotencyKey === null
      ? null
      : validateInput(idempotencyKeySchema, idempotencyKey);

  await requireTenant(tenantId);

  const payloadHash = hashImportPayload(normalized);

  if (!key) {
    const transactions = await insertBatch(tenantId, normalized);
    logger.info('Bank transactions imported', { tenantId, count: transactions.length });
    return { transactions, replayed: false };
  }

  const slot = `${tenantId}:${key}`;
  const pending = inFlightImports.get(slot);

  if (pending) {
    const joined = await joinInFlight(tenantId, key, pending, payloadHash);
    if (joined) {
      return joined;
    }
    return importTransactions(tenantId, normalized, key);
  }

  const result = importWithKey(tenantId, key, payloadHash, normalized);
  inFlightImports.set(slot, { payloadHash, result });

  try {
    return await result;
  } finally {
    inFlightImports.delete(slot);
  }
}

/**
 * Imports a CSV bank statement through the same idempotent path as JSON.
 *
 * Any unreadable row rejects the whole upload with a ValidationError naming
 * the row numbers; nothing is written in that case.
 */
export async function importTransactionsCsv(
  tenantId: number,
  content: Buffer | string,
  idempotencyKey?: string | null,
  options: CsvParseOptions = {}
): Promise<ImportResult> {
  let statement: ParsedStatement;

  try {
    statement = await parseBankStatement(content, options);
  } catch (error) {
    throw AppError.validation(`Invalid CSV file: ${errorMessage(error)}`);
  }

  if (statement.errors.length > 0) {
    const details = statement.errors
      .map(({ rowNumber, error }) => `row ${rowNumber}: ${error}`)
      .join('; ');
    throw AppError.validation(`Invalid CSV rows: ${details}`);
  }

  return importTransactions(tenantId, statement.items, idempotencyKey);
}

// ============================================
// Queries
// ============================================

export async function getTransaction(
  tenantId: number,
  transactionId: number
): Promise<BankTransactionRow> {
  await requireTenant(tenantId);

  const transaction = await db
    .selectFrom('bank_transactions')
    .selectAll()
    .where('tenant_id', '=', tenantId)
    .where('id', '=', transactionId)
    .executeTakeFirst();

  if (!transaction) {
    throw AppError.notFound(`Bank transaction not found: ${transactionId}`);
  }

  return transaction;
}

/**
 * Lists transactions, most recently posted first.
 */
export async function listTransactions(
  tenantId: number,
  { page, limit }: PageRequest
): Promise<{ transactions: BankTransactionRow[]; total: number }> {
  await requireTenant(tenantId);

  const [transactions, count] = await Promise.all([
    db
      .selectFrom('bank_transactions')
      .selectAll()
      .where('tenant_id', '=', tenantId)
      .orderBy('posted_at', 'desc')
      .orderBy('id', 'desc')
      .limit(limit)
      .offset((page - 1) * limit)
      .execute(),
    db
      .selectFrom('bank_transactions')
      .where('tenant_id', '=', tenantId)
      .select((eb) => eb.fn.countAll<number>().as('total'))
      .executeTakeFirstOrThrow(),
  ]);

  return { transactions, total: Number(count.total) };
}

// ============================================
// Export Service Object
// ============================================

export const bankTransactionService = {
  importTransactions,
  importTransactionsCsv,
  insertOrReuse,
  hashImportPayload,
  getTransaction,
  listTransactions,
};

export default bankTransactionService;
