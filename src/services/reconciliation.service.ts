/**
 * Reconciliation Service
 *
 * Orchestrates the matching engine against stored data and owns the match
 * lifecycle.
 *
 * RULES:
 * - Only OPEN invoices are considered
 * - Transactions with a CONFIRMED match are excluded; PROPOSED or unmatched
 *   transactions stay eligible
 * - Pairs with different currencies are never scored
 * - At most one proposal per invoice per run; a transaction may be proposed
 *   for several invoices
 * - Re-running never duplicates a (tenant, invoice, transaction) proposal
 *
 * STATE TRANSITIONS:
 * - match: PROPOSED → CONFIRMED (single use)
 * - invoice: OPEN → MATCHED, in the same unit of work as the match
 */

import { Decimal } from 'decimal.js';
import { db, AppError, getLogger, type DB } from '../utils';
import { toPersistenceError } from '../db/errors';
import {
  MATCH_STATUSES,
  type BankTransactionRow,
  type InvoiceRow,
  type InvoiceStatus,
  type MatchRow,
  type MatchStatus,
} from '../db/schema';
import { scoreMatch, selectBestCandidates } from '../matching';
import type { ScoringInvoice, ScoringTransaction } from '../matching';
import { formatMoney } from '../utils/money';
import { requireTenant } from './tenant.service';
import { getInvoice } from './invoice.service';
import { getTransaction } from './bankTransaction.service';
import { explanationService, type ExplanationService } from './explanation.service';

const logger = getLogger('ReconciliationService');

// ============================================
// Types
// ============================================

export interface ReconciliationCandidate {
  invoice_id: number;
  transaction_id: number;
  /** 2-decimal string, e.g. "65.00" */
  score: string;
  reason: string;
}

export interface ReconciliationSummary {
  candidates: ReconciliationCandidate[];
  total_invoices: number;
  total_transactions: number;
  matches_found: number;
}

export interface MatchExplanation {
  invoice_id: number;
  transaction_id: number;
  score: string;
  explanation: string;
}

type InvoiceWithVendor = InvoiceRow & { vendor_name: string | null };

// ============================================
// State Transitions
// ============================================

function assertNever(value: never): never {
  throw AppError.internal(`Unhandled status: ${String(value)}`);
}

/**
 * Whether a match in this status may be confirmed
 */
export function isConfirmable(status: MatchStatus): boolean {
  switch (status) {
    case 'proposed':
      return true;
    case 'confirmed':
    case 'rejected':
      return false;
    default:
      return assertNever(status);
  }
}

const CONFIRMABLE_MATCH_STATUSES: MatchStatus[] = MATCH_STATUSES.filter(isConfirmable);

/**
 * Invoice status after one of its matches is confirmed
 *
 * @throws Conflict for a PAID invoice, which is settled outside this service
 */
export function invoiceStatusAfterConfirmation(current: InvoiceStatus): InvoiceStatus {
  switch (current) {
    case 'open':
    case 'matched':
      return 'matched';
    case 'paid':
      throw AppError.conflict('Invoice is already paid');
    default:
      return assertNever(current);
  }
}

// ============================================
// Mapping to the matching engine
// ============================================

export function toScoringInvoice(invoice: InvoiceWithVendor): ScoringInvoice {
  return {
    id: invoice.id,
    amount: new Decimal(invoice.amount),
    currency: invoice.currency,
    invoiceDate: invoice.invoice_date ? new Date(invoice.invoice_date) : null,
    invoiceNumber: invoice.invoice_number,
    description: invoice.description,
    vendorName: invoice.vendor_name,
  };
}

export function toScoringTransaction(transaction: BankTransactionRow): ScoringTransaction {
  return {
    id: transaction.id,
    amount: new Decimal(transaction.amount),
    currency: transaction.currency,
    postedAt: new Date(transaction.posted_at),
    description: transaction.description,
  };
}

// ============================================
// Candidate sources
// ============================================

async function getOpenInvoices(tenantId: number): Promise<InvoiceWithVendor[]> {
  return db
    .selectFrom('invoices')
    .leftJoin('vendors', 'vendors.id', 'invoices.vendor_id')
    .selectAll('invoices')
    .select('vendors.name as vendor_name')
    .where('invoices.tenant_id', '=', tenantId)
    .where('invoices.status', '=', 'open')
    .orderBy('invoices.id', 'asc')
    .execute();
}

/**
 * Transactions without a CONFIRMED match, by id ascending. The order makes
 * ties resolve to the lowest transaction id.
 */
async function getUnmatchedTransactions(tenantId: number): Promise<BankTransactionRow[]> {
  return db
    .selectFrom('bank_transactions')
    .selectAll()
    .where('tenant_id', '=', tenantId)
    .where(({ not, exists, selectFrom }) =>
      not(
        exists(
          selectFrom('matches')
            .select('matches.id')
            .whereRef('matches.bank_transaction_id', '=', 'bank_transactions.id')
            .where('matches.tenant_id', '=', tenantId)
            .where('matches.status', '=', 'confirmed')
        )
      )
    )
    .orderBy('id', 'asc')
    .execute();
}

// ============================================
// Reconcile
// ============================================

/**
 * Scores open invoices against unmatched transactions and stores the best
 * candidate per invoice as a PROPOSED match.
 *
 * Candidates already proposed in earlier runs are returned again but not
 * re-inserted. A concurrent run inserting the same pair is ignored by the
 * unique index.
 */
export async function reconcile(tenantId: number): Promise<ReconciliationSummary> {
  await requireTenant(tenantId);

  const [invoices, transactions] = await Promise.all([
    getOpenInvoices(tenantId),
    getUnmatchedTransactions(tenantId),
  ]);

  const best = selectBestCandidates(
    invoices.map(toScoringInvoice),
    transactions.map(toScoringTransaction)
  );

  const candidates: ReconciliationCandidate[] = best.map((candidate) => ({
    invoice_id: candidate.invoiceId,
    transaction_id: candidate.transactionId,
    score: formatMoney(candidate.score),
    reason: candidate.reason,
  }));

  let inserted = 0;

  try {
    inserted = await db.transaction().execute(async (trx) => proposeMatches(trx, tenantId, candidates));
  } catch (error) {
    throw toPersistenceError(error, logger, 'store proposed matches');
  }

  logger.info('Reconciliation completed', {
    tenantId,
    invoices: invoices.length,
    transactions: transactions.length,
    candidates: candidates.length,
    newProposals: inserted,
  });

  return {
    candidates,
    total_invoices: invoices.length,
    total_transactions: transactions.length,
    matches_found: candidates.length,
  };
}

/**
 * @returns Number of proposals actually inserted
 */
async function proposeMatches(
  executor: DB,
  tenantId: number,
  candidates: readonly ReconciliationCandidate[]
): Promise<number> {
  let inserted = 0;
  const createdAt = new Date().toISOString();

  for (const candidate of candidates) {
    const row = await executor
      .insertInto('matches')
      .values({
        tenant_id: tenantId,
        invoice_id: candidate.invoice_id,
        bank_transaction_id: candidate.transaction_id,
        score: candidate.score,
        status: 'proposed',
        created_at: createdAt,
      })
      .onConflict((oc) =>
        oc.columns(['tenant_id', 'invoice_id', 'bank_transaction_id']).doNothing()
      )
      .returning('id')
      .executeTakeFirst();

    if (row) {
      inserted += 1;
    }
  }

  return inserted;
}

// ============================================
// Match Lifecycle
// ============================================

export async function listMatches(tenantId: number, status?: MatchStatus): Promise<MatchRow[]> {
  await requireTenant(tenantId);

  let query = db.selectFrom('matches').selectAll().where('tenant_id', '=', tenantId);

  if (status) {
    query = query.where('status', '=', status);
  }

  return query.orderBy('id', 'asc').execute();
}

/**
 * Confirms a PROPOSED match and marks its invoice MATCHED, atomically.
 *
 * The status check is part of the UPDATE itself, so of two concurrent
 * confirmations only one changes a row.
 *
 * @throws NotFound when no PROPOSED match with this id exists for the tenant
 */
export async function confirmMatch(tenantId: number, matchId: number): Promise<MatchRow> {
  await requireTenant(tenantId);

  try {
    const match = await db.transaction().execute(async (trx) => {
      const confirmed = await trx
        .updateTable('matches')
        .set({ status: 'confirmed' })
        .where('id', '=', matchId)
        .where('tenant_id', '=', tenantId)
        .where('status', 'in', CONFIRMABLE_MATCH_STATUSES)
        .returningAll()
        .executeTakeFirst();

      if (!confirmed) {
        throw AppError.notFound('Match not found or already processed');
      }

      const invoice = await trx
        .selectFrom('invoices')
        .select(['id', 'status'])
        .where('id', '=', confirmed.invoice_id)
        .where('tenant_id', '=', tenantId)
        .executeTakeFirst();

      if (!invoice) {
        throw AppError.notFound(`Invoice not found: ${confirmed.invoice_id}`);
      }

      await trx
        .updateTable('invoices')
        .set({ status: invoiceStatusAfterConfirmation(invoice.status) })
        .where('id', '=', invoice.id)
        .where('tenant_id', '=', tenantId)
        .execute();

      return confirmed;
    });

    logger.info('Match confirmed', { tenantId, matchId, invoiceId: match.invoice_id });
    return match;
  } catch (error) {
    throw toPersistenceError(error, logger, 'confirm match');
  }
}

// ============================================
// Explanation
// ============================================

/**
 * Scores one pair on demand and explains the result.
 *
 * @throws ValidationError when the currencies differ, since such pairs are never scored
 */
export async function explainMatch(
  tenantId: number,
  invoiceId: number,
  transactionId: number,
  explainer: ExplanationService = explanationService
): Promise<MatchExplanation> {
  const invoice = await getInvoice(tenantId, invoiceId);
  const transaction = await getTransaction(tenantId, transactionId);

  if (invoice.currency !== transaction.currency) {
    throw AppError.validation(
      `Currency mismatch: invoice is ${invoice.currency}, transaction is ${transaction.currency}`
    );
  }

  const vendor =
    invoice.vendor_id === null
      ? undefined
      : await db
          .selectFrom('vendors')
          .select('name')
          .where('id', '=', invoice.vendor_id)
          .where('tenant_id', '=', tenantId)
          .executeTakeFirst();
  const vendorName = vendor?.name ?? null;

  const { score, reason } = scoreMatch(
    toScoringInvoice({ ...invoice, vendor_name: vendorName }),
    toScoringTransaction(transaction)
  );
  const formattedScore = formatMoney(score);

  const explanation = await explainer.explain({
    invoice,
    vendorName,
    transaction,
    score: formattedScore,
    reason,
  });

  return {
    invoice_id: invoice.id,
    transaction_id: transaction.id,
    score: formattedScore,
    explanation,
  };
}

// ============================================
// Export Service Object
// ============================================

export const reconciliationService = {
  reconcile,
  listMatches,
  confirmMatch,
  explainMatch,
};

export default reconciliationService;
