/**
 * Invoice Service
 *
 * Invoices enter as OPEN and only leave that state through match
 * confirmation. Nothing here transitions an invoice to PAID.
 */

import { sql } from 'kysely';
import { db, AppError, getLogger } from '../utils';
import { isUniqueViolation, toPersistenceError } from '../db/errors';
import type { InvoiceRow } from '../db/schema';
import {
  createInvoiceSchema,
  listInvoicesQuerySchema,
  type CreateInvoiceInput,
  type ListInvoicesQuery,
} from '../schemas';
import { validateInput } from '../utils/validation';
import { requireTenant } from './tenant.service';
import { requireVendor } from './vendor.service';

const logger = getLogger('InvoiceService');

// ============================================
// Types
// ============================================

export type InvoiceFilters = Partial<ListInvoicesQuery>;

export interface InvoicePage {
  invoices: InvoiceRow[];
  total: number;
  page: number;
  limit: number;
}

// ============================================
// Commands
// ============================================

/**
 * Creates an OPEN invoice.
 *
 * @throws NotFound when vendor_id does not belong to the tenant
 * @throws Conflict when invoice_number is already used by the tenant
 */
export async function createInvoice(
  tenantId: number,
  input: CreateInvoiceInput
): Promise<InvoiceRow> {
  const data = validateInput(createInvoiceSchema, input);
  await requireTenant(tenantId);

  if (data.vendor_id !== null) {
    await requireVendor(tenantId, data.vendor_id);
  }

  try {
    const invoice = await db
      .insertInto('invoices')
      .values({
        tenant_id: tenantId,
        vendor_id: data.vendor_id,
        invoice_number: data.invoice_number,
        amount: data.amount,
        currency: data.currency,
        invoice_date: data.invoice_date,
        description: data.description,
        status: 'open',
        created_at: new Date().toISOString(),
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    logger.debug('Invoice created', { tenantId, invoiceId: invoice.id });
    return invoice;
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw AppError.conflict(`Invoice number already exists: ${data.invoice_number ?? ''}`);
    }
    throw toPersistenceError(error, logger, 'create invoice');
  }
}

/**
 * Deletes an invoice that has never been part of a match.
 *
 * Match rows are never removed as a side effect, so an invoice with any
 * match (proposed, confirmed or rejected) is refused with Conflict.
 */
export async function deleteInvoice(tenantId: number, invoiceId: number): Promise<void> {
  await getInvoice(tenantId, invoiceId);

  const match = await db
    .selectFrom('matches')
    .select('id')
    .where('tenant_id', '=', tenantId)
    .where('invoice_id', '=', invoiceId)
    .executeTakeFirst();

  if (match) {
    throw AppError.conflict(`Invoice ${invoiceId} has matches and cannot be deleted`);
  }

  try {
    await db
      .deleteFrom('invoices')
      .where('tenant_id', '=', tenantId)
      .where('id', '=', invoiceId)
      .execute();
  } catch (error) {
    throw toPersistenceError(error, logger, 'delete invoice');
  }
}

// ============================================
// Queries
// ============================================

export async function getInvoice(tenantId: number, invoiceId: number): Promise<InvoiceRow> {
  await requireTenant(tenantId);

  const invoice = await db
    .selectFrom('invoices')
    .selectAll()
    .where('tenant_id', '=', tenantId)
    .where('id', '=', invoiceId)
    .executeTakeFirst();

  if (!invoice) {
    throw AppError.notFound(`Invoice not found: ${invoiceId}`);
  }

  return invoice;
}

/**
 * Lists invoices newest first.
 *
 * Filters combine with AND. Date bounds are inclusive and compare against
 * invoice_date; amount bounds are inclusive.
 */
export async function listInvoices(
  tenantId: number,
  filters: InvoiceFilters = {}
): Promise<InvoicePage> {
  const { page, limit, status, vendor_id, date_from, date_to, amount_min, amount_max } =
    validateInput(listInvoicesQuerySchema, filters);
  await requireTenant(tenantId);

  let query = db.selectFrom('invoices').where('tenant_id', '=', tenantId);

  if (status) {
    query = query.where('status', '=', status);
  }
  if (vendor_id !== undefined) {
    query = query.where('vendor_id', '=', vendor_id);
  }
  if (date_from) {
    query = query.where('invoice_date', '>=', date_from);
  }
  if (date_to) {
    query = query.where('invoice_date', '<=', date_to);
  }
  if (amount_min) {
    query = query.where(sql<number>`cast(amount as real)`, '>=', Number(amount_min));
  }
  if (amount_max) {
    query = query.where(sql<number>`cast(amount as real)`, '<=', Number(amount_max));
  }

  const [invoices, count] = await Promise.all([
    query
      .selectAll()
      .orderBy('created_at', 'desc')
      .orderBy('id', 'desc')
      .limit(limit)
      .offset((page - 1) * limit)
      .execute(),
    query.select((eb) => eb.fn.countAll<number>().as('total')).executeTakeFirstOrThrow(),
  ]);

  return { invoices, total: Number(count.total), page, limit };
}

// ============================================
// Export Service Object
// ============================================

export const invoiceService = {
  createInvoice,
  deleteInvoice,
  getInvoice,
  listInvoices,
};

export default invoiceService;
