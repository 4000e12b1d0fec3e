/**
 * Test data builders
 */

import { Decimal } from 'decimal.js';
import { createTenant } from '../../src/services/tenant.service';
import { createVendor } from '../../src/services/vendor.service';
import { createInvoice } from '../../src/services/invoice.service';
import { importTransactions } from '../../src/services/bankTransaction.service';
import type { CreateInvoiceInput, ImportTransactionItemInput } from '../../src/schemas';
import type { BankTransactionRow, InvoiceRow, TenantRow, VendorRow } from '../../src/db/schema';
import type { ScoringInvoice, ScoringTransaction } from '../../src/matching';

let tenantCounter = 0;

export async function givenTenant(name?: string): Promise<TenantRow> {
  tenantCounter += 1;
  return createTenant({ name: name ?? `Tenant ${tenantCounter}` });
}

export async function givenVendor(tenantId: number, name = 'Acme Supplies'): Promise<VendorRow> {
  return createVendor(tenantId, { name });
}

export async function givenInvoice(
  tenantId: number,
  overrides: Partial<CreateInvoiceInput> = {}
): Promise<InvoiceRow> {
  return createInvoice(tenantId, {
    amount: '100.00',
    currency: 'USD',
    invoice_date: '2024-03-10',
    ...overrides,
  });
}

export function transactionItem(
  overrides: Partial<ImportTransactionItemInput> = {}
): ImportTransactionItemInput {
  return {
    posted_at: '2024-03-10',
    amount: '100.00',
    currency: 'USD',
    ...overrides,
  };
}

export async function givenTransaction(
  tenantId: number,
  overrides: Partial<ImportTransactionItemInput> = {}
): Promise<BankTransactionRow> {
  const { transactions } = await importTransactions(tenantId, [transactionItem(overrides)]);
  return transactions[0];
}

export function scoringInvoice(overrides: Partial<ScoringInvoice> = {}): ScoringInvoice {
  return {
    id: 1,
    amount: new Decimal('100.00'),
    currency: 'USD',
    invoiceDate: new Date('2024-03-10T00:00:00Z'),
    invoiceNumber: null,
    description: null,
    vendorName: null,
    ...overrides,
  };
}

export function scoringTransaction(
  overrides: Partial<ScoringTransaction> = {}
): ScoringTransaction {
  return {
    id: 1,
    amount: new Decimal('100.00'),
    currency: 'USD',
    postedAt: new Date('2024-03-10T00:00:00Z'),
    description: null,
    ...overrides,
  };
}
