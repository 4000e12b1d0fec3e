/**
 * Database table definitions for the Kysely query builder.
 *
 * Monetary amounts and scores are fixed 2-decimal strings ("100.00"),
 * timestamps are ISO-8601 strings. Every tenant-owned table carries tenant_id.
 */

import type { Generated, Insertable, Selectable, Updateable } from 'kysely';

export const INVOICE_STATUSES = ['open', 'matched', 'paid'] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export const MATCH_STATUSES = ['proposed', 'confirmed', 'rejected'] as const;
export type MatchStatus = (typeof MATCH_STATUSES)[number];

export interface TenantsTable {
  id: Generated<number>;
  name: string;
  created_at: string;
}

export interface VendorsTable {
  id: Generated<number>;
  tenant_id: number;
  name: string;
  created_at: string;
}

export interface InvoicesTable {
  id: Generated<number>;
  tenant_id: number;
  vendor_id: number | null;
  invoice_number: string | null;
  amount: string;
  currency: string;
  invoice_date: string | null;
  description: string | null;
  status: InvoiceStatus;
  created_at: string;
}

export interface BankTransactionsTable {
  id: Generated<number>;
  tenant_id: number;
  external_id: string | null;
  posted_at: string;
  amount: string;
  currency: string;
  description: string | null;
  created_at: string;
}

export interface MatchesTable {
  id: Generated<number>;
  tenant_id: number;
  invoice_id: number;
  bank_transaction_id: number;
  score: string;
  status: MatchStatus;
  created_at: string;
}

export interface IdempotencyRecordsTable {
  id: Generated<number>;
  tenant_id: number;
  idempotency_key: string;
  payload_hash: string;
  /** JSON: { "transactionIds": number[] } */
  result_data: string | null;
  created_at: string;
}

export interface DatabaseSchema {
  tenants: TenantsTable;
  vendors: VendorsTable;
  invoices: InvoicesTable;
  bank_transactions: BankTransactionsTable;
  matches: MatchesTable;
  idempotency_records: IdempotencyRecordsTable;
}

export type TenantRow = Selectable<TenantsTable>;
export type VendorRow = Selectable<VendorsTable>;
export type InvoiceRow = Selectable<InvoicesTable>;
export type NewInvoiceRow = Insertable<InvoicesTable>;
export type BankTransactionRow = Selectable<BankTransactionsTable>;
export type NewBankTransactionRow = Insertable<BankTransactionsTable>;
export type MatchRow = Selectable<MatchesTable>;
export type MatchUpdate = Updateable<MatchesTable>;
export type IdempotencyRecordRow = Selectable<IdempotencyRecordsTable>;
