export { healthController, HealthController } from './health.controller';
export { tenantController, TenantController } from './tenant.controller';
export { invoiceController, InvoiceController } from './invoice.controller';
export {
  bankTransactionController,
  BankTransactionController,
  IDEMPOTENCY_HEADER,
} from './bankTransaction.controller';
export { reconciliationController, ReconciliationController } from './reconciliation.controller';
