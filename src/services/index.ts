export { healthService, HealthService } from './health.service';
export { tenantService } from './tenant.service';
export * from './tenant.service';
export { vendorService } from './vendor.service';
export * from './vendor.service';
export { invoiceService } from './invoice.service';
export * from './invoice.service';
export { idempotencyService } from './idempotency.service';
export * from './idempotency.service';
export { bankTransactionService } from './bankTransaction.service';
export * from './bankTransaction.service';
export { reconciliationService } from './reconciliation.service';
export * from './reconciliation.service';
export { explanationService, ExplanationService } from './explanation.service';
export * from './explanation.service';
