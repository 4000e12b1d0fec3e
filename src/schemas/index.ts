export * from './common.schema';
export * from './tenant.schema';
export * from './invoice.schema';
export * from './bankTransaction.schema';
export * from './reconciliation.schema';
