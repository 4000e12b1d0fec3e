/**
 * Jest setup file
 * Each test file gets its own in-memory database, migrated once and
 * emptied before every test.
 */

import { db, disconnectDatabase } from '../src/utils';
import { migrateToLatest } from '../src/db/migrate';

// Global test timeout
jest.setTimeout(30000);

beforeAll(async () => {
  await migrateToLatest(db);
});

beforeEach(async () => {
  // Children first so foreign keys hold
  await db.deleteFrom('matches').execute();
  await db.deleteFrom('idempotency_records').execute();
  await db.deleteFrom('bank_transactions').execute();
  await db.deleteFrom('invoices').execute();
  await db.deleteFrom('vendors').execute();
  await db.deleteFrom('tenants').execute();
});

// Clean up after all tests
afterAll(async () => {
  await disconnectDatabase();
});
