import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('tenants')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();

  // Case-sensitive: SQLite's default BINARY collation
  await db.schema.createIndex('uq_tenant_name').on('tenants').column('name').unique().execute();

  await db.schema
    .createTable('vendors')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('tenant_id', 'integer', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade')
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('uq_tenant_vendor_name')
    .on('vendors')
    .columns(['tenant_id', 'name'])
    .unique()
    .execute();

  await db.schema
    .createTable('invoices')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('tenant_id', 'integer', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade')
    )
    .addColumn('vendor_id', 'integer', (col) => col.references('vendors.id').onDelete('set null'))
    .addColumn('invoice_number', 'text')
    .addColumn('amount', 'text', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('invoice_date', 'text')
    .addColumn('description', 'text')
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('open'))
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();

  // NULL invoice numbers are distinct, so unnumbered invoices never collide
  await db.schema
    .createIndex('uq_tenant_invoice_number')
    .on('invoices')
    .columns(['tenant_id', 'invoice_number'])
    .unique()
    .execute();

  await db.schema
    .createIndex('idx_invoices_tenant_status')
    .on('invoices')
    .columns(['tenant_id', 'status'])
    .execute();

  await db.schema
    .createTable('bank_transactions')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('tenant_id', 'integer', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade')
    )
    .addColumn('external_id', 'text')
    .addColumn('posted_at', 'text', (col) => col.notNull())
    .addColumn('amount', 'text', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('uq_tenant_external_id')
    .on('bank_transactions')
    .columns(['tenant_id', 'external_id'])
    .unique()
    .execute();

  await db.schema
    .createTable('matches')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('tenant_id', 'integer', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade')
    )
    .addColumn('invoice_id', 'integer', (col) => col.notNull().references('invoices.id'))
    .addColumn('bank_transaction_id', 'integer', (col) =>
      col.notNull().references('bank_transactions.id')
    )
    .addColumn('score', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('proposed'))
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('uq_tenant_invoice_transaction')
    .on('matches')
    .columns(['tenant_id', 'invoice_id', 'bank_transaction_id'])
    .unique()
    .execute();

  await db.schema
    .createIndex('idx_matches_tenant_status')
    .on('matches')
    .columns(['tenant_id', 'status'])
    .execute();

  await db.schema
    .createTable('idempotency_records')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('tenant_id', 'integer', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade')
    )
    .addColumn('idempotency_key', 'text', (col) => col.notNull())
    .addColumn('payload_hash', 'text', (col) => col.notNull())
    .addColumn('result_data', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('uq_tenant_idempotency_key')
    .on('idempotency_records')
    .columns(['tenant_id', 'idempotency_key'])
    .unique()
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('idempotency_records').ifExists().execute();
  await db.schema.dropTable('matches').ifExists().execute();
  await db.schema.dropTable('bank_transactions').ifExists().execute();
  await db.schema.dropTable('invoices').ifExists().execute();
  await db.schema.dropTable('vendors').ifExists().execute();
  await db.schema.dropTable('tenants').ifExists().execute();
}
