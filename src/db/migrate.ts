import { Migrator, type Kysely } from 'kysely';
import { getLogger } from '../utils/logger';
import { migrations } from './migrations';
import type { DatabaseSchema } from './schema';

const logger = getLogger('Migrations');

/**
 * Applies every pending migration.
 *
 * Uses a programmatic provider so the same code path works from compiled
 * output, ts-jest and tsx without dynamic imports.
 */
const createMigrator = (db: Kysely<DatabaseSchema>): Migrator =>
  new Migrator({
    db,
    provider: { getMigrations: () => Promise.resolve(migrations) },
  });

export async function migrateToLatest(db: Kysely<DatabaseSchema>): Promise<void> {
  const migrator = createMigrator(db);

  const { error, results } = await migrator.migrateToLatest();

  for (const result of results ?? []) {
    if (result.status === 'Success') {
      logger.debug(`Migration "${result.migrationName}" executed successfully`);
    } else if (result.status === 'Error') {
      logger.error(`Migration "${result.migrationName}" failed`);
    }
  }

  if (error) {
    throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
  }
}

/**
 * Names of known migrations not yet applied to this database
 */
export async function listPendingMigrations(db: Kysely<DatabaseSchema>): Promise<string[]> {
  const known = await createMigrator(db).getMigrations();
  return known.filter((migration) => migration.executedAt === undefined).map((migration) => migration.name);
}
