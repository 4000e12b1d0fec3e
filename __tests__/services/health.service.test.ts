import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import { HealthService } from '../../src/services/health.service';
import { migrateToLatest } from '../../src/db/migrate';
import type { DatabaseSchema } from '../../src/db/schema';

const openDatabase = (): Kysely<DatabaseSchema> =>
  new Kysely<DatabaseSchema>({
    dialect: new SqliteDialect({ database: new Database(':memory:') }),
  });

describe('HealthService', () => {
  it('should be ready once every migration is applied', async () => {
    const database = openDatabase();
    await migrateToLatest(database);

    try {
      const report = await new HealthService(database).checkReadiness();

      expect(report).toEqual({
        ready: true,
        checks: { server: true, database: true, migrations: true },
        pendingMigrations: [],
      });
    } finally {
      await database.destroy();
    }
  });

  it('should list migrations not yet applied', async () => {
    const database = openDatabase();

    try {
      const report = await new HealthService(database).checkReadiness();

      expect(report).toEqual({
        ready: false,
        checks: { server: true, database: true, migrations: false },
        pendingMigrations: ['001_initial_schema'],
      });
    } finally {
      await database.destroy();
    }
  });

  it('should not be ready when the database is closed', async () => {
    const database = openDatabase();
    await database.destroy();

    const report = await new HealthService(database).checkReadiness();

    expect(report.ready).toBe(false);
    expect(report.checks).toEqual({ server: true, database: false, migrations: false });
  });

  it('should describe the running process', async () => {
    const database = openDatabase();
    const status = new HealthService(database).getHealthStatus();
    await database.destroy();

    expect(status).toMatchObject({ status: 'healthy', environment: 'test', uptime: 0 });
  });
});
