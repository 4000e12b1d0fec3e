import { HealthCheckResponse, ReadinessReport } from '../types';
import { env } from '../config';
import { sql } from 'kysely';
import { db, getLogger, type DB } from '../utils';
import { errorMessage } from '../db/errors';
import { listPendingMigrations } from '../db/migrate';

const logger = getLogger('HealthService');

/**
 * Liveness and readiness of the API process and its SQLite store.
 *
 * Ready means the database answers and every registered migration has been
 * applied; a half-migrated schema would fail the first write instead.
 */
export class HealthService {
  private readonly startTime = Date.now();
  private readonly version = process.env.npm_package_version ?? '1.0.0';

  constructor(private readonly database: DB = db) {}

  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  async checkReadiness(): Promise<ReadinessReport> {
    const database = await this.databaseAnswers();
    const pendingMigrations = database ? await this.pendingMigrations() : null;

    const checks = {
      server: true,
      database,
      migrations: pendingMigrations !== null && pendingMigrations.length === 0,
    };

    return {
      ready: Object.values(checks).every(Boolean),
      checks,
      pendingMigrations: pendingMigrations ?? [],
    };
  }

  private async databaseAnswers(): Promise<boolean> {
    try {
      await sql`SELECT 1`.execute(this.database);
      return true;
    } catch (error) {
      logger.warn('Database health probe failed', { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * @returns null when the migration table cannot be read
   */
  private async pendingMigrations(): Promise<string[] | null> {
    try {
      return await listPendingMigrations(this.database);
    } catch (error) {
      logger.warn('Migration state unavailable', { error: errorMessage(error) });
      return null;
    }
  }
}

export const healthService = new HealthService();

export default healthService;
