import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import { env } from '../config';
import type { DatabaseSchema } from '../db/schema';
import { migrateToLatest } from '../db/migrate';
import logger from './logger';

export type DB = Kysely<DatabaseSchema>;

// Create Kysely client over a better-sqlite3 connection
const createDatabase = (databaseUrl: string): DB => {
  if (databaseUrl !== ':memory:') {
    const dataDir = dirname(databaseUrl);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(databaseUrl);
  sqlite.pragma('foreign_keys = ON');
  if (databaseUrl !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  return new Kysely<DatabaseSchema>({
    dialect: new SqliteDialect({ database: sqlite }),
  });
};

// Single shared client for the process
export const db: DB = createDatabase(env.DATABASE_URL);

/**
 * Connect to database and bring the schema up to date
 */
export const connectDatabase = async (): Promise<void> => {
  try {
    await migrateToLatest(db);
    logger.info(`📦 Database ready (${env.DATABASE_URL})`);
  } catch (error) {
    logger.error('❌ Database initialisation failed', { error });
    throw error;
  }
};

/**
 * Disconnect from database
 */
export const disconnectDatabase = async (): Promise<void> => {
  try {
    await db.destroy();
    logger.info('📦 Database disconnected');
  } catch (error) {
    logger.error('❌ Database disconnect failed', { error });
    throw error;
  }
};

export default db;
