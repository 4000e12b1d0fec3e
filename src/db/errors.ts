/**
 * Storage-layer error classification.
 *
 * better-sqlite3 raises SqliteError with an extended result code in `code`,
 * e.g. SQLITE_CONSTRAINT_UNIQUE for a violated unique index.
 */

import type { Logger } from 'winston';
import { AppError } from '../utils/AppError';

const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

const errorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export function isUniqueViolation(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && UNIQUE_VIOLATION_CODES.has(code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a storage failure onto the API error taxonomy. AppErrors raised
 * inside the unit of work pass through untouched.
 */
export function toPersistenceError(
  error: unknown,
  logger: Pick<Logger, 'error'>,
  action: string
): AppError {
  if (error instanceof AppError) {
    return error;
  }

  logger.error(`Failed to ${action}`, { error: errorMessage(error) });
  return AppError.persistence(`Failed to ${action}`);
}
