import type { Migration } from 'kysely';
import * as initialSchema from './001_initial_schema';

/**
 * Registered migrations, keyed by name. Applied in key order.
 */
export const migrations: Record<string, Migration> = {
  '001_initial_schema': initialSchema,
};
