/**
 * Tenant Service
 *
 * Tenants are the isolation boundary: every other service calls
 * `requireTenant` before touching tenant-owned rows.
 */

import { db, AppError, getLogger, type PageRequest } from '../utils';
import { isUniqueViolation, toPersistenceError } from '../db/errors';
import type { TenantRow } from '../db/schema';
import { createTenantSchema, type CreateTenantInput } from '../schemas';
import { validateInput } from '../utils/validation';

const logger = getLogger('TenantService');

// ============================================
// Guard
// ============================================

/**
 * Loads a tenant or fails with NotFound.
 */
export async function requireTenant(tenantId: number): Promise<TenantRow> {
  const tenant = await db
    .selectFrom('tenants')
    .selectAll()
    .where('id', '=', tenantId)
    .executeTakeFirst();

  if (!tenant) {
    throw AppError.notFound(`Tenant not found: ${tenantId}`);
  }

  return tenant;
}

// ============================================
// CRUD
// ============================================

/**
 * Creates a tenant. Names are unique and compared case-sensitively.
 */
export async function createTenant(input: CreateTenantInput): Promise<TenantRow> {
  const { name } = validateInput(createTenantSchema, input);

  try {
    const tenant = await db
      .insertInto('tenants')
      .values({ name, created_at: new Date().toISOString() })
      .returningAll()
      .executeTakeFirstOrThrow();

    logger.info('Tenant created', { tenantId: tenant.id });
    return tenant;
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw AppError.conflict(`Tenant name already exists: ${name}`);
    }
    throw toPersistenceError(error, logger, 'create tenant');
  }
}

export async function getTenant(tenantId: number): Promise<TenantRow> {
  return requireTenant(tenantId);
}

export async function listTenants({
  page,
  limit,
}: PageRequest): Promise<{ tenants: TenantRow[]; total: number }> {
  const [tenants, count] = await Promise.all([
    db
      .selectFrom('tenants')
      .selectAll()
      .orderBy('id', 'asc')
      .limit(limit)
      .offset((page - 1) * limit)
      .execute(),
    db
      .selectFrom('tenants')
      .select((eb) => eb.fn.countAll<number>().as('total'))
      .executeTakeFirstOrThrow(),
  ]);

  return { tenants, total: Number(count.total) };
}

// ============================================
// Export Service Object
// ============================================

export const tenantService = {
  requireTenant,
  createTenant,
  getTenant,
  listTenants,
};

export default tenantService;
