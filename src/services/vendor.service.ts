/**
 * Vendor Service
 *
 * Vendor names feed the text-similarity term of the match scorer.
 */

import { db, AppError, getLogger } from '../utils';
import { isUniqueViolation, toPersistenceError } from '../db/errors';
import type { VendorRow } from '../db/schema';
import { createVendorSchema, type CreateVendorInput } from '../schemas';
import { validateInput } from '../utils/validation';
import { requireTenant } from './tenant.service';

const logger = getLogger('VendorService');

export async function createVendor(tenantId: number, input: CreateVendorInput): Promise<VendorRow> {
  const { name } = validateInput(createVendorSchema, input);
  await requireTenant(tenantId);

  try {
    return await db
      .insertInto('vendors')
      .values({ tenant_id: tenantId, name, created_at: new Date().toISOString() })
      .returningAll()
      .executeTakeFirstOrThrow();
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw AppError.conflict(`Vendor already exists: ${name}`);
    }
    throw toPersistenceError(error, logger, 'create vendor');
  }
}

export async function listVendors(tenantId: number): Promise<VendorRow[]> {
  await requireTenant(tenantId);

  return db
    .selectFrom('vendors')
    .selectAll()
    .where('tenant_id', '=', tenantId)
    .orderBy('name', 'asc')
    .execute();
}

/**
 * Loads a vendor owned by the tenant, or fails with NotFound.
 */
export async function requireVendor(tenantId: number, vendorId: number): Promise<VendorRow> {
  const vendor = await db
    .selectFrom('vendors')
    .selectAll()
    .where('tenant_id', '=', tenantId)
    .where('id', '=', vendorId)
    .executeTakeFirst();

  if (!vendor) {
    throw AppError.notFound(`Vendor not found: ${vendorId}`);
  }

  return vendor;
}

export const vendorService = {
  createVendor,
  listVendors,
  requireVendor,
};

export default vendorService;
