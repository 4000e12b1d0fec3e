/**
 * Tests for Tenant and Vendor Services
 */

import { createTenant, getTenant, listTenants, requireTenant } from '../../src/services/tenant.service';
import { createVendor, listVendors, requireVendor } from '../../src/services/vendor.service';

describe('Tenant Service', () => {
  describe('createTenant', () => {
    it('should trim and store the name', async () => {
      const tenant = await createTenant({ name: '  Northwind  ' });

      expect(tenant.id).toEqual(expect.any(Number));
      expect(tenant.name).toBe('Northwind');
      expect(tenant.created_at).toEqual(expect.any(String));
    });

    it('should reject a duplicate name with Conflict', async () => {
      await createTenant({ name: 'Northwind' });

      await expect(createTenant({ name: 'Northwind' })).rejects.toMatchObject({
        statusCode: 409,
        code: 'CONFLICT',
      });
    });

    it('should compare names case-sensitively', async () => {
      await createTenant({ name: 'Northwind' });

      await expect(createTenant({ name: 'northwind' })).resolves.toMatchObject({
        name: 'northwind',
      });
    });

    it('should reject a blank name before touching storage', async () => {
      await expect(createTenant({ name: '   ' })).rejects.toMatchObject({
        statusCode: 400,
        code: 'VALIDATION_ERROR',
      });
    });
  });

  describe('getTenant / requireTenant', () => {
    it('should return an existing tenant', async () => {
      const created = await createTenant({ name: 'Contoso' });

      await expect(getTenant(created.id)).resolves.toEqual(created);
    });

    it('should fail with NotFound for an unknown id', async () => {
      await expect(requireTenant(999)).rejects.toMatchObject({
        statusCode: 404,
        message: 'Tenant not found: 999',
      });
    });
  });

  describe('listTenants', () => {
    it('should paginate in id order', async () => {
      await createTenant({ name: 'A' });
      const second = await createTenant({ name: 'B' });
      await createTenant({ name: 'C' });

      const { tenants, total } = await listTenants({ page: 2, limit: 1 });

      expect(total).toBe(3);
      expect(tenants).toEqual([second]);
    });
  });
});

describe('Vendor Service', () => {
  it('should create and list vendors for a tenant', async () => {
    const tenant = await createTenant({ name: 'Contoso' });
    await createVendor(tenant.id, { name: 'Zeta Parts' });
    await createVendor(tenant.id, { name: 'Acme Supplies' });

    const vendors = await listVendors(tenant.id);

    expect(vendors.map((vendor) => vendor.name)).toEqual(['Acme Supplies', 'Zeta Parts']);
  });

  it('should reject a duplicate vendor name within a tenant', async () => {
    const tenant = await createTenant({ name: 'Contoso' });
    await createVendor(tenant.id, { name: 'Acme' });

    await expect(createVendor(tenant.id, { name: 'Acme' })).rejects.toMatchObject({
      statusCode: 409,
    });
  });

  it('should allow the same vendor name in another tenant', async () => {
    const first = await createTenant({ name: 'Contoso' });
    const second = await createTenant({ name: 'Fabrikam' });
    await createVendor(first.id, { name: 'Acme' });

    await expect(createVendor(second.id, { name: 'Acme' })).resolves.toMatchObject({
      tenant_id: second.id,
    });
  });

  it('should not resolve another tenant’s vendor', async () => {
    const first = await createTenant({ name: 'Contoso' });
    const second = await createTenant({ name: 'Fabrikam' });
    const vendor = await createVendor(first.id, { name: 'Acme' });

    await expect(requireVendor(second.id, vendor.id)).rejects.toMatchObject({ statusCode: 404 });
  });

  it('should fail for an unknown tenant', async () => {
    await expect(createVendor(404, { name: 'Acme' })).rejects.toMatchObject({ statusCode: 404 });
  });
});
