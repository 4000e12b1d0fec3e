/**
 * Tests for Invoice Service
 */

import { db } from '../../src/utils';
import {
  createInvoice,
  deleteInvoice,
  getInvoice,
  listInvoices,
} from '../../src/services/invoice.service';
import { givenInvoice, givenTenant, givenTransaction, givenVendor } from '../helpers/fixtures';

describe('Invoice Service', () => {
  // ============================================
  // createInvoice
  // ============================================
  describe('createInvoice', () => {
    it('should normalize and store an OPEN invoice', async () => {
      const tenant = await givenTenant();
      const vendor = await givenVendor(tenant.id);

      const invoice = await createInvoice(tenant.id, {
        vendor_id: vendor.id,
        invoice_number: ' INV-1001 ',
        amount: 250,
        currency: 'usd',
        invoice_date: '2024-03-10',
        description: 'March rent',
      });

      expect(invoice).toMatchObject({
        tenant_id: tenant.id,
        vendor_id: vendor.id,
        invoice_number: 'INV-1001',
        amount: '250.00',
        currency: 'USD',
        invoice_date: '2024-03-10T00:00:00.000Z',
        description: 'March rent',
        status: 'open',
      });
    });

    it('should accept an invoice with only amount and currency', async () => {
      const tenant = await givenTenant();

      const invoice = await createInvoice(tenant.id, { amount: '9.99', currency: 'EUR' });

      expect(invoice.vendor_id).toBeNull();
      expect(invoice.invoice_number).toBeNull();
      expect(invoice.invoice_date).toBeNull();
    });

    it('should reject a duplicate invoice number within the tenant', async () => {
      const tenant = await givenTenant();
      await givenInvoice(tenant.id, { invoice_number: 'INV-1' });

      await expect(givenInvoice(tenant.id, { invoice_number: 'INV-1' })).rejects.toMatchObject({
        statusCode: 409,
        message: 'Invoice number already exists: INV-1',
      });
    });

    it('should allow the same invoice number in another tenant', async () => {
      const first = await givenTenant();
      const second = await givenTenant();
      await givenInvoice(first.id, { invoice_number: 'INV-1' });

      await expect(givenInvoice(second.id, { invoice_number: 'INV-1' })).resolves.toMatchObject({
        tenant_id: second.id,
      });
    });

    it('should allow several invoices without a number', async () => {
      const tenant = await givenTenant();
      await givenInvoice(tenant.id);

      await expect(givenInvoice(tenant.id)).resolves.toMatchObject({ invoice_number: null });
    });

    it('should reject a vendor owned by another tenant', async () => {
      const first = await givenTenant();
      const second = await givenTenant();
      const vendor = await givenVendor(first.id);

      await expect(givenInvoice(second.id, { vendor_id: vendor.id })).rejects.toMatchObject({
        statusCode: 404,
      });
    });

    it.each([
      ['zero', '0'],
      ['negative', '-10.00'],
      ['three decimals', '10.005'],
      ['not a number', 'ten'],
    ])('should reject a %s amount', async (_label, amount) => {
      const tenant = await givenTenant();

      await expect(givenInvoice(tenant.id, { amount })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
    });

    it('should reject an unknown tenant', async () => {
      await expect(givenInvoice(12345)).rejects.toMatchObject({ statusCode: 404 });
    });
  });

  // ============================================
  // getInvoice / listInvoices
  // ============================================
  describe('getInvoice', () => {
    it('should not return another tenant’s invoice', async () => {
      const first = await givenTenant();
      const second = await givenTenant();
      const invoice = await givenInvoice(first.id);

      await expect(getInvoice(second.id, invoice.id)).rejects.toMatchObject({ statusCode: 404 });
    });
  });

  describe('listInvoices', () => {
    it('should list newest first with pagination', async () => {
      const tenant = await givenTenant();
      const a = await givenInvoice(tenant.id, { invoice_number: 'A' });
      const b = await givenInvoice(tenant.id, { invoice_number: 'B' });
      const c = await givenInvoice(tenant.id, { invoice_number: 'C' });

      const firstPage = await listInvoices(tenant.id, { page: 1, limit: 2 });
      const secondPage = await listInvoices(tenant.id, { page: 2, limit: 2 });

      expect(firstPage.total).toBe(3);
      expect(firstPage.invoices.map((invoice) => invoice.id)).toEqual([c.id, b.id]);
      expect(secondPage.invoices.map((invoice) => invoice.id)).toEqual([a.id]);
    });

    it('should filter by amount range and vendor', async () => {
      const tenant = await givenTenant();
      const vendor = await givenVendor(tenant.id);
      await givenInvoice(tenant.id, { amount: '50.00' });
      const mid = await givenInvoice(tenant.id, { amount: '150.00', vendor_id: vendor.id });
      await givenInvoice(tenant.id, { amount: '150.00' });
      await givenInvoice(tenant.id, { amount: '900.00', vendor_id: vendor.id });

      const { invoices } = await listInvoices(tenant.id, {
        amount_min: '100',
        amount_max: '500',
        vendor_id: vendor.id,
      });

      expect(invoices.map((invoice) => invoice.id)).toEqual([mid.id]);
    });

    it('should filter by status and date range', async () => {
      const tenant = await givenTenant();
      await givenInvoice(tenant.id, { invoice_date: '2024-01-05' });
      const inRange = await givenInvoice(tenant.id, { invoice_date: '2024-02-10' });
      const matched = await givenInvoice(tenant.id, { invoice_date: '2024-02-11' });
      await db.updateTable('invoices').set({ status: 'matched' }).where('id', '=', matched.id).execute();

      const { invoices, total } = await listInvoices(tenant.id, {
        status: 'open',
        date_from: '2024-02-01',
        date_to: '2024-02-28',
      });

      expect(total).toBe(1);
      expect(invoices[0].id).toBe(inRange.id);
    });
  });

  // ============================================
  // deleteInvoice
  // ============================================
  describe('deleteInvoice', () => {
    it('should delete an invoice without matches', async () => {
      const tenant = await givenTenant();
      const invoice = await givenInvoice(tenant.id);

      await deleteInvoice(tenant.id, invoice.id);

      await expect(getInvoice(tenant.id, invoice.id)).rejects.toMatchObject({ statusCode: 404 });
    });

    it('should refuse to delete an invoice that has a match', async () => {
      const tenant = await givenTenant();
      const invoice = await givenInvoice(tenant.id);
      const transaction = await givenTransaction(tenant.id);
      await db
        .insertInto('matches')
        .values({
          tenant_id: tenant.id,
          invoice_id: invoice.id,
          bank_transaction_id: transaction.id,
          score: '65.00',
          status: 'proposed',
          created_at: new Date().toISOString(),
        })
        .execute();

      await expect(deleteInvoice(tenant.id, invoice.id)).rejects.toMatchObject({
        statusCode: 409,
      });
      await expect(getInvoice(tenant.id, invoice.id)).resolves.toMatchObject({ id: invoice.id });
    });
  });
});
