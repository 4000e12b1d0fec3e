/**
 * Invoice API Routes (mounted at /tenants/:tenantId/invoices)
 */

import { Router } from 'express';
import { invoiceController } from '../controllers';

const router = Router({ mergeParams: true });

/**
 * @route   POST /tenants/:tenantId/invoices
 * @desc    Create an OPEN invoice
 *
 * Response:
 * - 201 Created
 * - 404 vendor_id not owned by the tenant
 * - 409 invoice_number already used
 */
router.post('/', invoiceController.createInvoice);

/**
 * @route   GET /tenants/:tenantId/invoices
 * @desc    List invoices, newest first, with optional filters
 */
router.get('/', invoiceController.listInvoices);

router.get('/:invoiceId', invoiceController.getInvoice);

/**
 * @route   DELETE /tenants/:tenantId/invoices/:invoiceId
 * @desc    Delete an invoice; 409 when it has any match
 */
router.delete('/:invoiceId', invoiceController.deleteInvoice);

export default router;
