/**
 * Tenant API Routes
 *
 * Every tenant-owned resource is nested under /tenants/:tenantId.
 *
 * Endpoints:
 * - POST /                     - Create tenant
 * - GET  /                     - List tenants
 * - GET  /:tenantId            - Get tenant
 * - POST /:tenantId/vendors    - Create vendor
 * - GET  /:tenantId/vendors    - List vendors
 */

import { Router } from 'express';
import { tenantController } from '../controllers';
import invoicesRoutes from './invoices.routes';
import bankTransactionsRoutes from './bankTransactions.routes';
import reconciliationRoutes from './reconciliation.routes';

const router = Router();

/**
 * @route   POST /tenants
 * @desc    Create a tenant (name unique, case-sensitive)
 */
router.post('/', tenantController.createTenant);

/**
 * @route   GET /tenants
 * @desc    List tenants, paginated
 */
router.get('/', tenantController.listTenants);

/**
 * @route   GET /tenants/:tenantId
 */
router.get('/:tenantId', tenantController.getTenant);

router.post('/:tenantId/vendors', tenantController.createVendor);
router.get('/:tenantId/vendors', tenantController.listVendors);

router.use('/:tenantId/invoices', invoicesRoutes);
router.use('/:tenantId/bank-transactions', bankTransactionsRoutes);
router.use('/:tenantId/reconcile', reconciliationRoutes);

export default router;
