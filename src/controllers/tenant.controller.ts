import { Request, Response } from 'express';
import { tenantService, vendorService } from '../services';
import { asyncHandler, sendPaginated, sendSuccess } from '../utils';
import { validateInput } from '../utils/validation';
import { paginationQuery, tenantParams } from '../schemas';

/**
 * Tenant and vendor controller
 */
export class TenantController {
  /**
   * POST /tenants
   */
  createTenant = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const tenant = await tenantService.createTenant(req.body);
    sendSuccess(res, tenant, 'Tenant created', 201);
  });

  /**
   * GET /tenants
   */
  listTenants = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const pageRequest = validateInput(paginationQuery, req.query);
    const { tenants, total } = await tenantService.listTenants(pageRequest);
    sendPaginated(res, tenants, pageRequest, total);
  });

  /**
   * GET /tenants/:tenantId
   */
  getTenant = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const tenant = await tenantService.getTenant(tenantId);
    sendSuccess(res, tenant);
  });

  /**
   * POST /tenants/:tenantId/vendors
   */
  createVendor = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const vendor = await vendorService.createVendor(tenantId, req.body);
    sendSuccess(res, vendor, 'Vendor created', 201);
  });

  /**
   * GET /tenants/:tenantId/vendors
   */
  listVendors = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const vendors = await vendorService.listVendors(tenantId);
    sendSuccess(res, vendors);
  });
}

export const tenantController = new TenantController();

export default tenantController;
