import { Request, Response } from 'express';
import { invoiceService } from '../services';
import { asyncHandler, sendPaginated, sendSuccess } from '../utils';
import { validateInput } from '../utils/validation';
import { invoiceParams, listInvoicesQuerySchema, tenantParams } from '../schemas';

/**
 * Invoice controller
 */
export class InvoiceController {
  /**
   * POST /tenants/:tenantId/invoices
   */
  createInvoice = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const invoice = await invoiceService.createInvoice(tenantId, req.body);
    sendSuccess(res, invoice, 'Invoice created', 201);
  });

  /**
   * GET /tenants/:tenantId/invoices
   * Query: status, vendor_id, date_from, date_to, amount_min, amount_max, page, limit
   */
  listInvoices = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const filters = validateInput(listInvoicesQuerySchema, req.query);
    const { invoices, total, page, limit } = await invoiceService.listInvoices(tenantId, filters);
    sendPaginated(res, invoices, { page, limit }, total);
  });

  /**
   * GET /tenants/:tenantId/invoices/:invoiceId
   */
  getInvoice = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId, invoiceId } = validateInput(invoiceParams, req.params);
    const invoice = await invoiceService.getInvoice(tenantId, invoiceId);
    sendSuccess(res, invoice);
  });

  /**
   * DELETE /tenants/:tenantId/invoices/:invoiceId
   */
  deleteInvoice = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId, invoiceId } = validateInput(invoiceParams, req.params);
    await invoiceService.deleteInvoice(tenantId, invoiceId);
    sendSuccess(res, { id: invoiceId }, 'Invoice deleted');
  });
}

export const invoiceController = new InvoiceController();

export default invoiceController;
