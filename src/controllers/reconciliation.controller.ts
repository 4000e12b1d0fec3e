import { Request, Response } from 'express';
import { reconciliationService } from '../services';
import { asyncHandler, sendSuccess } from '../utils';
import { validateInput } from '../utils/validation';
import { explainQuerySchema, listMatchesQuerySchema, matchParams, tenantParams } from '../schemas';

/**
 * Reconciliation controller
 */
export class ReconciliationController {
  /**
   * POST /tenants/:tenantId/reconcile
   */
  reconcile = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const summary = await reconciliationService.reconcile(tenantId);
    sendSuccess(res, summary, 'Reconciliation completed');
  });

  /**
   * GET /tenants/:tenantId/reconcile/explain?invoice_id=&transaction_id=
   */
  explain = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const { invoice_id, transaction_id } = validateInput(explainQuerySchema, req.query);
    const explanation = await reconciliationService.explainMatch(
      tenantId,
      invoice_id,
      transaction_id
    );
    sendSuccess(res, explanation);
  });

  /**
   * GET /tenants/:tenantId/reconcile/matches?status=
   */
  listMatches = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId } = validateInput(tenantParams, req.params);
    const { status } = validateInput(listMatchesQuerySchema, req.query);
    const matches = await reconciliationService.listMatches(tenantId, status);
    sendSuccess(res, matches);
  });

  /**
   * POST /tenants/:tenantId/reconcile/matches/:matchId/confirm
   */
  confirmMatch = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { tenantId, matchId } = validateInput(matchParams, req.params);
    const match = await reconciliationService.confirmMatch(tenantId, matchId);
    sendSuccess(res, match, 'Match confirmed');
  });
}

export const reconciliationController = new ReconciliationController();

export default reconciliationController;
