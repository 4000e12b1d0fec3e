/**
 * Reconciliation API Routes (mounted at /tenants/:tenantId/reconcile)
 *
 * Endpoints:
 * - POST /                          - Run matching, store proposals
 * - GET  /explain                   - Score and explain one pair
 * - GET  /matches                   - List matches (optional ?status=)
 * - POST /matches/:matchId/confirm  - Confirm a proposed match
 */

import { Router } from 'express';
import { reconciliationController } from '../controllers';

const router = Router({ mergeParams: true });

/**
 * @route   POST /tenants/:tenantId/reconcile
 * @desc    Score open invoices against unmatched transactions
 *
 * Response:
 * - 200 OK: { candidates, total_invoices, total_transactions, matches_found }
 */
router.post('/', reconciliationController.reconcile);

/**
 * @route   GET /tenants/:tenantId/reconcile/explain
 * @desc    Explanation for one invoice/transaction pair
 *
 * Query params:
 * - invoice_id: number (required)
 * - transaction_id: number (required)
 */
router.get('/explain', reconciliationController.explain);

router.get('/matches', reconciliationController.listMatches);

/**
 * @route   POST /tenants/:tenantId/reconcile/matches/:matchId/confirm
 * @desc    PROPOSED → CONFIRMED; the invoice becomes MATCHED
 *
 * Response:
 * - 200 OK: confirmed match
 * - 404 Not Found: no proposed match with this id
 */
router.post('/matches/:matchId/confirm', reconciliationController.confirmMatch);

export default router;
