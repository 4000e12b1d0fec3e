import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /health
 * @desc    Process status, uptime and version
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /health/ready
 * @desc    200 once the database answers, 503 otherwise
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /health/live
 */
router.get('/live', healthController.getLiveness);

export default router;
