import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   */
  getHealth = (_req: Request, res: Response): void => {
    sendSuccess(res, healthService.getHealthStatus(), 'Service is healthy');
  };

  /**
   * GET /health/ready
   * 503 names every failing check, e.g. "Service is not ready: database"
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const report = await healthService.checkReadiness();

    if (report.ready) {
      sendSuccess(res, report, 'Service is ready');
      return;
    }

    const failing = Object.entries(report.checks)
      .filter(([, ok]) => !ok)
      .map(([name]) => name);
    sendError(res, `Service is not ready: ${failing.join(', ')}`, 503, undefined, 'SERVICE_UNAVAILABLE');
  });

  /**
   * GET /health/live
   */
  getLiveness = (_req: Request, res: Response): void => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  };
}

export const healthController = new HealthController();

export default healthController;
