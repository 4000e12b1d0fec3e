import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AsyncHandler } from '../types';

/**
 * Adapts an async controller method to Express. A rejection goes to the
 * global error handler.
 */
export const asyncHandler =
  (handler: AsyncHandler): RequestHandler =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res, next).catch(next);
  };

export default asyncHandler;
