import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, getLogger } from '../utils';
import { env } from '../config';

const logger = getLogger('ErrorHandler');

/**
 * body-parser tags its failures with `type`, e.g. "entity.parse.failed"
 */
const bodyParserType = (err: Error): string | undefined =>
  'type' in err && typeof err.type === 'string' ? err.type : undefined;

/**
 * Maps anything thrown by a route onto an AppError
 */
export const normalizeError = (err: Error): AppError => {
  if (err instanceof AppError) {
    return err;
  }
  switch (bodyParserType(err)) {
    case 'entity.parse.failed':
      return AppError.badRequest('Malformed JSON body');
    case 'entity.too.large':
      return AppError.payloadTooLarge();
    default:
      break;
  }
  if (err instanceof MulterError) {
    return AppError.validation(`Upload rejected: ${err.message}`);
  }
  return AppError.internal();
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const appError = normalizeError(err);

  // Log error
  if (!appError.isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${appError.message}`, { code: appError.code });
  }

  // Send response
  res.status(appError.statusCode).json({
    success: false,
    error: appError.message,
    code: appError.code,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
