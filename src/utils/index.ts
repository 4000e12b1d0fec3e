export { default as logger, Logging, getLogger } from './logger';
export { sendSuccess, sendError, sendPaginated } from './response';
export type { PageRequest } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
export type { ErrorCode } from './AppError';
export { db, connectDatabase, disconnectDatabase } from './database';
export type { DB } from './database';
