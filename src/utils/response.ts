import { Response } from 'express';
import { ApiResponse, PaginatedResponse } from '../types';

export interface PageRequest {
  page: number;
  limit: number;
}

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send an error response
 */
export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  message?: string,
  code?: string
): Response => {
  const response: ApiResponse = {
    success: false,
    error,
    code,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send a page of results with offset pagination metadata
 */
export const sendPaginated = <T>(
  res: Response,
  data: T[],
  { page, limit }: PageRequest,
  total: number,
  message?: string
): Response => {
  const response: PaginatedResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
    pagination: {
      page,
      limit,
      total,
      totalPages: Math.ceil(total / limit),
    },
  };

  return res.status(200).json(response);
};
