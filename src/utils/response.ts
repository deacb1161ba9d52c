import { Response } from 'express';
import { ApiResponse, PaginatedResponse } from '../types';

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
 * Send a limited list response.
 * The ledger pages by "newest N", so only the applied limit and row count are reported.
 */
export const sendList = <T>(
  res: Response,
  data: T[],
  limit: number,
  message?: string
): Response => {
  const response: PaginatedResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
    pagination: {
      limit,
      count: data.length,
    },
  };

  return res.status(200).json(response);
};
