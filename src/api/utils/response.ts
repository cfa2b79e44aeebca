/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { ErrorResponse, SuccessResponse } from '../types.js';
import { getErrorStatus } from '../types.js';

/**
 * Error shape (matches Result pattern)
 */
interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Request id set by the request-id or control-auth middleware
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') ?? 'unknown';
}

/**
 * Create error response
 */
export function errorResponse(
  c: Context,
  error: ApiError,
  requestId: string
): Response {
  const body: ErrorResponse = {
    error: {
      code: error.code,
      message: error.message,
      ...(error.details !== undefined && { details: error.details }),
      requestId,
    },
  };

  return c.json(body, getErrorStatus(error.code));
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  const body: SuccessResponse<T> = {
    data,
    meta: { requestId },
  };

  return c.json(body, status);
}
