/**
 * Centralized Error Handling Middleware
 *
 * Provides consistent error responses across all API routes.
 * Engine errors already carry statusCode, code and details, so they render
 * without translation.
 */

import type { Request, Response, NextFunction } from 'express';
import { createLogger, logError } from '../lib/logger';

const log = createLogger({ module: 'error-handler' });

/**
 * Extended Error interface for API errors
 */
export interface ApiError extends Error {
  /** HTTP status code */
  statusCode?: number;
  /** Error code for client-side handling */
  code?: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Whether the error is operational (expected) vs programming error */
  isOperational?: boolean;
}

/**
 * Create an API error with proper typing
 */
export function createApiError(
  message: string,
  statusCode: number = 500,
  code: string = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  error.isOperational = true;
  return error;
}

interface ErrorResponse {
  success: false;
  message: string;
  code: string;
  details?: Record<string, unknown>;
  stack?: string;
  requestId?: string;
}

/**
 * Express's JSON parser reports malformed bodies with `status` and `type`
 */
function isBodyParseError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'type' in err &&
    err.type === 'entity.parse.failed' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

function toApiError(err: unknown): ApiError {
  if (isBodyParseError(err)) {
    return createApiError('Malformed JSON body', 400, 'BAD_REQUEST');
  }
  if (err instanceof Error) {
    return err;
  }
  return new Error(String(err));
}

/**
 * Centralized error handling middleware
 *
 * Must be registered AFTER all route handlers.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const apiError = toApiError(err);
  const requestId = req.id;
  const statusCode = apiError.statusCode || 500;

  const context = {
    requestId,
    path: req.path,
    method: req.method,
    statusCode,
    code: apiError.code,
    isOperational: apiError.isOperational,
  };
  if (statusCode >= 500) {
    logError(log, apiError, 'Request error', context);
  } else {
    log.warn({ ...context, message: apiError.message }, 'Request rejected');
  }

  const isProduction = process.env.NODE_ENV === 'production';

  const response: ErrorResponse = {
    success: false,
    message: isProduction && statusCode === 500
      ? 'An unexpected error occurred'
      : apiError.message,
    code: apiError.code || 'INTERNAL_ERROR',
    requestId,
  };

  // Include details in non-production or for operational errors
  if (!isProduction || apiError.isOperational) {
    response.details = apiError.details;
  }

  if (process.env.NODE_ENV === 'development') {
    response.stack = apiError.stack;
  }

  res.status(statusCode).json(response);
}

/**
 * Not found handler for undefined routes
 * Register after all route definitions but before the error handler.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    message: 'Route not found',
    code: 'NOT_FOUND',
    path: req.path,
    method: req.method,
  });
}

/**
 * Async handler wrapper to catch errors from async route handlers
 *
 * @example
 * router.post('/', asyncHandler(async (req, res) => {
 *   const result = await enhanceProjectOutput(enhancer, project, output);
 *   sendSuccess(res, result);
 * }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
