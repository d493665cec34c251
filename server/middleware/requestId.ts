/**
 * Request ID Middleware
 *
 * Generates or extracts request ID and adds it to request/response context.
 * Request ID is used for tracing requests across the system.
 */

import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { createLogger, type Logger } from '../lib/logger';

const log = createLogger({ module: 'request-id' });

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() !== '' ? first : undefined;
}

/**
 * Extract or generate request ID from headers
 */
function getRequestId(req: Request): string {
  return headerValue(req.headers['x-request-id']) ??
    headerValue(req.headers['x-correlation-id']) ??
    randomUUID();
}

/**
 * Middleware to add request ID to all requests
 *
 * Adds request ID to:
 * - req.id (for use in route handlers)
 * - res.locals.requestId (for use in response helpers)
 * - Response header X-Request-ID
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = getRequestId(req);

  req.id = requestId;
  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);
  req.logger = log.child({ requestId });

  next();
}

// Extend Express types
declare global {
  namespace Express {
    interface Request {
      id?: string;
      logger?: Logger;
    }
  }
}
