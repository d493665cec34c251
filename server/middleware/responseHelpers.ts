/**
 * Standardized API Response Helpers
 *
 * All successful responses follow: { success: true, data?: T, message?: string }
 * All error responses follow: { success: false, message: string, code: string, ... }
 */

import type { Response } from 'express';

export interface SuccessResponse<T = unknown> {
  success: true;
  data?: T;
  message?: string;
  requestId?: string;
}

function requestIdOf(res: Response): string | undefined {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : undefined;
}

/**
 * Send a successful response with data
 */
export function sendSuccess<T>(
  res: Response,
  data: T,
  message?: string,
  statusCode: number = 200
): void {
  const response: SuccessResponse<T> = {
    success: true,
    data,
  };

  if (message) {
    response.message = message;
  }

  const requestId = requestIdOf(res);
  if (requestId) {
    response.requestId = requestId;
  }

  res.status(statusCode).json(response);
}

/**
 * Send a Markdown document as-is
 */
export function sendMarkdown(res: Response, markdown: string, statusCode: number = 200): void {
  res.status(statusCode).type('text/markdown').send(markdown);
}
