/**
 * Global Error Handler Middleware
 *
 * Last middleware in the chain. Known application errors keep their code and
 * status; anything else becomes a 500 without leaking internals. Also answers
 * unmatched routes with a 404 in the same response shape.
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { isAppError } from '../../shared/errors';
import type { StandardErrorResponse } from '../lib/route-error-handler';

interface HttpError extends Error {
  status?: number;
  statusCode?: number;
  type?: string;
}

function isHttpError(error: unknown): error is HttpError {
  return error instanceof Error && ('status' in error || 'statusCode' in error);
}

/**
 * Map an unknown thrown value to status, code and message
 */
export function categorizeError(error: unknown): { statusCode: number; code: string; message: string } {
  if (isAppError(error)) {
    return { statusCode: error.statusCode, code: error.code, message: error.message };
  }

  // Body parser failures carry a 4xx status
  if (isHttpError(error)) {
    const statusCode = error.status ?? error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return {
        statusCode,
        code: error.type === 'entity.parse.failed' ? 'INVALID_REQUEST_BODY' : 'BAD_REQUEST',
        message: error.message,
      };
    }
  }

  return { statusCode: 500, code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' };
}

export function globalErrorHandler(
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const { statusCode, code, message } = categorizeError(error);

  if (statusCode >= 500) {
    logger.error({ err: error, method: req.method, path: req.path }, 'Unhandled request error');
  } else {
    logger.warn({ code, method: req.method, path: req.path }, message);
  }

  const body: StandardErrorResponse = {
    success: false,
    error: code,
    message,
    timestamp: new Date().toISOString(),
  };
  res.status(statusCode).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  const body: StandardErrorResponse = {
    success: false,
    error: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
    timestamp: new Date().toISOString(),
  };
  res.status(404).json(body);
}
