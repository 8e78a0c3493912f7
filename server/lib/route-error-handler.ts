/**
 * ROUTE ERROR HANDLER: Standardized Result Pattern Integration
 * Converts Result values from the service layer into HTTP responses
 *
 * @example
 * ```typescript
 * router.post('/match', async (req, res) => {
 *   const result = matchCandidates(description, await source.load());
 *   handleRouteResult(result, res, (outcome) => {
 *     sendSuccess(res, toResponse(outcome));
 *   });
 * });
 * ```
 */

import { Response } from 'express';
import { Result, isFailure, type AppError } from '../../shared/result-types';
import { logger } from '../config/logger';

// ===== TYPES =====

/**
 * Standard error response format used across all routes
 */
export interface StandardErrorResponse {
  success: false;
  error: string;        // Error code for programmatic handling
  message: string;      // Human-readable message
  timestamp: string;
  details?: Record<string, unknown>;
}

export interface StandardSuccessResponse<T> {
  success: true;
  data: T;
  timestamp: string;
}

export type SuccessCallback<T> = (_data: T) => void;

// ===== CORE HANDLER FUNCTIONS =====

/**
 * Responds with the error's status code on failure, otherwise hands the data
 * to the success callback
 */
export function handleRouteResult<T, E extends AppError>(
  result: Result<T, E>,
  res: Response,
  successCallback: SuccessCallback<T>,
  options: { includeErrorDetails?: boolean } = {}
): void {
  if (isFailure(result)) {
    const { error } = result;

    if (error.statusCode >= 500) {
      logger.error({ code: error.code, details: error.details }, error.message);
    } else {
      logger.warn({ code: error.code }, error.message);
    }

    const errorResponse: StandardErrorResponse = {
      success: false,
      error: error.code,
      message: error.message,
      timestamp: error.timestamp ?? new Date().toISOString()
    };

    if (options.includeErrorDetails && error.details) {
      errorResponse.details = error.details;
    }

    res.status(error.statusCode).json(errorResponse);
    return;
  }

  successCallback(result.data);
}

export function sendSuccess<T>(res: Response, data: T, statusCode = 200): void {
  const body: StandardSuccessResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString()
  };
  res.status(statusCode).json(body);
}
