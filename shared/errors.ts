/**
 * Concrete Error Classes with Proper Status Codes
 *
 * @fileoverview Error classes for the matching service. Each one carries a
 * stable code for programmatic handling, the HTTP status the route layer
 * answers with, and a creation timestamp.
 *
 * @example
 * ```typescript
 * const error = MissingDescriptionError.create();
 * console.log(error.code);        // 'MISSING_DESCRIPTION'
 * console.log(error.statusCode);  // 400
 * ```
 */

import type {
  AppError,
  MissingDescriptionFailure,
  ProfileDatasetFailure
} from './result-types';

// ===== BASE ERROR CLASS =====

/**
 * Base error class that all application errors extend
 */
export class BaseAppError extends Error implements AppError {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  /** ISO timestamp when error was created */
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where error was thrown (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain object representation, used for API responses and logging
   */
  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp
    };
  }
}

// ===== CALLER INPUT ERRORS (400) =====

/**
 * The caller supplied no job description, or only whitespace
 */
export class MissingDescriptionError extends BaseAppError implements MissingDescriptionFailure {
  readonly code = 'MISSING_DESCRIPTION' as const;

  constructor(message = 'A job description is required', details?: Record<string, unknown>) {
    super('MISSING_DESCRIPTION', message, 400, details);
  }

  static create(acceptedFields?: string[]): MissingDescriptionError {
    return new MissingDescriptionError(
      'A job description is required',
      acceptedFields ? { acceptedFields } : undefined
    );
  }
}

// ===== DATA UNAVAILABILITY ERRORS (503) =====

/**
 * The profile dataset could not be read or does not have the expected shape.
 * A dataset that loads fine but holds no profiles is not an error.
 */
export class ProfileDatasetUnavailableError extends BaseAppError implements ProfileDatasetFailure {
  readonly code = 'PROFILE_DATASET_UNAVAILABLE' as const;
  readonly source: string;

  constructor(source: string, reason: string, details?: Record<string, unknown>) {
    super(
      'PROFILE_DATASET_UNAVAILABLE',
      `Profile dataset unavailable (${source}): ${reason}`,
      503,
      { source, ...details }
    );
    this.source = source;
  }

  static unreadable(source: string, cause: unknown): ProfileDatasetUnavailableError {
    return new ProfileDatasetUnavailableError(source, 'file could not be read', {
      cause: getErrorMessage(cause)
    });
  }

  static invalidJson(source: string, cause: unknown): ProfileDatasetUnavailableError {
    return new ProfileDatasetUnavailableError(source, 'file is not valid JSON', {
      cause: getErrorMessage(cause)
    });
  }

  static invalidStructure(source: string, issues: string[]): ProfileDatasetUnavailableError {
    return new ProfileDatasetUnavailableError(
      source,
      'expected a list of profile objects',
      { issues }
    );
  }
}

// ===== UTILITIES =====

export function isAppError(error: unknown): error is BaseAppError {
  return error instanceof BaseAppError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
