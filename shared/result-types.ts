/**
 * Result Pattern for Type-Safe Error Handling
 *
 * @fileoverview Expected failures of the matching engine (a missing job
 * description, an unavailable profile dataset) travel as values instead of
 * exceptions. Callers branch on `success` and TypeScript narrows the payload.
 *
 * @example
 * ```typescript
 * const dataset = await profileSource.load();
 * if (isFailure(dataset)) {
 *   logger.error({ code: dataset.error.code }, dataset.error.message);
 *   return;
 * }
 * rankProfiles(dataset.data, requirements);
 * ```
 */

// ===== CORE RESULT TYPES =====

/**
 * Either a success carrying `T` or a failure carrying `E`
 */
export type Result<T, E = AppError> = Success<T> | Failure<E>;

export interface Success<T> {
  readonly success: true;
  readonly data: T;
}

export interface Failure<E> {
  readonly success: false;
  readonly error: E;
}

// ===== RESULT CONSTRUCTORS =====

export const success = <T>(data: T): Success<T> => ({ success: true, data });

export const failure = <E>(error: E): Failure<E> => ({ success: false, error });

// ===== ERROR SHAPES =====

// Base application error interface
export interface AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  readonly timestamp?: string;
}

export interface MissingDescriptionFailure extends AppError {
  readonly code: 'MISSING_DESCRIPTION';
}

export interface ProfileDatasetFailure extends AppError {
  readonly code: 'PROFILE_DATASET_UNAVAILABLE';
  readonly source: string;
}

// ===== TYPE GUARDS =====

/**
 * Narrows a Result to its Success variant
 */
export const isSuccess = <T, E>(result: Result<T, E>): result is Success<T> => {
  return result.success === true;
};

/**
 * Narrows a Result to its Failure variant
 */
export const isFailure = <T, E>(result: Result<T, E>): result is Failure<E> => {
  return result.success === false;
};
