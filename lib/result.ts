/**
 * Result type for error handling.
 * Represents either a successful result with data or a failure with an error.
 */
export type Result<T> =
  | { ok: true; data: T }
  | { ok: false; error: AppError };

/**
 * Error codes surfaced by the planner.
 * Scheduling code only produces CONFIGURATION_ERROR; the rest come from the
 * request and persistence layers.
 */
export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR'
  | 'UNKNOWN_ERROR';

/**
 * Application error type.
 * `code` is usually an ErrorCode; unexpected exceptions keep their own name.
 */
export type AppError = {
  code: ErrorCode | (string & {});
  message: string;
  details?: unknown;
};

export function ok<T>(data: T): Result<T> {
  return { ok: true, data };
}

/**
 * Creates a failed Result.
 *
 * @param code - Error code (e.g., 'CONFIGURATION_ERROR', 'NOT_FOUND')
 * @param message - Human-readable error message
 * @param details - Optional additional error details
 */
export function err(
  code: AppError['code'],
  message: string,
  details?: unknown
): Result<never> {
  return {
    ok: false,
    error: {
      code,
      message,
      details,
    },
  };
}

/**
 * Converts an unknown thrown value to an AppError.
 * Used where an exception escapes a handler or a storage call.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof Error) {
    return {
      code: error.name || 'UNKNOWN_ERROR',
      message: error.message || 'An unknown error occurred',
      details: error.message,
    };
  }

  if (typeof error === 'string') {
    return {
      code: 'UNKNOWN_ERROR',
      message: error,
    };
  }

  return {
    code: 'UNKNOWN_ERROR',
    message: 'An unknown error occurred',
    details: error,
  };
}
