import { Result, AppError, ok, err } from '@/lib/result';

/**
 * HTTP status for an error code. Unknown codes are server errors.
 */
export function statusForError(error: AppError): number {
  switch (error.code) {
    case 'VALIDATION_ERROR':
    case 'CONFIGURATION_ERROR':
      return 400;
    case 'NOT_FOUND':
      return 404;
    default:
      return 500;
  }
}

/**
 * Creates a successful JSON Response from Result<T>.
 *
 * @param data - The data to return
 * @returns A Response with JSON body containing { ok: true, data }
 */
export function jsonOk<T>(data: T): Response {
  return Response.json(ok(data));
}

/**
 * Creates an error JSON Response from AppError.
 *
 * @returns A Response with JSON body containing { ok: false, error }
 */
export function jsonErr(error: AppError): Response {
  return Response.json(err(error.code, error.message, error.details), {
    status: statusForError(error),
  });
}

/**
 * Creates a JSON Response from a Result<T>.
 */
export function jsonResult<T>(result: Result<T>): Response {
  if (result.ok) {
    return jsonOk(result.data);
  }
  return jsonErr(result.error);
}
