import { Result, toAppError, err } from '@/lib/result';
import { jsonResult } from '@/lib/api-response';

/**
 * Route handler function type.
 * Accepts a Request and returns a Promise<Result<T>>.
 */
type RouteHandler<T = unknown> = (req: Request) => Promise<Result<T>>;

/**
 * Wraps a route handler to provide consistent error handling.
 *
 * Results become `{ ok, data | error }` JSON. Anything thrown is logged and
 * returned as an error body with status 500.
 *
 * @example
 * ```typescript
 * // app/api/validate/route.ts
 * export const POST = withRoute(async (req) => {
 *   const body = await readJsonBody(req);
 *   if (!body.ok) return body;
 *   ...
 * });
 * ```
 */
export function withRoute<T = unknown>(
  handler: RouteHandler<T>
): (req: Request) => Promise<Response> {
  return async (req: Request): Promise<Response> => {
    try {
      const result = await handler(req);
      if (!result.ok) {
        console.warn('Route handler returned an error:', {
          code: result.error.code,
          message: result.error.message,
          url: req.url,
          method: req.method,
        });
      }
      return jsonResult(result);
    } catch (error) {
      // Unexpected error - log it and convert to AppError
      const appError = toAppError(error);
      console.error('Unexpected error in route handler:', {
        code: appError.code,
        message: appError.message,
        details: appError.details,
        url: req.url,
        method: req.method,
      });

      const errorResult: Result<never> = err(
        appError.code,
        appError.message,
        appError.details
      );
      return jsonResult(errorResult);
    }
  };
}
