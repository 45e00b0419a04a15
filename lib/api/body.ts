import type { z } from 'zod';
import { err, ok, type Result } from '@/lib/result';

/**
 * Reads a JSON body. A missing or malformed body is a VALIDATION_ERROR.
 */
export async function readJsonBody(req: Request): Promise<Result<unknown>> {
  try {
    return ok(await req.json());
  } catch (error) {
    return err(
      'VALIDATION_ERROR',
      'Request body must be valid JSON',
      error instanceof Error ? error.message : undefined
    );
  }
}

/**
 * Reads a JSON body and parses it with `schema`.
 * Zod issues are returned under `details.issues`.
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  req: Request,
  schema: S
): Promise<Result<z.output<S>>> {
  const body = await readJsonBody(req);
  if (!body.ok) return body;

  const parsed = schema.safeParse(body.data);
  if (!parsed.success) {
    return err('VALIDATION_ERROR', 'Invalid request body', { issues: parsed.error.issues });
  }
  return ok(parsed.data);
}

/**
 * Reads and checks the `planId` search parameter, falling back to `fallback`.
 */
export function readPlanId(
  req: Request,
  schema: z.ZodType<string>,
  fallback: string
): Result<string> {
  const raw = new URL(req.url).searchParams.get('planId') ?? fallback;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return err('VALIDATION_ERROR', parsed.error.issues[0]?.message ?? 'Invalid planId', {
      issues: parsed.error.issues,
    });
  }
  return ok(parsed.data);
}
