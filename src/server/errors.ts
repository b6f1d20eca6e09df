import type { Context } from 'hono';
import type { ZodTypeAny, output } from 'zod';
import { fieldErrors } from '../utils/validation.js';

export type ErrorKind = 'ValidationError' | 'BadRequest' | 'NotFound' | 'InternalServerError';

export interface ErrorResponse {
  error: ErrorKind;
  message: string;
  details: Record<string, unknown> | null;
  timestamp: string;
}

export function errorResponse(
  error: ErrorKind,
  message: string,
  details: Record<string, unknown> | null = null,
): ErrorResponse {
  return { error, message, details, timestamp: new Date().toISOString() };
}

export type BodyResult<T> = { ok: true; data: T } | { ok: false; response: Response };

/**
 * Read and validate a JSON request body.
 * Malformed JSON → 400 BadRequest; schema failure → 422 ValidationError.
 */
export async function parseJsonBody<S extends ZodTypeAny>(c: Context, schema: S): Promise<BodyResult<output<S>>> {
  const raw = await c.req.text();

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, response: c.json(errorResponse('BadRequest', 'Malformed JSON body', { error: message }), 400) };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      response: c.json(
        errorResponse('ValidationError', 'Request validation failed', { errors: fieldErrors(parsed.error) }),
        422,
      ),
    };
  }
  return { ok: true, data: parsed.data };
}
