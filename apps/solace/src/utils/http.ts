/**
 * Helpers for JSON over fetch
 */

import { z } from 'zod';
import { errorMessage } from './errors';

export type JsonBodyResult<T> =
  | { ok: true; data: T }
  | { ok: false; issue: string };

/**
 * Read a response body and validate it, without throwing on bad JSON or a
 * shape mismatch.
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  response: Response,
  schema: S
): Promise<JsonBodyResult<z.infer<S>>> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    return { ok: false, issue: `invalid JSON: ${errorMessage(error)}` };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    return { ok: false, issue: `unexpected shape${where}: ${first?.message ?? 'unknown issue'}` };
  }
  return { ok: true, data: parsed.data };
}

export function bearerHeaders(apiKey: string): Record<string, string> {
  return {
    'Authorization': `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  };
}
