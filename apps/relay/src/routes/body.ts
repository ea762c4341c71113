import type { Context } from 'hono';
import type { ZodError } from 'zod';
import { ValidationError } from '../errors.js';

/**
 * Read a JSON request body regardless of its Content-Type header.
 * An empty body reads as undefined.
 *
 * @throws ValidationError when the body is not valid JSON
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  const raw = await c.req.text();
  if (raw.trim() === '') return undefined;

  try {
    const body: unknown = JSON.parse(raw);
    return body;
  } catch {
    throw new ValidationError('body must be valid JSON');
  }
}

export function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'body'}: ${issue.message}`)
    .join('; ');
}

export function methodNotAllowed(c: Context): Response {
  return c.json({ error: 'method not allowed' }, 405);
}
