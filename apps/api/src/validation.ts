import type { Context } from 'hono';
import type { z } from 'zod';
import { validationError } from './errors.js';

export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw validationError('Request body must be valid JSON');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw validationError(parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join(', '));
  }
  return parsed.data;
}
