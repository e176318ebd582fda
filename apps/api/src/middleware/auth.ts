import type { MiddlewareHandler } from 'hono';
import { AppError } from '../errors.js';

const BEARER = /^Bearer\s+(.+)$/i;

/** Bearer-key guard for the calculation routes. Open when no key is configured. */
export function apiKeyAuth(apiKey: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (!apiKey) {
      return next();
    }

    const header = c.req.header('Authorization');
    if (!header) {
      throw new AppError(
        'UNAUTHORIZED',
        'Missing Authorization header',
        401,
        'Send the key as: Authorization: Bearer <key>',
      );
    }

    const token = BEARER.exec(header)?.[1];
    if (token !== apiKey) {
      throw new AppError('UNAUTHORIZED', 'Invalid API key', 401, 'Compare the key with FINPLAN_API_KEY on the server');
    }

    await next();
  };
}
