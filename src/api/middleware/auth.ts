/**
 * Request Middleware
 * Request ids for every route, bearer-token guard for the control routes
 */

import { createHash, timingSafeEqual } from 'node:crypto';

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Constant-time token comparison
 */
function tokensMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

/**
 * Create middleware for public routes: assigns a request id only
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    c.set('requestId', generateRequestId());
    return next();
  };
}

/**
 * Create middleware for the curiosity control routes.
 * With no token configured the routes are open (local development).
 */
export function createControlAuthMiddleware(deps: { token?: string }) {
  const { token } = deps;

  return async function controlAuthMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();
    c.set('requestId', requestId);

    if (token === undefined) {
      return next();
    }

    const authHeader = c.req.header('Authorization');
    const provided = authHeader?.startsWith('Bearer ')
      ? authHeader.slice(7).trim()
      : '';

    if (provided === '' || !tokensMatch(provided, token)) {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: 'Missing or invalid authorization header',
            requestId,
          },
        },
        401
      );
    }

    return next();
  };
}
