import type { MiddlewareHandler } from 'hono';
import { createMiddleware } from 'hono/factory';
import { timingSafeEqual } from 'node:crypto';
import { AuthError } from '../errors.js';

const BEARER_PREFIX = 'Bearer ';

/** Exact, constant-time comparison of a presented token against the shared one. */
export function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

export function bearerToken(header: string | undefined): string | undefined {
  if (header === undefined || !header.startsWith(BEARER_PREFIX)) return undefined;
  return header.slice(BEARER_PREFIX.length);
}

/**
 * Shared-token auth for the HTTP endpoints: `Authorization: Bearer <token>`.
 *
 * hono/bearer-auth is not used because it restricts tokens to a base64/URL-safe
 * alphabet and answers a malformed header with 400; the relay token is any
 * non-empty string and every auth failure is a 401.
 */
export function createAuthMiddleware(token: string): MiddlewareHandler {
  return createMiddleware(async (c, next) => {
    const presented = bearerToken(c.req.header('Authorization'));
    if (presented === undefined || !tokensMatch(presented, token)) {
      throw new AuthError();
    }
    await next();
  });
}

/**
 * Auth for the subscription endpoint. Browsers and most WebSocket clients cannot
 * set headers on the upgrade request, so the token travels as `?token=`.
 */
export function createQueryTokenMiddleware(token: string): MiddlewareHandler {
  return createMiddleware(async (c, next) => {
    const presented = c.req.query('token');
    if (presented === undefined || !tokensMatch(presented, token)) {
      throw new AuthError();
    }
    await next();
  });
}
