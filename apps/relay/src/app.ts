import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import type { RelayContext } from './context.js';
import { AuthError, CapacityError, ValidationError } from './errors.js';
import { historyRoute } from './routes/history.js';
import { markSeenRoute } from './routes/mark-seen.js';
import { notificationsRoute } from './routes/notifications.js';
import { sendRoute } from './routes/send.js';
import { subscribeRoute } from './routes/subscribe.js';

/**
 * Hono app for the relay's HTTP surface. Every route except /health requires the
 * shared token; the auth middleware runs before any body is read.
 *
 * Errors thrown by handlers land in onError: typed relay errors map to their status,
 * anything else (storage failures included) is logged and answered with a generic 500.
 */
export function createApp(ctx: RelayContext): Hono {
  const app = new Hono();

  app.use('*', logger((message, ...rest) => ctx.log([message, ...rest].join(' '))));

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/send', sendRoute(ctx));
  app.route('/history', historyRoute(ctx));
  app.route('/mark-seen', markSeenRoute(ctx));
  app.route('/notifications', notificationsRoute(ctx));
  app.route('/ws', subscribeRoute(ctx));

  app.notFound((c) => c.json({ error: 'not found' }, 404));

  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json({ error: err.message }, 400);
    }
    if (err instanceof AuthError) {
      return c.json({ error: err.message }, 401);
    }
    if (err instanceof CapacityError) {
      return c.json({ error: err.message }, 503);
    }
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }

    ctx.log(`${c.req.method} ${c.req.path}: ${err.message}`);
    return c.json({ error: 'internal error' }, 500);
  });

  return app;
}
