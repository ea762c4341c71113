import { Hono } from 'hono';
import type { RelayContext } from '../context.js';
import { createQueryTokenMiddleware } from '../middleware/auth.js';

/**
 * GET /ws reached without an Upgrade header. Real upgrades never get here: the
 * HTTP server hands them to the subscription handler before Hono sees them.
 */
export function subscribeRoute(ctx: RelayContext): Hono {
  const app = new Hono();
  app.use(createQueryTokenMiddleware(ctx.token));

  app.get('/', (c) => c.json({ error: 'websocket upgrade required' }, 426));

  return app;
}
