import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { toNotificationJson } from '@notirelay/protocol';
import type { RelayContext } from '../context.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import { methodNotAllowed } from './body.js';

// Unparseable values fall back to the store defaults instead of failing the request.
const intParam = z
  .string()
  .optional()
  .transform((value) => {
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  });

const historyQuerySchema = z.object({
  limit: intParam,
  offset: intParam,
});

/**
 * GET /history?limit=&offset=: newest-first page of stored notifications.
 */
export function historyRoute(ctx: RelayContext): Hono {
  const app = new Hono();
  app.use(createAuthMiddleware(ctx.token));

  app.get('/', zValidator('query', historyQuerySchema), (c) => {
    const { limit, offset } = c.req.valid('query');
    const rows = ctx.store.history(limit, offset);
    return c.json(rows.map(toNotificationJson));
  });

  app.all('/', methodNotAllowed);

  return app;
}
