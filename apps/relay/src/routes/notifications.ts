import { Hono } from 'hono';
import type { RelayContext } from '../context.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import { methodNotAllowed } from './body.js';

/** DELETE /notifications: irreversible removal of the whole log. */
export function notificationsRoute(ctx: RelayContext): Hono {
  const app = new Hono();
  app.use(createAuthMiddleware(ctx.token));

  app.delete('/', (c) => {
    ctx.store.clear();
    ctx.log('delete notifications: all records deleted');
    return c.body(null, 204);
  });

  app.all('/', methodNotAllowed);

  return app;
}
