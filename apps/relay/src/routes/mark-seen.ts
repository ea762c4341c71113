import { Hono } from 'hono';
import { MarkSeenRequest, type MarkSeenResponse } from '@notirelay/protocol';
import type { RelayContext } from '../context.js';
import { ValidationError } from '../errors.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import { describeIssues, methodNotAllowed, readJsonBody } from './body.js';

/**
 * POST /mark-seen: body `{"ids":[...]}` is optional; no body, null or an empty
 * list marks every unseen notification.
 */
export function markSeenRoute(ctx: RelayContext): Hono {
  const app = new Hono();
  app.use(createAuthMiddleware(ctx.token));

  app.post('/', async (c) => {
    const parsed = MarkSeenRequest.safeParse((await readJsonBody(c)) ?? {});
    if (!parsed.success) {
      throw new ValidationError(describeIssues(parsed.error));
    }

    const marked = ctx.store.markSeen(parsed.data.ids ?? undefined);
    ctx.log(`mark-seen: ${marked} notifications marked`);
    return c.json({ marked } satisfies MarkSeenResponse);
  });

  app.all('/', methodNotAllowed);

  return app;
}
