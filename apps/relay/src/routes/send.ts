import { Hono } from 'hono';
import { SendRequest, notificationMessage, type SendResponse } from '@notirelay/protocol';
import type { RelayContext } from '../context.js';
import { ValidationError } from '../errors.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import { describeIssues, methodNotAllowed, readJsonBody } from './body.js';

/**
 * POST /send: store a notification, then fan it out to live subscribers.
 *
 * Insert and publish are not one transaction: a crash between them leaves a stored
 * notification that was never broadcast (subscribers still see it in their next
 * history snapshot). `sent_to` is the subscriber count right after publishing.
 */
export function sendRoute(ctx: RelayContext): Hono {
  const app = new Hono();
  app.use(createAuthMiddleware(ctx.token));

  app.post('/', async (c) => {
    const parsed = SendRequest.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      throw new ValidationError(describeIssues(parsed.error));
    }

    const notification = ctx.store.insert(parsed.data.title ?? undefined, parsed.data.text);
    ctx.hub.publish(notificationMessage(notification));
    const sentTo = ctx.hub.connectedCount();

    ctx.log(`send: id=${notification.id} sent_to=${sentTo} title=${JSON.stringify(notification.title)}`);
    return c.json({ id: notification.id, sent_to: sentTo } satisfies SendResponse);
  });

  app.all('/', methodNotAllowed);

  return app;
}
