import { STATUS_CODES, type IncomingMessage, type Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import type { RelayContext } from '../context.js';
import { AuthError, CapacityError } from '../errors.js';
import { ConnectionLifecycle } from './lifecycle.js';
import { webSocketTransport } from './transport.js';

export const SUBSCRIBE_PATH = '/ws';

/** Subscribers have nothing to say; anything bigger than this closes the socket. */
const MAX_INBOUND_PAYLOAD = 512;

export type UpgradeDecision =
  | { ok: true; lifecycle: ConnectionLifecycle }
  | { ok: false; status: 400 | 401 | 404 | 503; message: string };

function parseTarget(url: string | undefined): URL | undefined {
  try {
    return new URL(url ?? '/', 'http://relay.invalid');
  } catch {
    return undefined;
  }
}

/**
 * Decide on an upgrade request before any WebSocket handshake is written: an
 * unparseable target, wrong path, bad token and a full relay are all refused with a
 * plain HTTP status. An accepted decision holds a subscriber slot; activate or
 * abandon its lifecycle.
 */
export function screenUpgrade(url: string | undefined, ctx: RelayContext): UpgradeDecision {
  const target = parseTarget(url);
  if (target === undefined) {
    return { ok: false, status: 400, message: 'bad request' };
  }
  const { pathname, searchParams } = target;
  if (pathname !== SUBSCRIBE_PATH) {
    return { ok: false, status: 404, message: 'not found' };
  }

  const lifecycle = new ConnectionLifecycle({
    token: ctx.token,
    hub: ctx.hub,
    store: ctx.store,
    log: ctx.log,
    maxSubscribers: ctx.maxSubscribers,
    timings: ctx.timings,
  });

  try {
    lifecycle.authenticate(searchParams.get('token') ?? undefined);
    lifecycle.admit();
  } catch (err) {
    if (err instanceof AuthError || err instanceof CapacityError) {
      return { ok: false, status: err.status, message: err.message };
    }
    throw err;
  }
  return { ok: true, lifecycle };
}

/** Answer a refused upgrade on the raw socket and hang up once it is flushed. */
export function rejectUpgrade(socket: Duplex, status: number, message: string): void {
  const body = JSON.stringify({ error: message });
  socket.once('finish', () => socket.destroy());
  socket.end(
    `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ''}\r\n` +
      'Connection: close\r\n' +
      'Content-Type: application/json\r\n' +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      '\r\n' +
      body,
  );
}

/**
 * Route `Upgrade: websocket` requests on the HTTP server to subscriber connections.
 * The returned WebSocketServer owns no port; close it on shutdown.
 */
export function attachSubscriptions(server: Server, ctx: RelayContext): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true, maxPayload: MAX_INBOUND_PAYLOAD });

  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const remoteAddress = req.socket.remoteAddress ?? 'unknown';
    socket.on('error', (err) => {
      ctx.log(`ws: upgrade socket error from ${remoteAddress}: ${err.message}`);
    });

    let decision: UpgradeDecision;
    try {
      decision = screenUpgrade(req.url, ctx);
    } catch (err) {
      ctx.log(`ws: screening ${remoteAddress}: ${err instanceof Error ? err.message : String(err)}`);
      rejectUpgrade(socket, 500, 'internal error');
      return;
    }

    if (!decision.ok) {
      if (decision.status === 401 || decision.status === 503) {
        ctx.log(`ws: refused ${remoteAddress}: ${decision.message}`);
      }
      rejectUpgrade(socket, decision.status, decision.message);
      return;
    }

    // ws answers a bad handshake itself and never calls back; the slot goes back
    // when that socket closes. After activation this is a no-op.
    const { lifecycle } = decision;
    socket.once('close', () => lifecycle.abandon());

    wss.handleUpgrade(req, socket, head, (ws) => {
      ws.on('error', (err) => {
        ctx.log(`ws: socket error from ${remoteAddress}: ${err.message}`);
      });

      lifecycle.activate(webSocketTransport(ws, remoteAddress)).catch((err: unknown) => {
        ctx.log(`ws: ${remoteAddress}: ${err instanceof Error ? err.message : String(err)}`);
      });
    });
  });

  return wss;
}
